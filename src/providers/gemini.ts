import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError
} from '@google/generative-ai';
import { AnalysisConfiguration } from '../types';
import { BackendRejectedError, BackendUnavailableError } from '../errors';
import { LLMBackend, classifyHttpStatus } from './base';

export class GeminiBackend implements LLMBackend {
  private client: GoogleGenerativeAI;
  private timeoutMs: number;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.timeoutMs = timeoutMs;
  }

  getName(): string {
    return 'Google Gemini';
  }

  async send(prompt: string, config: AnalysisConfiguration): Promise<string> {
    const model = this.client.getGenerativeModel(
      {
        model: config.model,
        generationConfig: { temperature: config.temperature }
      },
      { timeout: this.timeoutMs }
    );

    try {
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      throw this.classify(error);
    }
  }

  private classify(error: unknown): Error {
    const name = this.getName();
    if (error instanceof GoogleGenerativeAIFetchError && typeof error.status === 'number') {
      return classifyHttpStatus(name, error.status, error.message, error);
    }
    // Blocked prompt or candidate
    if (error instanceof GoogleGenerativeAIResponseError) {
      return new BackendRejectedError(`${name} refused to answer: ${error.message}`, undefined, error);
    }
    // Network failures and aborted (timed out) requests
    if (error instanceof GoogleGenerativeAIError) {
      return new BackendUnavailableError(`${name} unreachable: ${error.message}`, error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
