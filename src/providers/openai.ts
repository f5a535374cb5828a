import OpenAI from 'openai';
import { AnalysisConfiguration } from '../types';
import { BackendUnavailableError } from '../errors';
import { LLMBackend, LOCAL_API_KEY_PLACEHOLDER, classifyHttpStatus } from './base';

export interface OpenAIBackendOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
}

/**
 * Chat completions against OpenAI, or against any OpenAI-compatible local
 * server (LM Studio, Ollama, vLLM) when a base URL is given.
 */
export class OpenAIBackend implements LLMBackend {
  private client: OpenAI;
  private local: boolean;

  constructor(options: OpenAIBackendOptions) {
    this.local = options.baseUrl !== undefined;
    this.client = new OpenAI({
      apiKey: options.apiKey ?? LOCAL_API_KEY_PLACEHOLDER,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
  }

  getName(): string {
    return this.local ? 'Local endpoint (OpenAI-compatible)' : 'OpenAI';
  }

  async send(prompt: string, config: AnalysisConfiguration): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: config.model,
        messages: [{
          role: 'user',
          content: prompt
        }],
        temperature: config.temperature
      });

      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw this.classify(error);
    }
  }

  private classify(error: unknown): Error {
    const name = this.getName();
    // APIConnectionError (and its timeout subclass) carries no status
    if (error instanceof OpenAI.APIError) {
      if (typeof error.status === 'number') {
        return classifyHttpStatus(name, error.status, error.message, error);
      }
      return new BackendUnavailableError(`${name} unreachable: ${error.message}`, error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
