import Anthropic from '@anthropic-ai/sdk';
import { AnalysisConfiguration } from '../types';
import { BackendUnavailableError } from '../errors';
import { LLMBackend, classifyHttpStatus } from './base';

const MAX_OUTPUT_TOKENS = 4096;
// The Messages API caps temperature at 1.0
const MAX_TEMPERATURE = 1.0;

export class ClaudeBackend implements LLMBackend {
  private client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  getName(): string {
    return 'Claude (Anthropic)';
  }

  async send(prompt: string, config: AnalysisConfiguration): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: config.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: Math.min(config.temperature, MAX_TEMPERATURE),
        messages: [{
          role: 'user',
          content: prompt
        }]
      });

      return response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
    } catch (error) {
      throw this.classify(error);
    }
  }

  private classify(error: unknown): Error {
    if (error instanceof Anthropic.APIError) {
      if (typeof error.status === 'number') {
        return classifyHttpStatus(this.getName(), error.status, error.message, error);
      }
      return new BackendUnavailableError(`${this.getName()} unreachable: ${error.message}`, error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
