import { AnalysisConfiguration } from '../types';
import { apiKeyVariableFor, hostedProviderFor } from '../config';
import { LLMBackend } from './base';
import { ClaudeBackend } from './claude';
import { OpenAIBackend } from './openai';
import { GeminiBackend } from './gemini';

/**
 * Pick the backend variant for a configuration. A base URL always means a
 * local OpenAI-compatible endpoint, whatever the model name; otherwise the
 * hosted provider is chosen from the model identifier.
 */
export function createBackend(config: AnalysisConfiguration): LLMBackend {
  if (config.baseUrl) {
    return new OpenAIBackend({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs
    });
  }

  if (!config.apiKey) {
    throw new Error(`${apiKeyVariableFor(config.model)} is required for model ${config.model}`);
  }

  switch (hostedProviderFor(config.model)) {
    case 'claude':
      return new ClaudeBackend(config.apiKey, config.timeoutMs);

    case 'gemini':
      return new GeminiBackend(config.apiKey, config.timeoutMs);

    case 'openai':
      return new OpenAIBackend({ apiKey: config.apiKey, timeoutMs: config.timeoutMs });
  }
}
