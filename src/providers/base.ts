import { AnalysisConfiguration } from '../types';
import { BackendRejectedError, BackendUnavailableError } from '../errors';

export interface LLMBackend {
  /** One chat completion round trip. Resolves with the raw completion text. */
  send(prompt: string, config: AnalysisConfiguration): Promise<string>;
  getName(): string;
}

// Placeholder sent to local endpoints that ignore authentication
export const LOCAL_API_KEY_PLACEHOLDER = 'not-needed';

/**
 * Map an HTTP status from a provider onto the backend error taxonomy.
 * 408 and 5xx are transient; every other status is a refusal.
 */
export function classifyHttpStatus(
  provider: string,
  status: number,
  message: string,
  cause: unknown
): BackendUnavailableError | BackendRejectedError {
  if (status === 408 || status >= 500) {
    return new BackendUnavailableError(`${provider} unavailable (HTTP ${status}): ${message}`, cause);
  }
  return new BackendRejectedError(`${provider} rejected the request (HTTP ${status}): ${message}`, status, cause);
}
