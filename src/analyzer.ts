import { AnalysisConfiguration, AnalysisResult, ParseOutcome } from './types';
import { LLMBackend } from './providers/base';
import { createBackend } from './providers/factory';
import { buildAnalysisPrompt, buildRetryPrompt } from './prompts';
import { parseAnalysisResponse } from './parser';
import { aggregateResult } from './aggregator';
import { TextSource, resolveSource } from './sources';
import {
  AnalysisFailedError,
  EmptyInputError,
  MalformedResponseError,
  isRetryableBackendError
} from './errors';

export const DIRECT_TEXT_SOURCE = 'direct_text_input';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface RetryPolicy {
  /** Extra attempts after a BackendUnavailable failure. */
  maxBackendRetries: number;
  /** First backoff delay; doubles on each further retry. */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxBackendRetries: 2,
  baseDelayMs: 500
};

export interface AnalyzerOptions {
  backend?: LLMBackend;
  logger?: Logger;
  retry?: Partial<RetryPolicy>;
}

interface CallState {
  attempts: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Turns a transcript into an AnalysisResult with one model round trip
 * (plus bounded retries). Holds no per-call state, so one instance can
 * serve concurrent callers.
 */
export class PoliticalDiscourseAnalyzer {
  private readonly config: AnalysisConfiguration;
  private readonly backend: LLMBackend;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;

  constructor(config: AnalysisConfiguration, options: AnalyzerOptions = {}) {
    this.config = Object.isFrozen(config) ? config : Object.freeze({ ...config });
    this.backend = options.backend ?? createBackend(this.config);
    this.logger = options.logger ?? console;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.logger.info(`[Engine] Using backend: ${this.backend.getName()} (model ${this.config.model})`);
  }

  getConfig(): AnalysisConfiguration {
    return this.config;
  }

  async analyzeText(text: string): Promise<AnalysisResult> {
    return this.run(text, DIRECT_TEXT_SOURCE);
  }

  async analyzeSource(locator: string | TextSource): Promise<AnalysisResult> {
    const source = resolveSource(locator);
    this.logger.info(`[Engine] Reading source: ${source.describe()}`);
    const text = await source.read();
    return this.run(text, source.describe());
  }

  private async run(text: string, source: string): Promise<AnalysisResult> {
    if (text.trim().length === 0) {
      throw new EmptyInputError();
    }

    const state: CallState = { attempts: 0 };
    const { language } = this.config;

    let { outcome, raw } = await this.requestAndParse(buildAnalysisPrompt(text, language), state);

    if (outcome.status === 'malformed') {
      this.logger.warn(`[Engine] Malformed response (${outcome.reason}), retrying with schema reminder`);
      ({ outcome, raw } = await this.requestAndParse(buildRetryPrompt(text, language, outcome.reason), state));
    }

    if (outcome.status === 'malformed') {
      const cause = new MalformedResponseError(outcome.reason, raw);
      throw new AnalysisFailedError(`Analysis failed after ${state.attempts} attempt(s): ${outcome.reason}`, cause);
    }

    let droppedRecords = 0;
    let truncated = false;
    if (outcome.status === 'partial') {
      droppedRecords = outcome.dropped.length;
      truncated = outcome.truncated;
      this.logger.warn(
        `[Engine] Accepted partial response${truncated ? ' (truncated)' : ''}: ${droppedRecords} record(s) dropped`
      );
    }
    for (const warning of outcome.warnings) {
      this.logger.warn(`[Parser] ${warning}`);
    }

    return aggregateResult(outcome.response, {
      droppedRecords,
      truncated,
      warnings: outcome.warnings,
      metadata: {
        model: this.config.model,
        language,
        temperature: this.config.temperature,
        backend: this.backend.getName(),
        source,
        attempts: state.attempts,
        analyzed_at: new Date().toISOString()
      }
    });
  }

  private async requestAndParse(prompt: string, state: CallState): Promise<{ outcome: ParseOutcome; raw: string }> {
    const raw = await this.sendWithRetry(prompt, state);
    const outcome = parseAnalysisResponse(raw);
    if (outcome.status === 'malformed') {
      this.logger.error(`[Engine] Raw response: ${raw.slice(0, 500)}`);
    }
    return { outcome, raw };
  }

  private async sendWithRetry(prompt: string, state: CallState): Promise<string> {
    for (let retry = 0; ; retry++) {
      state.attempts += 1;
      try {
        return await this.backend.send(prompt, this.config);
      } catch (error) {
        if (!isRetryableBackendError(error) || retry >= this.retry.maxBackendRetries) {
          throw error;
        }
        const delay = this.retry.baseDelayMs * 2 ** retry;
        this.logger.warn(`[Engine] ${error.message}; retry ${retry + 1}/${this.retry.maxBackendRetries} in ${delay}ms`);
        await sleep(delay);
      }
    }
  }
}
