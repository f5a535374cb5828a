export * from './types';
export * from './errors';
export {
  createConfiguration,
  loadConfigFromEnv,
  hostedProviderFor,
  KNOWN_LANGUAGES,
  KNOWN_MODELS,
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS
} from './config';
export type { ConfigurationOptions, HostedProviderType } from './config';
export { PoliticalDiscourseAnalyzer, DEFAULT_RETRY_POLICY, DIRECT_TEXT_SOURCE } from './analyzer';
export type { AnalyzerOptions, Logger, RetryPolicy } from './analyzer';
export type { LLMBackend } from './providers/base';
export { createBackend } from './providers/factory';
export { buildAnalysisPrompt, buildRetryPrompt, TRANSCRIPT_BEGIN, TRANSCRIPT_END } from './prompts';
export { parseAnalysisResponse, normalizeEntityName } from './parser';
export { aggregateResult, mergeEntitySentiments } from './aggregator';
export { FileTextSource, SrtTextSource, StreamTextSource, resolveSource } from './sources';
export type { TextSource } from './sources';
export { srtToText } from './srt';
