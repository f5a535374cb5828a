import { AnalysisConfiguration } from './types';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_LANGUAGE = 'Dutch';
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface ConfigurationOptions {
  model?: string;
  apiKey?: string;
  language?: string;
  temperature?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

export function createConfiguration(options: ConfigurationOptions = {}): AnalysisConfiguration {
  const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new Error(`Invalid temperature: ${temperature}. Must be between 0.0 and 2.0`);
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Invalid timeout: ${timeoutMs}. Must be a positive number of milliseconds`);
  }

  const model = options.model?.trim() || DEFAULT_MODEL;
  const language = options.language?.trim() || DEFAULT_LANGUAGE;

  return Object.freeze({
    model,
    apiKey: options.apiKey || undefined,
    language,
    temperature,
    baseUrl: options.baseUrl?.trim() || undefined,
    timeoutMs
  });
}

const providerKeyMap = {
  claude: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY'
} as const;

export type HostedProviderType = keyof typeof providerKeyMap;

// Routing by model prefix, the way hosted model names are published
export function hostedProviderFor(model: string): HostedProviderType {
  const lower = model.toLowerCase();
  if (lower.startsWith('claude')) return 'claude';
  if (lower.startsWith('gemini')) return 'gemini';
  return 'openai';
}

// Shown by `list-models`; routing accepts any name
export const KNOWN_MODELS: Record<HostedProviderType, readonly string[]> = {
  openai: ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo'],
  claude: ['claude-3-5-sonnet-latest', 'claude-3-5-haiku-latest'],
  gemini: ['gemini-1.5-pro', 'gemini-1.5-flash']
};

// Shown by `list-languages`; the prompt takes any language name
export const KNOWN_LANGUAGES: readonly string[] = ['Dutch', 'English', 'German', 'French', 'Spanish', 'Italian'];

export function apiKeyVariableFor(model: string): string {
  return providerKeyMap[hostedProviderFor(model)];
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a number`);
  }
  return value;
}

/**
 * Resolve configuration from environment variables. Call `dotenv.config()`
 * first if a `.env` file should be honoured; explicit overrides win.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigurationOptions = {}
): AnalysisConfiguration {
  const model = overrides.model || env.POLITICAL_ANALYSIS_MODEL || DEFAULT_MODEL;
  const baseUrl = overrides.baseUrl || env.POLITICAL_ANALYSIS_BASE_URL;

  return createConfiguration({
    model,
    apiKey: overrides.apiKey || env.POLITICAL_ANALYSIS_API_KEY || env[apiKeyVariableFor(model)],
    language: overrides.language || env.POLITICAL_ANALYSIS_LANGUAGE,
    temperature: overrides.temperature ?? parseNumber('POLITICAL_ANALYSIS_TEMPERATURE', env.POLITICAL_ANALYSIS_TEMPERATURE),
    baseUrl,
    timeoutMs: overrides.timeoutMs ?? parseNumber('POLITICAL_ANALYSIS_TIMEOUT_MS', env.POLITICAL_ANALYSIS_TIMEOUT_MS)
  });
}
