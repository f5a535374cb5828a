import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  apiKeyVariableFor,
  createConfiguration,
  hostedProviderFor,
  loadConfigFromEnv
} from '../src/config';

describe('Config', () => {
  describe('createConfiguration', () => {
    it('should apply defaults', () => {
      expect(createConfiguration()).toEqual({
        model: DEFAULT_MODEL,
        apiKey: undefined,
        language: DEFAULT_LANGUAGE,
        temperature: DEFAULT_TEMPERATURE,
        baseUrl: undefined,
        timeoutMs: DEFAULT_TIMEOUT_MS
      });
      expect(DEFAULT_LANGUAGE).toBe('Dutch');
    });

    it('should return a frozen value', () => {
      const config = createConfiguration({ model: 'gpt-4o-mini' });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should accept the temperature bounds', () => {
      expect(createConfiguration({ temperature: 0 }).temperature).toBe(0);
      expect(createConfiguration({ temperature: 2 }).temperature).toBe(2);
    });

    it('should reject temperatures outside 0.0-2.0', () => {
      expect(() => createConfiguration({ temperature: 2.5 })).toThrow(
        'Invalid temperature: 2.5. Must be between 0.0 and 2.0'
      );
      expect(() => createConfiguration({ temperature: -0.1 })).toThrow('Invalid temperature');
      expect(() => createConfiguration({ temperature: NaN })).toThrow('Invalid temperature');
    });

    it('should reject a non-positive timeout', () => {
      expect(() => createConfiguration({ timeoutMs: 0 })).toThrow('Invalid timeout: 0');
    });

    it('should accept any model name for a local endpoint', () => {
      const config = createConfiguration({ model: 'mistral-7b-instruct-q4', baseUrl: 'http://localhost:1234/v1' });
      expect(config.model).toBe('mistral-7b-instruct-q4');
      expect(config.baseUrl).toBe('http://localhost:1234/v1');
      expect(config.apiKey).toBeUndefined();
    });
  });

  describe('hostedProviderFor', () => {
    it('should route by model prefix', () => {
      expect(hostedProviderFor('claude-3-5-sonnet-latest')).toBe('claude');
      expect(hostedProviderFor('Gemini-1.5-pro')).toBe('gemini');
      expect(hostedProviderFor('gpt-4o')).toBe('openai');
      expect(hostedProviderFor('o1-mini')).toBe('openai');
    });

    it('should name the matching key variable', () => {
      expect(apiKeyVariableFor('claude-3-haiku')).toBe('ANTHROPIC_API_KEY');
      expect(apiKeyVariableFor('gemini-1.5-flash')).toBe('GEMINI_API_KEY');
      expect(apiKeyVariableFor('gpt-4o')).toBe('OPENAI_API_KEY');
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should read every recognised variable', () => {
      const config = loadConfigFromEnv({
        POLITICAL_ANALYSIS_MODEL: 'llama3',
        POLITICAL_ANALYSIS_TEMPERATURE: '0.7',
        POLITICAL_ANALYSIS_LANGUAGE: 'English',
        POLITICAL_ANALYSIS_BASE_URL: 'http://localhost:11434/v1',
        POLITICAL_ANALYSIS_TIMEOUT_MS: '5000',
        POLITICAL_ANALYSIS_API_KEY: 'test-secret'
      });

      expect(config).toEqual({
        model: 'llama3',
        apiKey: 'test-secret',
        language: 'English',
        temperature: 0.7,
        baseUrl: 'http://localhost:11434/v1',
        timeoutMs: 5000
      });
    });

    it('should fall back to the provider key for the model', () => {
      const config = loadConfigFromEnv({
        POLITICAL_ANALYSIS_MODEL: 'claude-3-5-sonnet-latest',
        ANTHROPIC_API_KEY: 'test-anthropic',
        OPENAI_API_KEY: 'test-openai'
      });
      expect(config.apiKey).toBe('test-anthropic');
    });

    it('should let explicit overrides win', () => {
      const config = loadConfigFromEnv(
        { POLITICAL_ANALYSIS_LANGUAGE: 'English', POLITICAL_ANALYSIS_TEMPERATURE: '0.7' },
        { language: 'German', temperature: 0.2 }
      );
      expect(config.language).toBe('German');
      expect(config.temperature).toBe(0.2);
    });

    it('should use defaults for an empty environment', () => {
      expect(loadConfigFromEnv({})).toEqual(createConfiguration());
    });

    it('should reject a non-numeric temperature', () => {
      expect(() => loadConfigFromEnv({ POLITICAL_ANALYSIS_TEMPERATURE: 'warm' })).toThrow(
        'Invalid POLITICAL_ANALYSIS_TEMPERATURE: warm. Must be a number'
      );
    });
  });
});
