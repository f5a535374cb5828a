import { describe, it, expect, vi, afterEach } from 'vitest';
import { USAGE, formatModelList, formatResult, parseCliArgs, runCli } from '../src/cli';
import { aggregateResult } from '../src/aggregator';

describe('CLI', () => {
  describe('parseCliArgs', () => {
    it('should parse analyze-file with options', () => {
      const args = parseCliArgs([
        'analyze-file', 'interview.txt',
        '--model', 'llama3',
        '-l', 'English',
        '--temperature', '0.4',
        '--base-url', 'http://localhost:1234/v1',
        '-o', 'out.json',
        '--verbose'
      ]);

      expect(args).toEqual({
        command: { command: 'analyze-file', target: 'interview.txt' },
        overrides: {
          model: 'llama3',
          language: 'English',
          baseUrl: 'http://localhost:1234/v1',
          temperature: 0.4
        },
        output: 'out.json',
        verbose: true
      });
    });

    it('should parse analyze-text', () => {
      const args = parseCliArgs(['analyze-text', 'Minister, is that true?']);
      expect(args.command).toEqual({ command: 'analyze-text', target: 'Minister, is that true?' });
      expect(args.verbose).toBe(false);
      expect(args.output).toBeUndefined();
    });

    it('should accept options before the target', () => {
      const args = parseCliArgs(['analyze-file', '--model', 'llama3', 'talk.txt']);
      expect(args.command).toEqual({ command: 'analyze-file', target: 'talk.txt' });
      expect(args.overrides.model).toBe('llama3');
    });

    it('should accept options before the command', () => {
      const args = parseCliArgs(['-v', '-l', 'German', 'analyze-text', 'Is it?']);
      expect(args.command).toEqual({ command: 'analyze-text', target: 'Is it?' });
      expect(args.overrides.language).toBe('German');
      expect(args.verbose).toBe(true);
    });

    it('should parse the list commands', () => {
      expect(parseCliArgs(['list-models']).command).toEqual({ command: 'list-models' });
      expect(parseCliArgs(['list-languages']).command).toEqual({ command: 'list-languages' });
    });

    it('should fall back to help without a target', () => {
      expect(parseCliArgs(['analyze-file']).command).toEqual({ command: 'help' });
      expect(parseCliArgs([]).command).toEqual({ command: 'help' });
    });

    it('should reject an option without a value', () => {
      expect(() => parseCliArgs(['analyze-text', 'x', '--model'])).toThrow('Missing value for --model');
    });
  });

  describe('formatResult', () => {
    it('should print counts and the summary', () => {
      const result = aggregateResult(
        {
          questions: [{ text: 'Why?', category: 'critical' }, { text: 'More?', category: 'confirming' }],
          findings: [],
          sentiments: [{ entity: 'senate', score: 0, evidence: [] }],
          summary: 'Balanced interview.'
        },
        {
          droppedRecords: 1,
          warnings: [],
          metadata: {
            model: 'gpt-4o',
            language: 'English',
            temperature: 0.1,
            backend: 'OpenAI',
            source: 'direct_text_input',
            attempts: 1,
            analyzed_at: '2026-01-01T00:00:00.000Z'
          }
        }
      );

      expect(formatResult(result)).toBe([
        'Analysis completed successfully!',
        'Total questions: 2',
        'Critical questions: 1',
        'Confirming questions: 1',
        'Biased language found: 0',
        'Entities analyzed: 1',
        'Dropped records: 1',
        '',
        'Summary:',
        'Balanced interview.'
      ].join('\n'));
    });
  });

  describe('formatResult when truncated', () => {
    it('should say the response was truncated', () => {
      const result = aggregateResult(
        { questions: [], findings: [], sentiments: [], summary: '' },
        {
          droppedRecords: 0,
          truncated: true,
          warnings: [],
          metadata: {
            model: 'gpt-4o',
            language: 'English',
            temperature: 0.1,
            backend: 'OpenAI',
            source: 'direct_text_input',
            attempts: 1,
            analyzed_at: '2026-01-01T00:00:00.000Z'
          }
        }
      );

      expect(formatResult(result).split('\n')).toContain('Response was truncated: some findings may be missing');
    });
  });

  describe('list output', () => {
    it('should list the known models', () => {
      expect(formatModelList().split('\n')).toEqual([
        'Supported LLM models:',
        '  - gpt-4o',
        '  - gpt-4o-mini',
        '  - gpt-4-turbo',
        '  - claude-3-5-sonnet-latest',
        '  - claude-3-5-haiku-latest',
        '  - gemini-1.5-pro',
        '  - gemini-1.5-flash',
        'Any model served by a local endpoint (--base-url) is accepted as well.'
      ]);
    });
  });

  describe('runCli', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should print usage for an unknown command', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      await runCli(['--help'], {});
      expect(log).toHaveBeenCalledWith(USAGE);
    });

    it('should print the known languages', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      await runCli(['list-languages'], {});
      expect(log).toHaveBeenCalledWith(
        'Supported languages:\n  - Dutch\n  - English\n  - German\n  - French\n  - Spanish\n  - Italian'
      );
    });
  });
});
