import { writeFile } from 'fs/promises';
import { AnalysisResult } from './types';
import { ConfigurationOptions, KNOWN_LANGUAGES, KNOWN_MODELS, loadConfigFromEnv } from './config';
import { PoliticalDiscourseAnalyzer } from './analyzer';

export type CliCommand =
  | { command: 'analyze-file'; target: string }
  | { command: 'analyze-text'; target: string }
  | { command: 'list-models' }
  | { command: 'list-languages' }
  | { command: 'help' };

export interface CliArgs {
  command: CliCommand;
  overrides: ConfigurationOptions;
  output?: string;
  verbose: boolean;
}

export const USAGE = `Usage:
  political-analysis analyze-file <path> [options]
  political-analysis analyze-text "<text>" [options]
  political-analysis list-models
  political-analysis list-languages

Options:
  --model, -m <name>         Model identifier (POLITICAL_ANALYSIS_MODEL)
  --language, -l <name>      Language for the analysis (POLITICAL_ANALYSIS_LANGUAGE)
  --temperature, -t <value>  Sampling temperature 0.0-2.0 (POLITICAL_ANALYSIS_TEMPERATURE)
  --base-url <url>           Local OpenAI-compatible endpoint (POLITICAL_ANALYSIS_BASE_URL)
  --output, -o <file>        Write the result as JSON
  --verbose, -v              Print the full JSON result`;

const VALUE_FLAGS = ['--model', '-m', '--language', '-l', '--temperature', '-t', '--base-url', '--output', '-o'];

function optionValue(argv: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = argv.indexOf(flag);
    if (idx !== -1) {
      const value = argv[idx + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`Missing value for ${flag}`);
      }
      return value;
    }
  }
  return undefined;
}

// Arguments that are neither flags nor the value of a flag
function positionals(argv: string[]): string[] {
  const found: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.includes(arg)) {
      i += 1;
    } else if (!arg.startsWith('-')) {
      found.push(arg);
    }
  }
  return found;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const temperature = optionValue(argv, '--temperature', '-t');
  const overrides: ConfigurationOptions = {
    model: optionValue(argv, '--model', '-m'),
    language: optionValue(argv, '--language', '-l'),
    baseUrl: optionValue(argv, '--base-url'),
    temperature: temperature !== undefined ? parseFloat(temperature) : undefined
  };
  const output = optionValue(argv, '--output', '-o');
  const verbose = argv.includes('--verbose') || argv.includes('-v');

  const [name, target] = positionals(argv);
  let command: CliCommand = { command: 'help' };
  if ((name === 'analyze-file' || name === 'analyze-text') && target !== undefined) {
    command = { command: name, target };
  } else if (name === 'list-models' || name === 'list-languages') {
    command = { command: name };
  }

  return { command, overrides, output, verbose };
}

export function formatModelList(): string {
  const lines = ['Supported LLM models:'];
  for (const models of Object.values(KNOWN_MODELS)) {
    lines.push(...models.map(model => `  - ${model}`));
  }
  lines.push('Any model served by a local endpoint (--base-url) is accepted as well.');
  return lines.join('\n');
}

export function formatLanguageList(): string {
  return ['Supported languages:', ...KNOWN_LANGUAGES.map(language => `  - ${language}`)].join('\n');
}

export function formatResult(result: AnalysisResult): string {
  const lines = [
    'Analysis completed successfully!',
    `Total questions: ${result.total_questions}`,
    `Critical questions: ${result.critical_questions}`,
    `Confirming questions: ${result.confirming_questions}`,
    `Biased language found: ${result.biased_language.length}`,
    `Entities analyzed: ${result.entity_sentiments.length}`
  ];
  if (result.dropped_records > 0) {
    lines.push(`Dropped records: ${result.dropped_records}`);
  }
  if (result.truncated) {
    lines.push('Response was truncated: some findings may be missing');
  }
  lines.push('', 'Summary:', result.summary);
  return lines.join('\n');
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const args = parseCliArgs(argv);
  const { command } = args;

  if (command.command === 'help') {
    console.log(USAGE);
    return;
  }
  if (command.command === 'list-models') {
    console.log(formatModelList());
    return;
  }
  if (command.command === 'list-languages') {
    console.log(formatLanguageList());
    return;
  }

  const analyzer = new PoliticalDiscourseAnalyzer(loadConfigFromEnv(env, args.overrides));
  const result = command.command === 'analyze-file'
    ? await analyzer.analyzeSource(command.target)
    : await analyzer.analyzeText(command.target);

  console.log(args.verbose ? JSON.stringify(result, null, 2) : formatResult(result));

  if (args.output) {
    await writeFile(args.output, JSON.stringify(result, null, 2), 'utf-8');
    console.log(`Results saved to: ${args.output}`);
  }
}
