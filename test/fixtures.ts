import { vi } from 'vitest';
import { AnalysisConfiguration } from '../src/types';
import { LLMBackend } from '../src/providers/base';

export const validPayload = {
  questions: [
    { text: 'Why did you vote against the budget?', category: 'critical', rationale: 'Challenges a decision' },
    { text: 'Can you tell us more about your plan?', category: 'confirming' },
    { text: 'What time does the debate start?', category: 'neutral' }
  ],
  biased_language: [
    { term: 'reckless', context: 'the reckless Finance Minister', direction: 'unfavorable', entity: 'Finance Minister' },
    { term: 'so-called reform', context: 'this so-called reform', direction: 'loaded', entity: null }
  ],
  entity_sentiments: [
    { entity: 'Prime Minister', score: 0.5, evidence: ['a steady hand'] },
    { entity: 'prime minister', score: '-0.1', evidence: ['missed the deadline'] },
    { entity: 'Green Party', score: 1.5, evidence: [] }
  ],
  summary: 'Mostly critical questioning.'
};

export const validResponse = JSON.stringify(validPayload);

/**
 * Backend that replays queued responses; an Error entry is thrown instead.
 * The last entry repeats once the queue is exhausted.
 */
export class StubBackend implements LLMBackend {
  readonly prompts: string[] = [];

  constructor(private readonly responses: Array<string | Error>) {}

  getName(): string {
    return 'Stub';
  }

  async send(prompt: string, _config: AnalysisConfiguration): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length - 1, this.responses.length - 1);
    const next = this.responses[index];
    if (next instanceof Error) throw next;
    return next;
  }
}

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
