export type QuestionCategory = 'critical' | 'confirming' | 'neutral';

export type BiasDirection = 'favorable' | 'unfavorable' | 'loaded';

export const QUESTION_CATEGORIES: readonly QuestionCategory[] = ['critical', 'confirming', 'neutral'];

export const BIAS_DIRECTIONS: readonly BiasDirection[] = ['favorable', 'unfavorable', 'loaded'];

export interface AnalysisConfiguration {
  readonly model: string;
  readonly apiKey?: string;
  readonly language: string;
  readonly temperature: number;
  readonly baseUrl?: string;
  readonly timeoutMs: number;
}

export interface QuestionRecord {
  text: string;
  category: QuestionCategory;
  rationale?: string;
  confidence?: number;
}

export interface BiasedLanguageFinding {
  term: string;
  context: string;
  direction: BiasDirection;
  entity: string | null;
  confidence?: number;
}

export interface EntitySentiment {
  entity: string;
  /** person, party, organization... as reported by the model */
  entity_type?: string;
  score: number;
  evidence: string[];
  rationale?: string;
  confidence?: number;
}

export interface AnalysisMetadata {
  model: string;
  language: string;
  temperature: number;
  backend: string;
  source: string;
  attempts: number;
  analyzed_at: string;
}

export interface AnalysisResult {
  questions: readonly QuestionRecord[];
  total_questions: number;
  critical_questions: number;
  confirming_questions: number;
  biased_language: readonly BiasedLanguageFinding[];
  entity_sentiments: readonly EntitySentiment[];
  summary: string;
  dropped_records: number;
  truncated: boolean;
  warnings: readonly string[];
  metadata: AnalysisMetadata;
}

/**
 * Validated fields as they leave the response parser, before entity
 * merging and counting.
 */
export interface ParsedResponse {
  questions: QuestionRecord[];
  findings: BiasedLanguageFinding[];
  sentiments: EntitySentiment[];
  summary: string;
}

export interface DroppedRecord {
  section: 'questions' | 'biased_language' | 'entity_sentiments';
  index: number;
  reason: string;
}

export type ParseOutcome =
  | { status: 'complete'; response: ParsedResponse; warnings: string[] }
  | { status: 'partial'; response: ParsedResponse; warnings: string[]; dropped: DroppedRecord[]; truncated: boolean }
  | { status: 'malformed'; reason: string };
