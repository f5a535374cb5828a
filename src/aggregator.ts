import {
  AnalysisMetadata,
  AnalysisResult,
  EntitySentiment,
  ParsedResponse,
  QuestionRecord
} from './types';

export interface AggregationContext {
  metadata: AnalysisMetadata;
  droppedRecords: number;
  warnings: string[];
  truncated?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function countCategory(questions: QuestionRecord[], category: QuestionRecord['category']): number {
  return questions.filter(q => q.category === category).length;
}

/**
 * Merge entries that share a normalized entity name: mean score, evidence
 * concatenated in first-seen order. Output keeps first-seen entity order.
 * Entity type and rationale come from the first entry that has one;
 * confidence is the mean over the entries that report it.
 */
export function mergeEntitySentiments(sentiments: EntitySentiment[]): EntitySentiment[] {
  const groups = new Map<string, { entries: EntitySentiment[]; evidence: string[] }>();

  for (const sentiment of sentiments) {
    const group = groups.get(sentiment.entity);
    if (group) {
      group.entries.push(sentiment);
      group.evidence.push(...sentiment.evidence);
    } else {
      groups.set(sentiment.entity, { entries: [sentiment], evidence: [...sentiment.evidence] });
    }
  }

  return Array.from(groups, ([entity, { entries, evidence }]) => {
    const merged: EntitySentiment = { entity, score: mean(entries.map(e => e.score)), evidence };

    const entityType = entries.find(e => e.entity_type)?.entity_type;
    if (entityType) merged.entity_type = entityType;
    const rationale = entries.find(e => e.rationale)?.rationale;
    if (rationale) merged.rationale = rationale;

    const confidences = entries.flatMap(e => (e.confidence === undefined ? [] : [e.confidence]));
    if (confidences.length > 0) merged.confidence = mean(confidences);

    return merged;
  });
}

export function aggregateResult(parsed: ParsedResponse, context: AggregationContext): AnalysisResult {
  const questions = parsed.questions.map(q => ({ ...q }));

  const total = questions.length;
  const critical = countCategory(questions, 'critical');
  const confirming = countCategory(questions, 'confirming');
  const neutral = countCategory(questions, 'neutral');

  if (total !== critical + confirming + neutral) {
    throw new Error(
      `Question counts do not reconcile: ${total} total vs ${critical} critical + ${confirming} confirming + ${neutral} neutral`
    );
  }

  const result: AnalysisResult = {
    questions,
    total_questions: total,
    critical_questions: critical,
    confirming_questions: confirming,
    biased_language: parsed.findings.map(f => ({ ...f })),
    entity_sentiments: mergeEntitySentiments(parsed.sentiments),
    summary: parsed.summary,
    dropped_records: context.droppedRecords,
    truncated: context.truncated ?? false,
    warnings: [...context.warnings],
    metadata: { ...context.metadata }
  };

  return deepFreeze(result);
}
