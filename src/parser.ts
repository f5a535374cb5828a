import { z } from 'zod';
import {
  BiasDirection,
  BiasedLanguageFinding,
  DroppedRecord,
  EntitySentiment,
  ParseOutcome,
  QUESTION_CATEGORIES,
  QuestionCategory,
  QuestionRecord
} from './types';

type Section = DroppedRecord['section'];

// Canonical field -> accepted spellings, compared after canonicalKey()
const TOP_LEVEL_KEYS = {
  questions: ['questions', 'questionanalysis'],
  biased_language: ['biasedlanguage', 'biasedadjectives', 'bias', 'biasfindings'],
  entity_sentiments: ['entitysentiments', 'sentiments', 'entities'],
  summary: ['summary']
};

const QUESTION_KEYS = {
  text: ['text', 'question', 'questiontext'],
  category: ['category', 'type', 'questiontype'],
  rationale: ['rationale', 'reasoning', 'reason'],
  confidence: ['confidence']
};

const FINDING_KEYS = {
  term: ['term', 'phrase', 'adjective', 'word'],
  context: ['context'],
  direction: ['direction', 'biastype', 'type'],
  entity: ['entity', 'targetentity', 'targetperson', 'target'],
  confidence: ['confidence']
};

const SENTIMENT_KEYS = {
  entity: ['entity', 'entityname', 'name'],
  entity_type: ['entitytype', 'kind'],
  score: ['score', 'sentimentscore', 'sentiment'],
  evidence: ['evidence', 'supportingquotes', 'quotes'],
  rationale: ['rationale', 'reasoning', 'reason'],
  confidence: ['confidence']
};

// Keyed by canonicalKey() of the model's value
const CATEGORY_VALUES = new Map<string, QuestionCategory>([
  ...QUESTION_CATEGORIES.map((category): [string, QuestionCategory] => [category, category]),
  ['followup', 'neutral']
]);

const DIRECTION_VALUES = new Map<string, BiasDirection>([
  ['favorable', 'favorable'],
  ['favourable', 'favorable'],
  ['positive', 'favorable'],
  ['unfavorable', 'unfavorable'],
  ['unfavourable', 'unfavorable'],
  ['negative', 'unfavorable'],
  ['loaded', 'loaded']
]);

const optionalText = z.string().trim().nullish().transform(value => value || undefined);

const numberSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform(value => Number(value))
  .pipe(z.number().finite());

const questionSchema = z.object({
  text: z.string().trim().min(1),
  category: z.unknown(),
  rationale: optionalText,
  confidence: z.unknown()
});

const findingSchema = z.object({
  term: z.string().trim().min(1),
  context: optionalText,
  direction: z.string(),
  entity: z.string().nullish(),
  confidence: z.unknown()
});

const sentimentSchema = z.object({
  entity: z.string().trim().min(1),
  entity_type: optionalText,
  score: numberSchema,
  evidence: z.union([z.string(), z.array(z.unknown())]).nullish(),
  rationale: optionalText,
  confidence: z.unknown()
});

/**
 * Canonical form of an entity name, used as the merge key. Idempotent.
 */
export function normalizeEntityName(name: string): string {
  return name.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function clampScore(score: number): number {
  return Math.max(-1.0, Math.min(1.0, score));
}

function canonicalKey(key: string): string {
  return key.toLowerCase().replace(/[\s_-]/g, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickFields(value: unknown, aliases: Record<string, string[]>): unknown {
  if (!isRecord(value)) return value;

  const byCanonical = new Map<string, unknown>();
  for (const [key, fieldValue] of Object.entries(value)) {
    const canonical = canonicalKey(key);
    if (!byCanonical.has(canonical)) byCanonical.set(canonical, fieldValue);
  }

  const picked: Record<string, unknown> = {};
  for (const [field, accepted] of Object.entries(aliases)) {
    const match = accepted.find(alias => byCanonical.has(alias));
    if (match !== undefined) picked[field] = byCanonical.get(match);
  }
  return picked;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    .join('; ');
}

type TopLevelField = keyof typeof TOP_LEVEL_KEYS;

const TOP_LEVEL_FIELDS: TopLevelField[] = ['questions', 'biased_language', 'entity_sentiments', 'summary'];

function topLevelField(key: string): TopLevelField | undefined {
  const canonical = canonicalKey(key);
  return TOP_LEVEL_FIELDS.find(field => TOP_LEVEL_KEYS[field].includes(canonical));
}

function hasKnownSection(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && Object.keys(value).some(key => topLevelField(key) !== undefined);
}

interface JSONCandidate {
  text: string;
  closed: boolean;
}

// Index of the brace closing the object opened at `start`, or -1
function closingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Every top-level `{...}` span in the text, in order. Braces inside JSON
 * strings are not counted. A span still open at the end of the text is
 * kept with `closed: false` and the scan resumes after its opening brace,
 * so a stray brace in prose does not swallow the block that follows.
 */
function scanObjects(text: string): JSONCandidate[] {
  const candidates: JSONCandidate[] = [];
  let start = text.indexOf('{');

  while (start !== -1) {
    const end = closingBrace(text, start);
    if (end === -1) {
      candidates.push({ text: text.substring(start), closed: false });
      start = text.indexOf('{', start + 1);
    } else {
      candidates.push({ text: text.substring(start, end + 1), closed: true });
      start = text.indexOf('{', end + 1);
    }
  }
  return candidates;
}

function scanCandidates(text: string): JSONCandidate[] {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  const sources = fenced && fenced[1].includes('{') ? [fenced[1], text] : [text];
  return sources.flatMap(source => scanObjects(source));
}

function openContainers(json: string): { stack: string[]; inString: boolean } {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of json) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{' || char === '[') {
      stack.push(char);
    } else if ((char === '}' && stack[stack.length - 1] === '{') || (char === ']' && stack[stack.length - 1] === '[')) {
      stack.pop();
    }
  }
  return { stack, inString };
}

// First match wins: key with partial value, bare key, trailing comma
const DANGLING_TAILS: Array<[RegExp, string]> = [
  [/,\s*"[^"]*"\s*:\s*[^,\]}]*$/, ''],
  [/\{\s*"[^"]*"\s*:\s*[^,\]}]*$/, '{'],
  [/,\s*"[^"]*"\s*$/, ''],
  [/\{\s*"[^"]*"\s*$/, '{'],
  [/,\s*$/, '']
];

/**
 * Close strings, objects and arrays left open by a truncated response and
 * drop a dangling key or trailing comma.
 */
export function repairTruncatedJSON(json: string): string {
  let repaired = json.trim();
  const { stack, inString } = openContainers(repaired);

  if (inString) repaired += '"';

  const dangling = DANGLING_TAILS.find(([pattern]) => pattern.test(repaired));
  if (dangling) repaired = repaired.replace(dangling[0], dangling[1]);

  while (stack.length > 0) {
    repaired += stack.pop() === '{' ? '}' : ']';
  }
  return repaired;
}

function fixCommonMistakes(json: string): string {
  return json
    // "score": +0.5
    .replace(/:\s*\+(\d)/g, ': $1')
    // trailing commas
    .replace(/,\s*([\]}])/g, '$1');
}

function parseCandidate(candidate: JSONCandidate): { value: unknown } | { error: string } {
  const attempts = candidate.closed
    ? [candidate.text, fixCommonMistakes(candidate.text)]
    : [fixCommonMistakes(repairTruncatedJSON(candidate.text))];
  let lastError = '';
  for (const attempt of attempts) {
    try {
      return { value: JSON.parse(attempt) };
    } catch (e) {
      lastError = e instanceof Error ? e.message : String(e);
    }
  }
  return { error: lastError };
}

/**
 * Locate the JSON object in a model response: fenced block first, then the
 * first balanced object that parses, then the start of an unclosed one.
 * Returns null when there is no opening brace at all.
 */
export function extractJSON(text: string): string | null {
  const candidates = scanCandidates(text);
  const parsable = candidates.find(candidate => candidate.closed && 'value' in parseCandidate(candidate));
  return (parsable ?? candidates[0])?.text ?? null;
}

interface LocatedResponse {
  value: Record<string, unknown>;
  // set when the object was cut off and had to be closed by repair
  truncation?: { insideRecord: boolean };
}

function locateResponse(raw: string): LocatedResponse | { reason: string } {
  const candidates = scanCandidates(raw);
  if (candidates.length === 0) {
    return { reason: 'no JSON object found' };
  }

  // Complete objects win over a truncated one
  const ordered = [...candidates.filter(c => c.closed), ...candidates.filter(c => !c.closed)];
  let parseError = '';
  let parsedWithoutSections = false;

  for (const candidate of ordered) {
    const parsed = parseCandidate(candidate);
    if ('error' in parsed) {
      parseError = parseError || parsed.error;
      continue;
    }
    const value = parsed.value;
    if (!hasKnownSection(value)) {
      parsedWithoutSections = true;
      continue;
    }
    if (candidate.closed) {
      return { value };
    }
    const { stack } = openContainers(candidate.text.trim());
    // { questions: [ { ...  is a record cut mid-way
    return { value, truncation: { insideRecord: stack.length >= 3 && stack[1] === '[' } };
  }

  if (parsedWithoutSections) {
    return { reason: 'JSON object has none of the expected sections' };
  }
  return { reason: `invalid JSON: ${parseError}` };
}

interface SectionState {
  warnings: string[];
  dropped: DroppedRecord[];
  seen: number;
}

function dropRecord(state: SectionState, section: Section, index: number, reason: string): void {
  state.dropped.push({ section, index, reason });
  state.warnings.push(`${section}[${index}] dropped: ${reason}`);
}

function sectionItems(section: Section, value: unknown, state: SectionState): unknown[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;

  state.seen += 1;
  dropRecord(state, section, 0, 'section is not a list');
  return [];
}

function readConfidence(raw: unknown, label: string, state: SectionState): number | undefined {
  if (raw === undefined || raw === null || raw === '') return undefined;

  const parsed = numberSchema.safeParse(raw);
  if (!parsed.success) {
    state.warnings.push(`${label}: confidence ${JSON.stringify(raw)} ignored`);
    return undefined;
  }

  const confidence = Math.max(0, Math.min(1, parsed.data));
  if (confidence !== parsed.data) {
    state.warnings.push(`${label}: confidence ${parsed.data} clamped to ${confidence}`);
  }
  return confidence;
}

function parseQuestions(value: unknown, state: SectionState): QuestionRecord[] {
  const questions: QuestionRecord[] = [];

  sectionItems('questions', value, state).forEach((item, index) => {
    state.seen += 1;
    const parsed = questionSchema.safeParse(pickFields(item, QUESTION_KEYS));
    if (!parsed.success) {
      dropRecord(state, 'questions', index, describeIssues(parsed.error));
      return;
    }

    const { text, category: rawCategory, rationale } = parsed.data;
    let category = typeof rawCategory === 'string' ? CATEGORY_VALUES.get(canonicalKey(rawCategory.trim())) : undefined;
    if (!category) {
      state.warnings.push(`questions[${index}]: unknown category ${JSON.stringify(rawCategory ?? null)} coerced to neutral`);
      category = 'neutral';
    }

    const question: QuestionRecord = { text, category };
    if (rationale) question.rationale = rationale;
    const confidence = readConfidence(parsed.data.confidence, `questions[${index}]`, state);
    if (confidence !== undefined) question.confidence = confidence;
    questions.push(question);
  });

  return questions;
}

function parseFindings(value: unknown, state: SectionState): BiasedLanguageFinding[] {
  const findings: BiasedLanguageFinding[] = [];

  sectionItems('biased_language', value, state).forEach((item, index) => {
    state.seen += 1;
    const parsed = findingSchema.safeParse(pickFields(item, FINDING_KEYS));
    if (!parsed.success) {
      dropRecord(state, 'biased_language', index, describeIssues(parsed.error));
      return;
    }

    const { term, context, direction: rawDirection, entity } = parsed.data;
    const direction = DIRECTION_VALUES.get(rawDirection.trim().toLowerCase());
    if (!direction) {
      dropRecord(state, 'biased_language', index, `unknown direction ${JSON.stringify(rawDirection)}`);
      return;
    }

    const normalizedEntity = entity ? normalizeEntityName(entity) : '';
    const finding: BiasedLanguageFinding = {
      term,
      context: context ?? '',
      direction,
      entity: normalizedEntity === '' || normalizedEntity === 'null' ? null : normalizedEntity
    };
    const confidence = readConfidence(parsed.data.confidence, `biased_language[${index}]`, state);
    if (confidence !== undefined) finding.confidence = confidence;
    findings.push(finding);
  });

  return findings;
}

function parseSentiments(value: unknown, state: SectionState): EntitySentiment[] {
  const sentiments: EntitySentiment[] = [];

  sectionItems('entity_sentiments', value, state).forEach((item, index) => {
    state.seen += 1;
    const parsed = sentimentSchema.safeParse(pickFields(item, SENTIMENT_KEYS));
    if (!parsed.success) {
      dropRecord(state, 'entity_sentiments', index, describeIssues(parsed.error));
      return;
    }

    const { entity, entity_type: entityType, score: rawScore, evidence: rawEvidence, rationale } = parsed.data;
    const score = clampScore(rawScore);
    if (score !== rawScore) {
      state.warnings.push(`entity_sentiments[${index}]: score ${rawScore} clamped to ${score}`);
    }

    const evidenceList: unknown[] = typeof rawEvidence === 'string' ? [rawEvidence] : rawEvidence ?? [];
    const evidence = evidenceList
      .filter((span): span is string => typeof span === 'string')
      .map(span => span.trim())
      .filter(span => span.length > 0);

    const sentiment: EntitySentiment = { entity: normalizeEntityName(entity), score, evidence };
    if (entityType) sentiment.entity_type = entityType.toLowerCase();
    if (rationale) sentiment.rationale = rationale;
    const confidence = readConfidence(parsed.data.confidence, `entity_sentiments[${index}]`, state);
    if (confidence !== undefined) sentiment.confidence = confidence;
    sentiments.push(sentiment);
  });

  return sentiments;
}

// Takes the cut-off last record out of its section before validation
function removeCutRecord(
  located: LocatedResponse,
  top: Record<string, unknown>
): { section: Section; index: number } | undefined {
  if (!located.truncation?.insideRecord) return undefined;

  const keys = Object.keys(located.value);
  const field = keys.length > 0 ? topLevelField(keys[keys.length - 1]) : undefined;
  if (field === undefined || field === 'summary') return undefined;

  const items = top[field];
  if (!Array.isArray(items) || items.length === 0) return undefined;

  top[field] = items.slice(0, -1);
  return { section: field, index: items.length - 1 };
}

/**
 * Validation boundary between the model's free text and the typed result.
 * Nothing downstream re-checks what this returns.
 */
export function parseAnalysisResponse(raw: string): ParseOutcome {
  const located = locateResponse(raw);
  if ('reason' in located) {
    return { status: 'malformed', reason: located.reason };
  }

  const top = pickFields(located.value, TOP_LEVEL_KEYS);
  if (!isRecord(top) || Object.keys(top).length === 0) {
    return { status: 'malformed', reason: 'JSON object has none of the expected sections' };
  }

  const cut = removeCutRecord(located, top);
  const state: SectionState = { warnings: [], dropped: [], seen: 0 };
  const questions = parseQuestions(top.questions, state);
  const findings = parseFindings(top.biased_language, state);
  const sentiments = parseSentiments(top.entity_sentiments, state);

  if (cut) {
    state.seen += 1;
    dropRecord(state, cut.section, cut.index, 'cut off by truncated response');
  } else if (located.truncation) {
    state.warnings.push('response truncated; content after the last complete record is missing');
  }

  const kept = questions.length + findings.length + sentiments.length;
  if (state.seen > 0 && kept === 0) {
    return { status: 'malformed', reason: `all ${state.seen} records failed validation` };
  }

  let summary = '';
  if (typeof top.summary === 'string') {
    summary = top.summary.trim();
  } else {
    state.warnings.push('summary missing from response');
  }

  const response = { questions, findings, sentiments, summary };
  const truncated = located.truncation !== undefined;
  if (state.dropped.length > 0 || truncated) {
    return { status: 'partial', response, warnings: state.warnings, dropped: state.dropped, truncated };
  }
  return { status: 'complete', response, warnings: state.warnings };
}
