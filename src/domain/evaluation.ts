/**
 * Answer evaluation: decides whether a submitted answer is correct.
 *
 * Primary path asks the external judgment service and parses its reply in
 * stages. When the service is unavailable, a deterministic local heuristic
 * takes over. Nothing here touches SessionState and nothing here throws.
 */

import type { Question } from './questions.js';
import { buildJudgmentPrompt } from './prompts.js';
import { callGenerator, stripCodeFences, DEFAULT_TIMEOUT_MS } from './text-generation.js';
import type { TextGenerator } from './text-generation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * EvaluationSource: How the verdict was obtained.
 *
 * - judge: the service replied with well-formed JSON
 * - recovered: the reply was malformed and salvaged by staged parsing
 * - heuristic: the service was unavailable; local rules decided
 */
export type EvaluationSource = 'judge' | 'recovered' | 'heuristic';

export interface EvaluationResult {
  isCorrect: boolean;
  /** In [0, 100] */
  score: number;
  feedback: string;
  source: EvaluationSource;
}

export const DEFAULT_CORRECT_SCORE = 75;
export const DEFAULT_INCORRECT_SCORE = 25;

const DEFAULT_FEEDBACK = 'Evaluation completed';

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

function defaultScore(isCorrect: boolean): number {
  return isCorrect ? DEFAULT_CORRECT_SCORE : DEFAULT_INCORRECT_SCORE;
}

// ============================================================================
// Staged Reply Parsing
// ============================================================================

export type ParseStage = 'strict' | 'extracted' | 'keywords';

export interface ParsedJudgment {
  isCorrect: boolean;
  score: number;
  feedback: string;
  stage: ParseStage;
}

function readBoolean(value: unknown): boolean {
  return value === true || value === 'true';
}

function readScore(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function fromJudgmentObject(
  value: unknown,
  stage: ParseStage
): ParsedJudgment | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const isCorrect = readBoolean(record.is_correct ?? record.isCorrect);
  const score = readScore(record.score);
  const feedback = typeof record.feedback === 'string' && record.feedback.trim() !== ''
    ? record.feedback.trim()
    : DEFAULT_FEEDBACK;

  return {
    isCorrect,
    score: clampScore(score ?? defaultScore(isCorrect)),
    feedback,
    stage,
  };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const NEGATIVE_VERDICT = /\bincorrect\b|\bnot correct\b|\bfalse\b/;
const POSITIVE_VERDICT = /\bcorrect\b|\btrue\b/;
const SCORE_PATTERN = /"?score"?\s*[:=]\s*(\d+(?:\.\d+)?)/;

/**
 * Parses a judgment reply in stages; always yields a verdict.
 *
 * 1. strict: the whole reply (fences stripped) is a JSON object
 * 2. extracted: the text between the first `{` and the last `}` is
 * 3. keywords: "correct"/"true" tokens (negations win) and a `score: N` match
 */
export function parseJudgment(reply: string): ParsedJudgment {
  const cleaned = stripCodeFences(reply);

  const strict = fromJudgmentObject(tryParseJson(cleaned), 'strict');
  if (strict) {
    return strict;
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const extracted = fromJudgmentObject(tryParseJson(cleaned.slice(start, end + 1)), 'extracted');
    if (extracted) {
      return extracted;
    }
  }

  const lower = cleaned.toLowerCase();
  const isCorrect = POSITIVE_VERDICT.test(lower) && !NEGATIVE_VERDICT.test(lower);
  const scoreMatch = SCORE_PATTERN.exec(lower);
  const score = scoreMatch ? Number(scoreMatch[1]) : defaultScore(isCorrect);

  return {
    isCorrect,
    score: clampScore(score),
    feedback: 'Solution evaluated',
    stage: 'keywords',
  };
}

// ============================================================================
// Local Heuristic
// ============================================================================

const MIN_ANSWER_LENGTH = 5;
const SUBSTANTIAL_ANSWER_LENGTH = 20;

// `=` not part of `==`, `!=`, `<=`, `>=`
const ASSIGNMENT = /(^|[^=!<>])=(?!=)/;
const CONTROL_FLOW = /\b(def|class|if|for|while|return|import|function|const|let)\b/;
const COLLECTION_TOKEN = /\[|\bappend\b|\bpush\b/;
const COLLECTION_QUESTION = /\b(list|array)s?\b/i;

/**
 * Deterministic fallback used when the judgment service is unavailable.
 *
 * An answer counts as correct when it has an assignment and either a
 * control-flow keyword or enough substance. Questions about lists or arrays
 * accept collection indexing in place of a keyword, but not length alone.
 */
export function heuristicEvaluate(answer: string, question: Question): EvaluationResult {
  const code = answer.trim();
  let isCorrect = false;

  if (code.length >= MIN_ANSWER_LENGTH) {
    const hasAssignment = ASSIGNMENT.test(code);
    const hasKeyword = CONTROL_FLOW.test(code);

    if (COLLECTION_QUESTION.test(question.questionText)) {
      isCorrect = hasAssignment && (hasKeyword || COLLECTION_TOKEN.test(code));
    } else {
      isCorrect = hasAssignment && (hasKeyword || code.length > SUBSTANTIAL_ANSWER_LENGTH);
    }
  }

  return {
    isCorrect,
    score: defaultScore(isCorrect),
    feedback: `Offline evaluation complete. ${isCorrect ? 'Solution appears functional.' : 'Solution needs revision.'}`,
    source: 'heuristic',
  };
}

// ============================================================================
// Evaluator
// ============================================================================

/**
 * Evaluates an answer against a question.
 *
 * The returned promise always resolves: service failures route to the
 * heuristic, malformed replies are salvaged and logged.
 */
export async function evaluateAnswer(
  answer: string,
  question: Question,
  generator: TextGenerator | null,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<EvaluationResult> {
  const reply = await callGenerator(generator, buildJudgmentPrompt(question, answer), timeoutMs);

  if (!reply.ok) {
    console.warn(
      `Judgment service unavailable (${reply.error.reason}) for question ${question.id}; using local heuristic`
    );
    return heuristicEvaluate(answer, question);
  }

  const parsed = parseJudgment(reply.value);
  if (parsed.stage !== 'strict') {
    console.warn(`Malformed judgment reply for question ${question.id}; recovered via ${parsed.stage} stage`);
  }

  return {
    isCorrect: parsed.isCorrect,
    score: parsed.score,
    feedback: parsed.feedback,
    source: parsed.stage === 'strict' ? 'judge' : 'recovered',
  };
}
