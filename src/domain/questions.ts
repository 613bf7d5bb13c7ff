/**
 * Canonical question type definitions.
 *
 * Questions are owned by the external repository and referenced read-only by
 * the engine. This file defines types and small helpers only.
 */

// ============================================================================
// Difficulty
// ============================================================================

/**
 * DifficultyTier: Categorical bucket, distinct from the numeric rating.
 *
 * Ordered from easiest to hardest; `boss` is only ever served when the
 * progression policy forces it.
 */
export type DifficultyTier = 'easy' | 'medium' | 'hard' | 'boss';

export const DIFFICULTY_TIERS: readonly DifficultyTier[] = ['easy', 'medium', 'hard', 'boss'];

/**
 * Tiers the regular ladder moves within (boss excluded).
 */
export const LADDER_TIERS: readonly DifficultyTier[] = ['easy', 'medium', 'hard'];

export function isDifficultyTier(value: unknown): value is DifficultyTier {
  return typeof value === 'string' && DIFFICULTY_TIERS.some((tier) => tier === value);
}

// ============================================================================
// Question
// ============================================================================

export type QuestionId = string;

export interface Question {
  readonly id: QuestionId;
  readonly title: string;
  readonly mastery: string;
  readonly difficultyLevel: DifficultyTier;
  /** Finer-grained numeric difficulty; primary sort key */
  readonly difficultyRating: number;
  readonly questionText: string;
  /** Description of a correct answer; never sent to the client */
  readonly expectedOutcome: string;
}

/**
 * SanitizedQuestion: What the player is allowed to see.
 */
export type SanitizedQuestion = Omit<Question, 'expectedOutcome'>;

export function sanitizeQuestion(question: Question): SanitizedQuestion {
  return {
    id: question.id,
    title: question.title,
    mastery: question.mastery,
    difficultyLevel: question.difficultyLevel,
    difficultyRating: question.difficultyRating,
    questionText: question.questionText,
  };
}

/**
 * Stable ordering used for offset-based pagination: rating, then id.
 */
export function compareQuestions(a: Question, b: Question): number {
  if (a.difficultyRating !== b.difficultyRating) {
    return a.difficultyRating - b.difficultyRating;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// ============================================================================
// Repository Contract
// ============================================================================

/**
 * QuestionFilter: Equality and range filters a repository must support.
 */
export interface QuestionFilter {
  mastery?: string;
  difficultyTier?: DifficultyTier;
  /** Any of these tiers; combined with difficultyTier when both are set */
  difficultyTiers?: readonly DifficultyTier[];
  difficultyRatingRange?: { min?: number; max?: number };
  excludeIds?: readonly QuestionId[];
}

export interface PageOptions {
  offset: number;
  limit: number;
}

/**
 * QuestionRepository: External lookup collaborator.
 *
 * `find` results are ordered by (difficultyRating asc, id asc) so offsets
 * behave deterministically. Implementations may reject (network, storage);
 * the engine lets such rejections surface as internal errors.
 */
export interface QuestionRepository {
  find(filter: QuestionFilter, page: PageOptions): Promise<Question[]>;
  findById(id: QuestionId): Promise<Question | undefined>;
  countByMastery(mastery: string): Promise<number>;
  listMasteries(): Promise<string[]>;
}

/**
 * Applies a filter to an in-memory question; shared by in-process repositories.
 */
export function matchesFilter(question: Question, filter: QuestionFilter): boolean {
  if (filter.mastery !== undefined && question.mastery !== filter.mastery) {
    return false;
  }
  if (filter.difficultyTier !== undefined && question.difficultyLevel !== filter.difficultyTier) {
    return false;
  }
  if (filter.difficultyTiers !== undefined && !filter.difficultyTiers.includes(question.difficultyLevel)) {
    return false;
  }
  if (filter.excludeIds?.includes(question.id)) {
    return false;
  }
  const range = filter.difficultyRatingRange;
  if (range?.min !== undefined && question.difficultyRating < range.min) {
    return false;
  }
  if (range?.max !== undefined && question.difficultyRating > range.max) {
    return false;
  }
  return true;
}
