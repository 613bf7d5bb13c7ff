/**
 * Question selection: turns a (tier, mastery, cursor) decision into a
 * concrete repository lookup, widening the filter when nothing matches.
 *
 * Questions already served in the session are never picked again, and a
 * boss request only leaves the boss tier once no boss question is left.
 */

import type {
  DifficultyTier,
  Question,
  QuestionFilter,
  QuestionId,
  QuestionRepository,
} from './questions.js';
import { LADDER_TIERS } from './questions.js';

/**
 * SelectionStrategy:
 * - sequential: ordered by (rating, id), offset by the cursor; deterministic
 * - random: every matching row fetched, one picked with the injected random
 *   source; ignores the cursor and is only reproducible with a seeded source
 */
export type SelectionStrategy = 'sequential' | 'random';

export interface SelectionRequest {
  tier: DifficultyTier;
  mastery: string;
  cursor: number;
  /** Ids already served this session */
  exclude: readonly QuestionId[];
}

export interface SelectionOptions {
  strategy: SelectionStrategy;
  /** Returns a number in [0, 1) */
  random: () => number;
}

export interface Selection {
  question: Question;
  filter: QuestionFilter;
  widened: boolean;
}

/** Upper bound on rows fetched by the random strategy */
const RANDOM_POOL_LIMIT = 500;

/**
 * Filters tried in order.
 *
 * Ladder tier: exact, tier dropped (ladder tiers of the mastery), mastery
 * dropped. Boss: boss in the mastery, boss in any mastery, then the
 * mastery's ladder. Ladder requests never reach a boss row.
 */
export function wideningFilters(request: Pick<SelectionRequest, 'tier' | 'mastery'>): QuestionFilter[] {
  const { mastery, tier } = request;
  if (tier === 'boss') {
    return [
      { mastery, difficultyTier: 'boss' },
      { difficultyTier: 'boss' },
      { mastery, difficultyTiers: LADDER_TIERS },
    ];
  }
  return [
    { mastery, difficultyTier: tier },
    { mastery, difficultyTiers: LADDER_TIERS },
    { difficultyTier: tier },
  ];
}

/**
 * Sequential pick: the row at the cursor, or when that one is gone or
 * already served, the first row of the filter not served yet.
 */
async function pick(
  repository: QuestionRepository,
  filter: QuestionFilter,
  request: SelectionRequest,
  options: SelectionOptions
): Promise<Question | undefined> {
  const unserved: QuestionFilter = { ...filter, excludeIds: request.exclude };

  if (options.strategy === 'random') {
    const pool = await repository.find(unserved, { offset: 0, limit: RANDOM_POOL_LIMIT });
    if (pool.length === 0) {
      return undefined;
    }
    const index = Math.min(pool.length - 1, Math.floor(options.random() * pool.length));
    return pool[index];
  }

  const [atCursor] = await repository.find(filter, { offset: request.cursor, limit: 1 });
  if (atCursor && !request.exclude.includes(atCursor.id)) {
    return atCursor;
  }
  const [first] = await repository.find(unserved, { offset: 0, limit: 1 });
  return first;
}

/**
 * Selects the next question, or null when every filter is exhausted.
 *
 * Null is not an error: the engine treats it as the end of the session.
 */
export async function selectQuestion(
  repository: QuestionRepository,
  request: SelectionRequest,
  options: SelectionOptions
): Promise<Selection | null> {
  const filters = wideningFilters(request);

  for (const [index, filter] of filters.entries()) {
    const question = await pick(repository, filter, request, options);
    if (question) {
      return { question, filter, widened: index > 0 };
    }
  }

  return null;
}
