/**
 * In-memory question repository.
 *
 * Backs local development and tests. Holds a fixed list of questions and
 * answers repository queries with the same ordering the hosted table uses.
 */

import { readFileSync } from 'node:fs';
import type {
  PageOptions,
  Question,
  QuestionFilter,
  QuestionId,
  QuestionRepository,
} from '../domain/questions.js';
import { compareQuestions, isDifficultyTier, matchesFilter } from '../domain/questions.js';

const SEED_BANK_URL = new URL('../../data/questions.json', import.meta.url);

export function createInMemoryQuestionRepository(questions: readonly Question[]): QuestionRepository {
  const byId = new Map<QuestionId, Question>();
  for (const question of questions) {
    byId.set(question.id, question);
  }
  const ordered = Array.from(byId.values()).sort(compareQuestions);

  return {
    async find(filter: QuestionFilter, page: PageOptions) {
      const matching = ordered.filter((question) => matchesFilter(question, filter));
      return matching.slice(page.offset, page.offset + page.limit);
    },

    async findById(id: QuestionId) {
      return byId.get(id);
    },

    async countByMastery(mastery: string) {
      return ordered.filter((question) => question.mastery === mastery).length;
    },

    async listMasteries() {
      return Array.from(new Set(ordered.map((question) => question.mastery))).sort();
    },
  };
}

// ============================================================================
// Seed Bank
// ============================================================================

function readString(record: Record<string, unknown>, key: string, index: number): string {
  const value = record[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Seed question #${index} is missing "${key}"`);
  }
  return value;
}

/**
 * Converts raw seed rows (snake_case, as stored in the hosted table) into
 * questions. Throws on the first malformed row.
 */
export function parseQuestionRows(rows: unknown): Question[] {
  if (!Array.isArray(rows)) {
    throw new Error('Question rows must be an array');
  }

  return rows.map((row: unknown, index) => {
    if (typeof row !== 'object' || row === null) {
      throw new Error(`Seed question #${index} is not an object`);
    }
    const record: Record<string, unknown> = Object.fromEntries(Object.entries(row));

    const tier = record.difficulty_level;
    if (!isDifficultyTier(tier)) {
      throw new Error(`Seed question #${index} has an unknown difficulty_level`);
    }
    const rating = record.difficulty_rating;
    if (typeof rating !== 'number' || !Number.isFinite(rating)) {
      throw new Error(`Seed question #${index} has a non-numeric difficulty_rating`);
    }

    return {
      id: readString(record, 'id', index),
      title: readString(record, 'title', index),
      mastery: readString(record, 'mastery', index),
      difficultyLevel: tier,
      difficultyRating: rating,
      questionText: readString(record, 'question_text', index),
      expectedOutcome: readString(record, 'expected_outcome', index),
    };
  });
}

/**
 * Loads the bundled seed bank from data/questions.json.
 */
export function loadSeedQuestions(url: URL = SEED_BANK_URL): Question[] {
  const raw: unknown = JSON.parse(readFileSync(url, 'utf8'));
  return parseQuestionRows(raw);
}
