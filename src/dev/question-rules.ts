/**
 * Validation rules for a question bank.
 *
 * Used by `npm run lint:questions` against data/questions.json, and usable
 * against rows exported from the hosted table.
 */

import type { DifficultyTier, Question } from '../domain/questions.js';
import { BOSS_MILESTONE, MEDIUM_PHASE_LENGTH } from '../domain/progression.js';

export type RuleName =
  | 'duplicate-id'
  | 'empty-field'
  | 'rating-band'
  | 'answer-leak'
  | 'ladder-coverage';

export interface ValidationError {
  /** Question id, or the mastery for bank-wide rules */
  subject: string;
  rule: RuleName;
  message: string;
}

/**
 * Rating band per tier, [min, max). Keeps rating order and tier order
 * consistent, so sorting by rating never interleaves tiers.
 */
export const TIER_RATING_BANDS: Record<DifficultyTier, { min: number; max: number }> = {
  easy: { min: 0, max: 4 },
  medium: { min: 4, max: 7 },
  hard: { min: 7, max: 9 },
  boss: { min: 9, max: 11 },
};

/**
 * Minimum rows per tier for a full story session in one mastery.
 *
 * The cursor offsets into each tier: the medium phase reads offsets
 * 0..MEDIUM_PHASE_LENGTH-1, the hard phase continues up to the boss
 * milestone, and the boss question is read at the milestone offset.
 */
export const LADDER_MINIMUMS: ReadonlyArray<[DifficultyTier, number]> = [
  ['medium', MEDIUM_PHASE_LENGTH],
  ['hard', BOSS_MILESTONE],
  ['boss', BOSS_MILESTONE + 1],
];

/** Expected outcomes shorter than this are too generic to flag as leaked */
const LEAK_MIN_LENGTH = 3;

export function validateQuestion(question: Question): ValidationError[] {
  const errors: ValidationError[] = [];
  const textFields: Array<[string, string]> = [
    ['title', question.title],
    ['mastery', question.mastery],
    ['questionText', question.questionText],
    ['expectedOutcome', question.expectedOutcome],
  ];

  for (const [name, value] of textFields) {
    if (value.trim() === '') {
      errors.push({ subject: question.id, rule: 'empty-field', message: `${name} is empty` });
    }
  }

  const band = TIER_RATING_BANDS[question.difficultyLevel];
  if (question.difficultyRating < band.min || question.difficultyRating >= band.max) {
    errors.push({
      subject: question.id,
      rule: 'rating-band',
      message: `rating ${question.difficultyRating} is outside [${band.min}, ${band.max}) for ${question.difficultyLevel}`,
    });
  }

  const expected = question.expectedOutcome.trim().toLowerCase();
  if (
    expected.length >= LEAK_MIN_LENGTH &&
    question.questionText.toLowerCase().includes(expected)
  ) {
    errors.push({
      subject: question.id,
      rule: 'answer-leak',
      message: 'questionText contains the expected outcome',
    });
  }

  return errors;
}

export function validateQuestionBank(questions: readonly Question[]): ValidationError[] {
  const errors: ValidationError[] = [];
  const seen = new Set<string>();
  const tierCounts = new Map<string, Record<DifficultyTier, number>>();

  for (const question of questions) {
    if (seen.has(question.id)) {
      errors.push({ subject: question.id, rule: 'duplicate-id', message: 'id appears more than once' });
    }
    seen.add(question.id);
    errors.push(...validateQuestion(question));

    const counts = tierCounts.get(question.mastery) ?? { easy: 0, medium: 0, hard: 0, boss: 0 };
    counts[question.difficultyLevel] += 1;
    tierCounts.set(question.mastery, counts);
  }

  for (const [mastery, counts] of tierCounts) {
    for (const [tier, minimum] of LADDER_MINIMUMS) {
      const count = counts[tier];
      if (count < minimum) {
        errors.push({
          subject: mastery,
          rule: 'ladder-coverage',
          message: `${tier} has ${count} question(s); a full session needs ${minimum}`,
        });
      }
    }
  }

  return errors;
}
