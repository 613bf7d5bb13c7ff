/**
 * Canonical domain event types for the quiz-chronicle engine.
 *
 * Types only (no logic). Events are the semantic record of what a turn
 * changed; narrative.ts turns them into player-facing summaries and the
 * HTTP layer returns them as-is.
 *
 * Non-goals (not included):
 * - Event handling or processing logic
 * - Persistence or analytics
 * - UI strings
 */

import type { DifficultyTier, QuestionId } from './questions.js';
import type { EvaluationSource } from './evaluation.js';
import type { PersonaId, SessionOutcome } from './state.js';

/**
 * AnswerEvaluatedEvent: An answer was judged (by the service or locally).
 */
export interface AnswerEvaluatedEvent {
  type: 'answer_evaluated';
  questionId: QuestionId;
  isCorrect: boolean;
  score: number;
  source: EvaluationSource;
}

/**
 * ExperienceGainedEvent: Experience added for a correct answer.
 */
export interface ExperienceGainedEvent {
  type: 'experience_gained';
  amount: number;
  pointsAwarded: number;
}

export interface LevelUpEvent {
  type: 'level_up';
  previousLevel: number;
  newLevel: number;
}

/**
 * StreakChangedEvent: The streak grew, or was reset by an incorrect answer.
 */
export interface StreakChangedEvent {
  type: 'streak_changed';
  previousStreak: number;
  newStreak: number;
}

/**
 * VitalityChangedEvent: Values are post-clamp.
 */
export interface VitalityChangedEvent {
  type: 'vitality_changed';
  previousVitality: number;
  newVitality: number;
}

export interface TeamTrustChangedEvent {
  type: 'team_trust_changed';
  /** Applied deltas per persona (post-clamp, may be 0 at a bound) */
  deltas: Record<PersonaId, number>;
}

export interface BadgeUnlockedEvent {
  type: 'badge_unlocked';
  badgeId: string;
}

/**
 * BossReadyEvent: The next served question will be a boss question.
 */
export interface BossReadyEvent {
  type: 'boss_ready';
  reason: 'level_up' | 'milestone';
}

export interface QuestionServedEvent {
  type: 'question_served';
  questionId: QuestionId;
  tier: DifficultyTier;
  /** The question was found only after widening the filter */
  widened: boolean;
}

export interface SessionCompletedEvent {
  type: 'session_completed';
  outcome: SessionOutcome;
  reason: 'vitality_depleted' | 'boss_defeated' | 'questions_exhausted';
}

/**
 * EngineEvent: Union of all engine events.
 */
export type EngineEvent =
  | AnswerEvaluatedEvent
  | ExperienceGainedEvent
  | LevelUpEvent
  | StreakChangedEvent
  | VitalityChangedEvent
  | TeamTrustChangedEvent
  | BadgeUnlockedEvent
  | BossReadyEvent
  | QuestionServedEvent
  | SessionCompletedEvent;
