/**
 * Pure state transition functions for the quiz-chronicle engine.
 *
 * This file implements pure functions (no side effects, no IO) that produce
 * a new SessionState and the EngineEvents describing the change. Inputs are
 * never mutated: every transition starts from a copy.
 *
 * Non-goals (not included):
 * - Answer evaluation (belongs in evaluation.ts)
 * - Difficulty selection (belongs in progression.ts)
 * - Question lookup or narrative generation
 */

import type { SessionState, SessionOutcome, TeamTrust } from './state.js';
import { clampScalar, cloneSessionState } from './state.js';
import type { EvaluationResult } from './evaluation.js';
import type { EngineEvent, SessionCompletedEvent } from './events.js';
import type { Question } from './questions.js';
import { isBossEligible } from './progression.js';

// ============================================================================
// Tuning
// ============================================================================

/** Experience needed to leave a level is `level * LEVEL_XP_CONSTANT` */
export const LEVEL_XP_CONSTANT = 200;

export const VITALITY_GAIN = 5;
export const VITALITY_LOSS = 20;

export const TEAM_TRUST_GAIN = 2;
export const TEAM_TRUST_LOSS = 5;

/** Weight kept by the rolling performance average on each answer */
export const PERFORMANCE_DECAY = 0.8;

/** Minimum answers before the elite badge can be granted */
export const ELITE_MIN_ANSWERS = 3;

export function basePointsFor(level: number): number {
  return 10 * level;
}

// ============================================================================
// Badges
// ============================================================================

export const BADGES = {
  FIRST_CONTACT: 'first_contact',
  CODE_WARRIOR: 'code_warrior',
  DEBUGGING_MASTER: 'debugging_master',
  UNSTOPPABLE: 'unstoppable',
  PERFECTIONIST: 'perfectionist',
  ELITE_DEVELOPER: 'elite_developer',
  CRISIS_AVERTED: 'crisis_averted',
  SYSTEM_BREACH: 'system_breach',
} as const;

/**
 * Streak milestones: checked on the exact value, so a fresh streak that
 * reaches the same count checks again (and is refused if already held).
 */
const STREAK_BADGES: ReadonlyArray<[number, string]> = [
  [1, BADGES.FIRST_CONTACT],
  [3, BADGES.CODE_WARRIOR],
  [5, BADGES.DEBUGGING_MASTER],
  [10, BADGES.UNSTOPPABLE],
];

const PERFECT_SCORE_THRESHOLD = 95;
const ELITE_PERFORMANCE_THRESHOLD = 90;

export const TERMINAL_BADGES: Record<SessionOutcome, string> = {
  success: BADGES.CRISIS_AVERTED,
  failure: BADGES.SYSTEM_BREACH,
};

function collectEarnedBadges(state: SessionState, evaluation: EvaluationResult): string[] {
  const earned: string[] = [];

  for (const [streak, badge] of STREAK_BADGES) {
    if (state.streak === streak) {
      earned.push(badge);
    }
  }
  if (evaluation.score >= PERFECT_SCORE_THRESHOLD) {
    earned.push(BADGES.PERFECTIONIST);
  }
  if (
    state.rollingPerformance >= ELITE_PERFORMANCE_THRESHOLD &&
    state.sessionQuestionsAnswered >= ELITE_MIN_ANSWERS
  ) {
    earned.push(BADGES.ELITE_DEVELOPER);
  }

  return earned.filter((badge) => !state.badges.has(badge));
}

// ============================================================================
// Helpers
// ============================================================================

function shiftTeamTrust(
  teamTrust: TeamTrust,
  delta: number
): { teamTrust: TeamTrust; deltas: TeamTrust } {
  const next: TeamTrust = {};
  const deltas: TeamTrust = {};
  for (const [persona, trust] of Object.entries(teamTrust)) {
    next[persona] = clampScalar(trust + delta);
    deltas[persona] = next[persona] - trust;
  }
  return { teamTrust: next, deltas };
}

// ============================================================================
// Answer Transition
// ============================================================================

/**
 * Applies an evaluation to a state (the StateMutator).
 *
 * Correct answers add experience (remainder carries over a level-up), extend
 * the streak, award points for the level the answer was given at, and nudge
 * vitality and trust up. Incorrect answers reset the streak and cut vitality
 * and trust. Both update the rolling performance average and advance the
 * answered counter and cursor.
 *
 * A null evaluation (no answer this turn) returns the state unchanged.
 */
export function applyEvaluation(
  state: SessionState,
  evaluation: EvaluationResult | null
): { state: SessionState; events: EngineEvent[] } {
  if (!evaluation) {
    return { state, events: [] };
  }

  const next = cloneSessionState(state);
  const events: EngineEvent[] = [];

  if (evaluation.isCorrect) {
    const amount = Math.round(evaluation.score);
    const pointsAwarded = basePointsFor(state.level);

    next.experiencePoints += amount;
    while (next.experiencePoints >= next.level * LEVEL_XP_CONSTANT) {
      next.experiencePoints -= next.level * LEVEL_XP_CONSTANT;
      next.level += 1;
    }
    next.score += pointsAwarded;
    events.push({ type: 'experience_gained', amount, pointsAwarded });

    if (next.level !== state.level) {
      events.push({ type: 'level_up', previousLevel: state.level, newLevel: next.level });
    }

    next.streak = state.streak + 1;
    next.vitality = clampScalar(state.vitality + VITALITY_GAIN);
    const trust = shiftTeamTrust(state.teamTrust, TEAM_TRUST_GAIN);
    next.teamTrust = trust.teamTrust;
    events.push({ type: 'team_trust_changed', deltas: trust.deltas });
  } else {
    next.streak = 0;
    next.vitality = clampScalar(state.vitality - VITALITY_LOSS);
    const trust = shiftTeamTrust(state.teamTrust, -TEAM_TRUST_LOSS);
    next.teamTrust = trust.teamTrust;
    events.push({ type: 'team_trust_changed', deltas: trust.deltas });
  }

  if (next.streak !== state.streak) {
    events.push({ type: 'streak_changed', previousStreak: state.streak, newStreak: next.streak });
  }
  if (next.vitality !== state.vitality) {
    events.push({
      type: 'vitality_changed',
      previousVitality: state.vitality,
      newVitality: next.vitality,
    });
  }

  next.rollingPerformance = clampScalar(
    state.rollingPerformance * PERFORMANCE_DECAY + evaluation.score * (1 - PERFORMANCE_DECAY)
  );
  next.sessionQuestionsAnswered = state.sessionQuestionsAnswered + 1;
  next.difficultyCursor = state.difficultyCursor + 1;

  if (evaluation.isCorrect) {
    for (const badge of collectEarnedBadges(next, evaluation)) {
      next.badges.add(badge);
      events.push({ type: 'badge_unlocked', badgeId: badge });
    }
  }

  const bossReason = isBossEligible(state, next);
  if (bossReason && !state.bossReady) {
    next.bossReady = true;
    events.push({ type: 'boss_ready', reason: bossReason });
  }

  return { state: next, events };
}

// ============================================================================
// Status Transitions
// ============================================================================

/**
 * Grants the terminal badge for an outcome.
 *
 * At most one terminal badge exists per session: once either is held, the
 * state is returned unchanged.
 */
export function grantTerminalBadge(
  state: SessionState,
  outcome: SessionOutcome
): { state: SessionState; events: EngineEvent[] } {
  const alreadyTerminal = Object.values(TERMINAL_BADGES).some((badge) => state.badges.has(badge));
  if (alreadyTerminal) {
    return { state, events: [] };
  }

  const next = cloneSessionState(state);
  const badge = TERMINAL_BADGES[outcome];
  next.badges.add(badge);
  return { state: next, events: [{ type: 'badge_unlocked', badgeId: badge }] };
}

/**
 * Moves a session to `completed` with an outcome and its terminal badge.
 */
export function applySessionCompleted(
  state: SessionState,
  outcome: SessionOutcome,
  reason: SessionCompletedEvent['reason']
): { state: SessionState; events: EngineEvent[] } {
  const granted = grantTerminalBadge(state, outcome);
  const next = cloneSessionState(granted.state);

  next.status = 'completed';
  next.outcome = outcome;
  next.bossReady = false;
  next.bossActive = false;
  next.currentQuestionId = null;

  return {
    state: next,
    events: [...granted.events, { type: 'session_completed', outcome, reason }],
  };
}

/**
 * Records that a question was served.
 *
 * The served row's own tier decides the status: a boss-tier question
 * consumes boss readiness and puts the session into `boss_battle`; any
 * other tier keeps it `in_progress` and leaves readiness pending.
 */
export function applyQuestionServed(
  state: SessionState,
  question: Question,
  widened: boolean
): { state: SessionState; events: EngineEvent[] } {
  const next = cloneSessionState(state);
  const tier = question.difficultyLevel;
  const isBoss = tier === 'boss';

  next.currentQuestionId = question.id;
  if (!next.servedQuestionIds.includes(question.id)) {
    next.servedQuestionIds.push(question.id);
  }
  next.status = isBoss ? 'boss_battle' : 'in_progress';
  next.bossActive = isBoss;
  if (isBoss) {
    next.bossReady = false;
  }

  return {
    state: next,
    events: [{ type: 'question_served', questionId: question.id, tier, widened }],
  };
}
