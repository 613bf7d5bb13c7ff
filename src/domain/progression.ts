/**
 * Progression policy: maps session state to the next difficulty tier.
 *
 * Pure functions only. One policy serves every mode; the mode tag selects
 * between the fixed ladder and the performance-adaptive ladder.
 *
 * Non-goals (not included):
 * - Question lookup (belongs in selector.ts)
 * - State mutation (belongs in transitions.ts)
 */

import type { SessionState } from './state.js';
import type { DifficultyTier } from './questions.js';
import { LADDER_TIERS } from './questions.js';

// ============================================================================
// Thresholds
// ============================================================================

/** Answers served at medium before the ladder moves to hard */
export const MEDIUM_PHASE_LENGTH = 2;

/** Answered count that makes the following question a boss question */
export const BOSS_MILESTONE = 4;

/** Adaptive mode: rolling performance at or above this nudges one tier up */
export const ADAPTIVE_HIGH_THRESHOLD = 85;

/** Adaptive mode: rolling performance at or below this nudges one tier down */
export const ADAPTIVE_LOW_THRESHOLD = 60;

// ============================================================================
// Ladder
// ============================================================================

/**
 * Fixed ladder: medium for the first answers, hard afterwards.
 * Monotonic in the answered counter.
 */
export function ladderTier(sessionQuestionsAnswered: number): DifficultyTier {
  return sessionQuestionsAnswered < MEDIUM_PHASE_LENGTH ? 'medium' : 'hard';
}

/**
 * Shifts a ladder tier by `steps`, bounded to easy..hard.
 */
export function shiftTier(tier: DifficultyTier, steps: number): DifficultyTier {
  const index = LADDER_TIERS.indexOf(tier);
  if (index === -1) {
    return tier;
  }
  const bounded = Math.min(LADDER_TIERS.length - 1, Math.max(0, index + steps));
  return LADDER_TIERS[bounded];
}

function adaptiveNudge(state: SessionState): number {
  if (state.rollingPerformance >= ADAPTIVE_HIGH_THRESHOLD) {
    return 1;
  }
  // A fresh session has no history to judge
  if (state.rollingPerformance <= ADAPTIVE_LOW_THRESHOLD && state.sessionQuestionsAnswered > 0) {
    return -1;
  }
  return 0;
}

// ============================================================================
// Policy
// ============================================================================

export interface DifficultyDecision {
  tier: DifficultyTier;
  mastery: string;
}

/**
 * Decides the tier and mastery of the next question.
 *
 * Boss readiness overrides every mode. Mastery is passed through unchanged.
 */
export function nextDifficulty(state: SessionState): DifficultyDecision {
  const mastery = state.mastery;

  if (state.bossReady) {
    return { tier: 'boss', mastery };
  }

  const base = ladderTier(state.sessionQuestionsAnswered);

  switch (state.mode) {
    case 'adaptive':
      return { tier: shiftTier(base, adaptiveNudge(state)), mastery };
    case 'story':
    case 'imposter':
      return { tier: base, mastery };
  }
}

/**
 * Reports why a transition from `previous` to `next` makes the session
 * boss-eligible, or null when it does not.
 */
export function isBossEligible(
  previous: SessionState,
  next: SessionState
): 'level_up' | 'milestone' | null {
  if (next.level > previous.level) {
    return 'level_up';
  }
  if (
    previous.sessionQuestionsAnswered < BOSS_MILESTONE &&
    next.sessionQuestionsAnswered >= BOSS_MILESTONE
  ) {
    return 'milestone';
  }
  return null;
}
