/**
 * StateMutator tests: arithmetic of a single answer, badge rules and the
 * status transitions, plus the properties every transition must keep.
 */

import { describe, it, expect } from 'vitest';
import {
  applyEvaluation,
  applyQuestionServed,
  applySessionCompleted,
  basePointsFor,
  grantTerminalBadge,
} from '../src/domain/transitions';
import type { EvaluationResult } from '../src/domain/evaluation';
import type { SessionState } from '../src/domain/state';
import { makeQuestion, makeState } from './helpers';

// ============================================================================
// Test Helpers
// ============================================================================

function correct(score: number): EvaluationResult {
  return { isCorrect: true, score, feedback: 'ok', source: 'judge' };
}

function incorrect(score: number): EvaluationResult {
  return { isCorrect: false, score, feedback: 'no', source: 'judge' };
}

function snapshot(state: SessionState) {
  return { ...state, badges: Array.from(state.badges), teamTrust: { ...state.teamTrust } };
}

// ============================================================================
// Answer Arithmetic
// ============================================================================

describe('applyEvaluation', () => {
  it('returns the state untouched when there is no evaluation', () => {
    const state = makeState();
    const result = applyEvaluation(state, null);

    expect(result.state).toBe(state);
    expect(result.events).toEqual([]);
  });

  it('rewards a correct answer', () => {
    const result = applyEvaluation(makeState(), correct(80));
    const next = result.state;

    expect(next.experiencePoints).toBe(80);
    expect(next.level).toBe(1);
    expect(next.score).toBe(10);
    expect(next.streak).toBe(1);
    expect(next.vitality).toBe(100);
    expect(next.teamTrust).toEqual({ senior_dev: 100, security_lead: 100, junior_dev: 100 });
    expect(next.rollingPerformance).toBeCloseTo(96);
    expect(next.sessionQuestionsAnswered).toBe(1);
    expect(next.difficultyCursor).toBe(1);
    expect(Array.from(next.badges)).toEqual(['first_contact']);

    expect(result.events.map((event) => event.type)).toEqual([
      'experience_gained',
      'team_trust_changed',
      'streak_changed',
      'badge_unlocked',
    ]);
    expect(result.events[0]).toEqual({ type: 'experience_gained', amount: 80, pointsAwarded: 10 });
  });

  it('penalizes an incorrect answer', () => {
    const result = applyEvaluation(makeState({ streak: 2 }), incorrect(20));
    const next = result.state;

    expect(next.streak).toBe(0);
    expect(next.vitality).toBe(80);
    expect(next.teamTrust).toEqual({ senior_dev: 95, security_lead: 95, junior_dev: 95 });
    expect(next.experiencePoints).toBe(0);
    expect(next.score).toBe(0);
    expect(next.rollingPerformance).toBeCloseTo(84);
    expect(next.sessionQuestionsAnswered).toBe(1);
    expect(next.difficultyCursor).toBe(1);

    expect(result.events).toEqual([
      { type: 'team_trust_changed', deltas: { senior_dev: -5, security_lead: -5, junior_dev: -5 } },
      { type: 'streak_changed', previousStreak: 2, newStreak: 0 },
      { type: 'vitality_changed', previousVitality: 100, newVitality: 80 },
    ]);
  });

  it('carries surplus experience over a level-up and awards points at the old level', () => {
    const result = applyEvaluation(makeState({ experiencePoints: 190, level: 1 }), correct(30));

    expect(result.state.level).toBe(2);
    expect(result.state.experiencePoints).toBe(20);
    expect(result.state.score).toBe(basePointsFor(1));
    expect(result.events).toContainEqual({ type: 'level_up', previousLevel: 1, newLevel: 2 });
    expect(result.events).toContainEqual({ type: 'boss_ready', reason: 'level_up' });
    expect(result.state.bossReady).toBe(true);
  });

  it('crosses several levels in one answer', () => {
    const result = applyEvaluation(makeState({ experiencePoints: 550, level: 1 }), correct(100));

    // 650 - 200 (level 1) - 400 (level 2) = 50 at level 3
    expect(result.state.level).toBe(3);
    expect(result.state.experiencePoints).toBe(50);
  });

  it('clamps vitality and trust at zero', () => {
    const result = applyEvaluation(
      makeState({ vitality: 15, teamTrust: { senior_dev: 3 } }),
      incorrect(0)
    );

    expect(result.state.vitality).toBe(0);
    expect(result.state.teamTrust).toEqual({ senior_dev: 0 });
    expect(result.events).toContainEqual({ type: 'team_trust_changed', deltas: { senior_dev: -3 } });
  });

  it('marks the session boss-ready when the milestone is crossed', () => {
    const result = applyEvaluation(makeState({ sessionQuestionsAnswered: 3 }), incorrect(10));

    expect(result.state.bossReady).toBe(true);
    expect(result.events).toContainEqual({ type: 'boss_ready', reason: 'milestone' });
  });

  it('does not announce boss readiness twice', () => {
    const result = applyEvaluation(
      makeState({ sessionQuestionsAnswered: 3, bossReady: true }),
      correct(50)
    );

    expect(result.state.bossReady).toBe(true);
    expect(result.events.some((event) => event.type === 'boss_ready')).toBe(false);
  });
});

// ============================================================================
// Badges
// ============================================================================

describe('badges', () => {
  it('grants code_warrior at a streak of three', () => {
    const result = applyEvaluation(makeState({ streak: 2, badges: ['first_contact'] }), correct(70));

    expect(result.state.badges.has('code_warrior')).toBe(true);
    expect(result.events).toContainEqual({ type: 'badge_unlocked', badgeId: 'code_warrior' });
  });

  it('grants perfectionist for a score of 95 or more', () => {
    const result = applyEvaluation(makeState(), correct(96));

    expect(Array.from(result.state.badges)).toEqual(['first_contact', 'perfectionist']);
  });

  it('grants elite_developer only after enough answers', () => {
    const early = applyEvaluation(makeState({ sessionQuestionsAnswered: 0 }), correct(90));
    const later = applyEvaluation(
      makeState({ sessionQuestionsAnswered: 2, rollingPerformance: 95 }),
      correct(90)
    );

    expect(early.state.badges.has('elite_developer')).toBe(false);
    expect(later.state.badges.has('elite_developer')).toBe(true);
  });

  it('never grants a badge twice when a fresh streak repeats a milestone', () => {
    const result = applyEvaluation(makeState({ streak: 0, badges: ['first_contact'] }), correct(70));

    expect(Array.from(result.state.badges)).toEqual(['first_contact']);
    expect(result.events.some((event) => event.type === 'badge_unlocked')).toBe(false);
  });

  it('grants no badges for an incorrect answer', () => {
    const result = applyEvaluation(
      makeState({ sessionQuestionsAnswered: 5, rollingPerformance: 100 }),
      incorrect(99)
    );

    expect(result.state.badges.size).toBe(0);
  });
});

// ============================================================================
// Properties
// ============================================================================

describe('transition properties', () => {
  const evaluations: EvaluationResult[] = [
    correct(100),
    correct(0),
    incorrect(100),
    incorrect(0),
    correct(55.5),
    incorrect(42),
  ];
  const starts: SessionState[] = [
    makeState(),
    makeState({ vitality: 0, rollingPerformance: 0, teamTrust: { senior_dev: 0 } }),
    makeState({ vitality: 100, streak: 9, experiencePoints: 399, level: 2 }),
    makeState({ sessionQuestionsAnswered: 7, difficultyCursor: 7, badges: ['unstoppable'] }),
  ];

  it('keeps bounded scalars in range and counters monotonic', () => {
    for (const start of starts) {
      for (const evaluation of evaluations) {
        const { state } = applyEvaluation(start, evaluation);

        expect(state.vitality).toBeGreaterThanOrEqual(0);
        expect(state.vitality).toBeLessThanOrEqual(100);
        expect(state.rollingPerformance).toBeGreaterThanOrEqual(0);
        expect(state.rollingPerformance).toBeLessThanOrEqual(100);
        for (const trust of Object.values(state.teamTrust)) {
          expect(trust).toBeGreaterThanOrEqual(0);
          expect(trust).toBeLessThanOrEqual(100);
        }
        expect(state.sessionQuestionsAnswered).toBe(start.sessionQuestionsAnswered + 1);
        expect(state.difficultyCursor).toBe(start.difficultyCursor + 1);
        expect(state.level).toBeGreaterThanOrEqual(start.level);
        expect(state.score).toBeGreaterThanOrEqual(start.score);
        if (!evaluation.isCorrect) {
          expect(state.streak).toBe(0);
        }
      }
    }
  });

  it('never mutates its input', () => {
    for (const start of starts) {
      const before = snapshot(start);
      applyEvaluation(start, correct(97));
      applyEvaluation(start, incorrect(3));
      expect(snapshot(start)).toEqual(before);
    }
  });
});

// ============================================================================
// Status Transitions
// ============================================================================

describe('applySessionCompleted', () => {
  it('completes with the terminal badge and clears the turn', () => {
    const start = makeState({ currentQuestionId: 'q-1', bossActive: true, status: 'boss_battle' });
    const result = applySessionCompleted(start, 'success', 'boss_defeated');

    expect(result.state.status).toBe('completed');
    expect(result.state.outcome).toBe('success');
    expect(result.state.currentQuestionId).toBeNull();
    expect(result.state.bossActive).toBe(false);
    expect(result.state.badges.has('crisis_averted')).toBe(true);
    expect(result.events).toEqual([
      { type: 'badge_unlocked', badgeId: 'crisis_averted' },
      { type: 'session_completed', outcome: 'success', reason: 'boss_defeated' },
    ]);
  });
});

describe('grantTerminalBadge', () => {
  it('refuses a second terminal badge', () => {
    const failed = grantTerminalBadge(makeState(), 'failure');
    const again = grantTerminalBadge(failed.state, 'success');

    expect(Array.from(again.state.badges)).toEqual(['system_breach']);
    expect(again.events).toEqual([]);
  });
});

describe('applyQuestionServed', () => {
  it('enters the boss battle for a boss-tier question', () => {
    const question = makeQuestion('b-1', 'boss', 9);
    const result = applyQuestionServed(makeState({ bossReady: true }), question, false);

    expect(result.state.status).toBe('boss_battle');
    expect(result.state.bossActive).toBe(true);
    expect(result.state.bossReady).toBe(false);
    expect(result.state.currentQuestionId).toBe('b-1');
    expect(result.state.servedQuestionIds).toEqual(['b-1']);
    expect(result.events).toEqual([
      { type: 'question_served', questionId: 'b-1', tier: 'boss', widened: false },
    ]);
  });

  it('returns to in_progress for a ladder question', () => {
    const question = makeQuestion('h-1', 'hard', 7);
    const result = applyQuestionServed(
      makeState({ status: 'boss_battle', bossActive: true, servedQuestionIds: ['b-1'] }),
      question,
      true
    );

    expect(result.state.status).toBe('in_progress');
    expect(result.state.bossActive).toBe(false);
    expect(result.state.servedQuestionIds).toEqual(['b-1', 'h-1']);
  });

  it('keeps boss readiness pending when a ladder row stands in for the boss', () => {
    const question = makeQuestion('h-2', 'hard', 7.2);
    const start = makeState({ bossReady: true });
    const result = applyQuestionServed(start, question, true);

    expect(result.state.status).toBe('in_progress');
    expect(result.state.bossActive).toBe(false);
    expect(result.state.bossReady).toBe(true);
    expect(result.events).toEqual([
      { type: 'question_served', questionId: 'h-2', tier: 'hard', widened: true },
    ]);
    expect(start.servedQuestionIds).toEqual([]);
  });
});
