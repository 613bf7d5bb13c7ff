import { describe, it, expect } from 'vitest';
import { isBossEligible, ladderTier, nextDifficulty, shiftTier } from '../src/domain/progression';
import { makeState } from './helpers';

describe('ladderTier', () => {
  it('serves medium first and hard afterwards', () => {
    expect(ladderTier(0)).toBe('medium');
    expect(ladderTier(1)).toBe('medium');
    expect(ladderTier(2)).toBe('hard');
    expect(ladderTier(10)).toBe('hard');
  });
});

describe('shiftTier', () => {
  it('stays within easy..hard', () => {
    expect(shiftTier('medium', -1)).toBe('easy');
    expect(shiftTier('easy', -1)).toBe('easy');
    expect(shiftTier('hard', 1)).toBe('hard');
    expect(shiftTier('boss', 1)).toBe('boss');
  });
});

describe('nextDifficulty', () => {
  it('forces the boss tier when boss-ready, in every mode', () => {
    for (const mode of ['story', 'adaptive', 'imposter'] as const) {
      expect(nextDifficulty(makeState({ mode, bossReady: true }))).toEqual({
        tier: 'boss',
        mastery: 'python',
      });
    }
  });

  it('follows the fixed ladder in story and imposter modes', () => {
    expect(nextDifficulty(makeState({ mode: 'story', sessionQuestionsAnswered: 0 })).tier).toBe('medium');
    expect(nextDifficulty(makeState({ mode: 'imposter', sessionQuestionsAnswered: 2 })).tier).toBe('hard');
  });

  it('nudges the ladder up for strong performance in adaptive mode', () => {
    const state = makeState({ mode: 'adaptive', rollingPerformance: 90, sessionQuestionsAnswered: 0 });
    expect(nextDifficulty(state).tier).toBe('hard');
  });

  it('nudges the ladder down for weak performance in adaptive mode', () => {
    const state = makeState({ mode: 'adaptive', rollingPerformance: 50, sessionQuestionsAnswered: 3 });
    expect(nextDifficulty(state).tier).toBe('medium');
  });

  it('does not judge a session with no answers yet', () => {
    const state = makeState({ mode: 'adaptive', rollingPerformance: 50, sessionQuestionsAnswered: 0 });
    expect(nextDifficulty(state).tier).toBe('medium');
  });

  it('passes the mastery through unchanged', () => {
    expect(nextDifficulty(makeState({ mastery: 'mathematics' })).mastery).toBe('mathematics');
  });
});

describe('isBossEligible', () => {
  it('reports a level-up first', () => {
    expect(
      isBossEligible(makeState({ level: 1, sessionQuestionsAnswered: 3 }), makeState({ level: 2, sessionQuestionsAnswered: 4 }))
    ).toBe('level_up');
  });

  it('reports the milestone when the answered count crosses it', () => {
    expect(
      isBossEligible(makeState({ sessionQuestionsAnswered: 3 }), makeState({ sessionQuestionsAnswered: 4 }))
    ).toBe('milestone');
  });

  it('reports nothing past the milestone', () => {
    expect(
      isBossEligible(makeState({ sessionQuestionsAnswered: 4 }), makeState({ sessionQuestionsAnswered: 5 }))
    ).toBeNull();
  });
});
