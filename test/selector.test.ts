import { describe, it, expect } from 'vitest';
import { selectQuestion, wideningFilters } from '../src/domain/selector';
import { LADDER_TIERS } from '../src/domain/questions';
import { createInMemoryQuestionRepository } from '../src/infra/inMemoryQuestionRepository';
import { makeLadderBank, makeQuestion } from './helpers';

const repository = createInMemoryQuestionRepository([
  ...makeLadderBank('python'),
  makeQuestion('ma-h1', 'hard', 7.1, { mastery: 'mathematics' }),
]);

const sequential = { strategy: 'sequential' as const, random: () => 0 };

describe('wideningFilters', () => {
  it('widens a ladder tier without ever reaching the boss tier', () => {
    expect(wideningFilters({ tier: 'hard', mastery: 'python' })).toEqual([
      { mastery: 'python', difficultyTier: 'hard' },
      { mastery: 'python', difficultyTiers: LADDER_TIERS },
      { difficultyTier: 'hard' },
    ]);
  });

  it('exhausts the boss tier before falling back to the ladder', () => {
    expect(wideningFilters({ tier: 'boss', mastery: 'python' })).toEqual([
      { mastery: 'python', difficultyTier: 'boss' },
      { difficultyTier: 'boss' },
      { mastery: 'python', difficultyTiers: LADDER_TIERS },
    ]);
  });
});

describe('selectQuestion (sequential)', () => {
  it('offsets into the exact tier and mastery by the cursor', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'medium', mastery: 'python', cursor: 1, exclude: [] },
      sequential
    );

    expect(selection?.question.id).toBe('py-m2');
    expect(selection?.widened).toBe(false);
    expect(selection?.filter).toEqual({ mastery: 'python', difficultyTier: 'medium' });
  });

  it('uses a row the cursor skipped before widening', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'hard', mastery: 'python', cursor: 6, exclude: ['py-h3', 'py-h4'] },
      sequential
    );

    expect(selection?.question.id).toBe('py-h1');
    expect(selection?.widened).toBe(false);
  });

  it('skips a served row sitting at the cursor', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'hard', mastery: 'python', cursor: 0, exclude: ['py-h1'] },
      sequential
    );

    expect(selection?.question.id).toBe('py-h2');
  });

  it('drops the tier when the exact filter is exhausted', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'easy', mastery: 'python', cursor: 3, exclude: ['py-e1'] },
      sequential
    );

    // python ladder ordered by rating: e1, m1, m2, h1, ...
    expect(selection?.question.id).toBe('py-h1');
    expect(selection?.widened).toBe(true);
    expect(selection?.filter).toEqual({ mastery: 'python', difficultyTiers: LADDER_TIERS });
  });

  it('drops the mastery when the subject has nothing left', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'hard', mastery: 'rust', cursor: 1, exclude: [] },
      sequential
    );

    // hard across masteries: py-h1 (7), ma-h1 (7.1), py-h2 (7.2), ...
    expect(selection?.question.id).toBe('ma-h1');
    expect(selection?.filter).toEqual({ difficultyTier: 'hard' });
  });

  it('returns null when every filter is exhausted', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'easy', mastery: 'rust', cursor: 5, exclude: ['py-e1'] },
      sequential
    );

    expect(selection).toBeNull();
  });

  it('keeps a boss request on a boss row while one is left', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'boss', mastery: 'python', cursor: 9, exclude: ['py-b1', 'py-b2', 'py-b3', 'py-b4'] },
      sequential
    );

    expect(selection?.question.id).toBe('py-b5');
    expect(selection?.widened).toBe(false);
  });

  it('falls back to the ladder once every boss row was served', async () => {
    const selection = await selectQuestion(
      repository,
      {
        tier: 'boss',
        mastery: 'python',
        cursor: 0,
        exclude: ['py-b1', 'py-b2', 'py-b3', 'py-b4', 'py-b5', 'py-e1'],
      },
      sequential
    );

    expect(selection?.question.id).toBe('py-m1');
    expect(selection?.question.difficultyLevel).toBe('medium');
    expect(selection?.widened).toBe(true);
  });
});

describe('selectQuestion (random)', () => {
  it('picks from the unserved matching pool with the injected source', async () => {
    const last = await selectQuestion(
      repository,
      { tier: 'hard', mastery: 'python', cursor: 50, exclude: ['py-h4'] },
      { strategy: 'random', random: () => 0.99 }
    );
    const first = await selectQuestion(
      repository,
      { tier: 'hard', mastery: 'python', cursor: 50, exclude: [] },
      { strategy: 'random', random: () => 0 }
    );

    expect(last?.question.id).toBe('py-h3');
    expect(first?.question.id).toBe('py-h1');
    expect(first?.widened).toBe(false);
  });

  it('widens like the sequential strategy', async () => {
    const selection = await selectQuestion(
      repository,
      { tier: 'boss', mastery: 'rust', cursor: 0, exclude: [] },
      { strategy: 'random', random: () => 0 }
    );

    expect(selection?.question.id).toBe('py-b1');
    expect(selection?.widened).toBe(true);
  });
});
