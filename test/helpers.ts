/**
 * Shared fixtures for engine tests: question builders, a state builder and
 * in-process stand-ins for the text generator.
 */

import type { DifficultyTier, Question } from '../src/domain/questions';
import type { SessionState, SessionStateInit } from '../src/domain/state';
import { createSessionState } from '../src/domain/state';
import type { TextGenerator } from '../src/domain/text-generation';

export function makeQuestion(
  id: string,
  tier: DifficultyTier,
  rating: number,
  overrides?: Partial<Question>
): Question {
  return {
    id,
    title: `Title ${id}`,
    mastery: 'python',
    difficultyLevel: tier,
    difficultyRating: rating,
    questionText: `Solve problem ${id}.`,
    expectedOutcome: `Expected outcome for ${id}`,
    ...overrides,
  };
}

/**
 * A bank deep enough for a full story session in one mastery:
 * 1 easy, 2 medium, 4 hard, 5 boss (ids sort with their ratings).
 */
export function makeLadderBank(mastery = 'python'): Question[] {
  const prefix = mastery.slice(0, 2);
  return [
    makeQuestion(`${prefix}-e1`, 'easy', 1, { mastery }),
    makeQuestion(`${prefix}-m1`, 'medium', 4, { mastery }),
    makeQuestion(`${prefix}-m2`, 'medium', 5, { mastery }),
    makeQuestion(`${prefix}-h1`, 'hard', 7, { mastery }),
    makeQuestion(`${prefix}-h2`, 'hard', 7.2, { mastery }),
    makeQuestion(`${prefix}-h3`, 'hard', 7.4, { mastery }),
    makeQuestion(`${prefix}-h4`, 'hard', 7.6, { mastery }),
    makeQuestion(`${prefix}-b1`, 'boss', 9, { mastery }),
    makeQuestion(`${prefix}-b2`, 'boss', 9.2, { mastery }),
    makeQuestion(`${prefix}-b3`, 'boss', 9.4, { mastery }),
    makeQuestion(`${prefix}-b4`, 'boss', 9.6, { mastery }),
    makeQuestion(`${prefix}-b5`, 'boss', 9.8, { mastery }),
  ];
}

export function makeState(overrides?: Partial<SessionStateInit>): SessionState {
  return createSessionState({
    sessionId: 'session-1',
    mastery: 'python',
    ...overrides,
  });
}

/**
 * Generator that answers judgment prompts from a verdict queue and scene
 * prompts with a fixed JSON scene. Records every prompt it receives.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private readonly verdicts: string[];

  constructor(verdicts: string[] = [], private readonly scene = defaultScene()) {
    this.verdicts = [...verdicts];
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (prompt.includes('EXPECTED SOLUTION CRITERIA')) {
      const verdict = this.verdicts.shift();
      if (verdict === undefined) {
        throw new Error('No scripted verdict left');
      }
      return verdict;
    }
    return this.scene;
  }
}

export function defaultScene(): string {
  return JSON.stringify({
    narrative_chapter: 'Alarms flash across the console.',
    call_to_action: 'Patch the relay.',
  });
}

export function verdict(isCorrect: boolean, score: number, feedback = 'Reviewed.'): string {
  return JSON.stringify({ is_correct: isCorrect, score, feedback });
}

/**
 * Generator that always rejects, as an unreachable service would.
 */
export class FailingGenerator implements TextGenerator {
  calls = 0;

  async generate(): Promise<string> {
    this.calls += 1;
    throw new Error('service down');
  }
}

/**
 * Generator that never settles on its own; rejects once aborted.
 */
export class HangingGenerator implements TextGenerator {
  aborted = false;

  generate(_prompt: string, signal?: AbortSignal): Promise<string> {
    return new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }
}
