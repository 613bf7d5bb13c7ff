/**
 * Developer smoke test for the session engine.
 *
 * Plays one scripted story session against the bundled seed bank without
 * any network access. Its purpose is to prove that:
 * - a session starts and serves a question with a scene
 * - answers are evaluated and mutate state
 * - the boss battle arrives and the session completes
 *
 * Run with:
 *   npm run smoke
 */

import { createSessionEngine, type TurnResult } from '../domain/engine.js';
import type { TextGenerator } from '../domain/text-generation.js';
import {
  createInMemoryQuestionRepository,
  loadSeedQuestions,
} from '../infra/inMemoryQuestionRepository.js';
import { InMemorySessionLedger } from '../infra/sessionLedger.js';

// -----------------------------------------------------------------------------
// Scripted generator: judges everything correct, narrates in one line
// -----------------------------------------------------------------------------

const scriptedGenerator: TextGenerator = {
  async generate(prompt: string) {
    if (prompt.includes('"is_correct"')) {
      return JSON.stringify({ is_correct: true, score: 88, feedback: 'Looks right.' });
    }
    return JSON.stringify({
      narrative_chapter: 'The terminal hums. Another fragment of the system waits for you.',
      call_to_action: 'Patch it.',
    });
  },
};

const engine = createSessionEngine({
  repository: createInMemoryQuestionRepository(loadSeedQuestions()),
  generator: scriptedGenerator,
  ledger: new InMemorySessionLedger(),
  createSessionId: () => 'smoke-session',
});

function report(label: string, turn: TurnResult) {
  console.log(`\n=== ${label} ===`);
  console.log(`Status: ${turn.status}${turn.outcome ? ` (${turn.outcome})` : ''}`);
  if (turn.summary) {
    console.log(`Summary: ${turn.summary.title} - ${turn.summary.line}`);
  }
  if (turn.nextQuestion) {
    console.log(`Question: [${turn.nextQuestion.difficultyLevel}] ${turn.nextQuestion.title}`);
  }
  console.log('Events:');
  console.dir(turn.events, { depth: null });
}

async function main() {
  let turn = await engine.startSession({ mastery: 'python', mode: 'story' });
  report('START', turn);

  // Guard against a session that never ends
  for (let answered = 1; turn.status !== 'completed' && answered <= 20; answered += 1) {
    turn = await engine.advance(turn.updatedState, 'def solve(values):\n    result = sorted(values)\n    return result');
    report(`ANSWER ${answered}`, turn);
  }

  console.log('\n=== FINAL STATE ===');
  console.dir({ ...turn.updatedState, badges: Array.from(turn.updatedState.badges) }, { depth: null });
  console.log('\n=== DONE ===');
}

main().catch((error) => {
  console.error('Smoke run failed:', error);
  process.exit(1);
});
