/**
 * Question bank linter.
 *
 * Validates data/questions.json (or the JSON file passed as the first
 * argument) against the rules in question-rules.ts.
 * It can be run with: npm run lint:questions
 */

import { pathToFileURL } from 'url';
import { resolve } from 'path';

import { loadSeedQuestions } from '../infra/inMemoryQuestionRepository.js';
import { validateQuestionBank, type ValidationError } from './question-rules.js';

async function main() {
  const target = process.argv[2];
  const questions = target
    ? loadSeedQuestions(pathToFileURL(resolve(target)))
    : loadSeedQuestions();

  console.log(`Linting ${questions.length} questions...\n`);
  const errors = validateQuestionBank(questions);

  if (errors.length === 0) {
    console.log('✓ All questions valid\n');
    process.exit(0);
  }

  console.log('✗ Validation failures:\n');

  const bySubject = new Map<string, ValidationError[]>();
  for (const error of errors) {
    const group = bySubject.get(error.subject) ?? [];
    group.push(error);
    bySubject.set(error.subject, group);
  }

  for (const [subject, group] of bySubject) {
    console.log(`Subject: ${subject}`);
    for (const error of group) {
      console.log(`  Rule: ${error.rule}`);
      console.log(`  Error: ${error.message}`);
      console.log('');
    }
  }

  console.log(`Total: ${errors.length} error(s) across ${bySubject.size} subject(s)\n`);
  process.exit(1);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
