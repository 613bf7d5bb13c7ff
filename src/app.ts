/**
 * Wires configuration into the engine and the request handler.
 */

import type { AppConfig } from './config';
import type { QuestionRepository } from './domain/questions';
import type { SessionLedger } from './domain/engine';
import { createSessionEngine } from './domain/engine';
import { createHandler, type RequestHandler } from './index';
import { generateUUID } from './http/uuid';
import { createGeminiTextGenerator } from './infra/geminiClient';
import {
	createInMemoryQuestionRepository,
	loadSeedQuestions,
} from './infra/inMemoryQuestionRepository';
import { createSupabaseQuestionRepository } from './infra/supabaseQuestionRepository';
import { InMemorySessionLedger } from './infra/sessionLedger';

export interface AppOverrides {
	repository?: QuestionRepository;
	ledger?: SessionLedger;
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): RequestHandler {
	const repository =
		overrides.repository ??
		(config.supabase
			? createSupabaseQuestionRepository({ ...config.supabase, timeoutMs: config.llmTimeoutMs })
			: createInMemoryQuestionRepository(loadSeedQuestions()));

	const generator = config.gemini ? createGeminiTextGenerator(config.gemini) : null;
	if (!generator) {
		console.warn('GEMINI_API_KEY not set; using offline evaluation and scenes');
	}

	const engine = createSessionEngine({
		repository,
		generator,
		ledger: overrides.ledger ?? new InMemorySessionLedger(),
		createSessionId: generateUUID,
		selection: config.selection,
		timeoutMs: config.llmTimeoutMs,
	});

	return createHandler({ engine }, { allowedOrigins: config.allowedOrigins });
}
