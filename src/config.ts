/**
 * Runtime configuration read from environment variables.
 *
 * Optional services degrade instead of failing: without a Gemini key the
 * engine uses its offline evaluator and scenes, and without Supabase
 * credentials it serves the bundled seed bank. Malformed values throw at
 * startup.
 */

import type { SelectionStrategy } from './domain/selector';
import { DEFAULT_TIMEOUT_MS } from './domain/text-generation';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
	port: number;
	gemini: { apiKey: string; model: string } | null;
	supabase: { url: string; key: string } | null;
	llmTimeoutMs: number;
	selection: SelectionStrategy;
	allowedOrigins: string[];
}

export const DEFAULT_PORT = 8787;
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

function readOptional(env: Env, name: string): string | undefined {
	const value = env[name]?.trim();
	return value === undefined || value === '' ? undefined : value;
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
	const raw = readOptional(env, name);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`${name} must be a positive integer, got "${raw}"`);
	}
	return value;
}

function readSelection(env: Env): SelectionStrategy {
	const raw = readOptional(env, 'QUESTION_SELECTION') ?? 'sequential';
	if (raw !== 'sequential' && raw !== 'random') {
		throw new Error(`QUESTION_SELECTION must be "sequential" or "random", got "${raw}"`);
	}
	return raw;
}

export function loadConfig(env: Env): AppConfig {
	const apiKey = readOptional(env, 'GEMINI_API_KEY');
	const supabaseUrl = readOptional(env, 'SUPABASE_URL');
	const supabaseKey = readOptional(env, 'SUPABASE_KEY');

	if ((supabaseUrl === undefined) !== (supabaseKey === undefined)) {
		throw new Error('SUPABASE_URL and SUPABASE_KEY must be set together');
	}

	const origins = readOptional(env, 'ALLOWED_ORIGINS');

	return {
		port: readPositiveInteger(env, 'PORT', DEFAULT_PORT),
		gemini: apiKey
			? { apiKey, model: readOptional(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL }
			: null,
		supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, key: supabaseKey } : null,
		llmTimeoutMs: readPositiveInteger(env, 'LLM_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
		selection: readSelection(env),
		allowedOrigins: origins
			? origins.split(',').map((origin) => origin.trim()).filter((origin) => origin !== '')
			: [...DEFAULT_ALLOWED_ORIGINS],
	};
}
