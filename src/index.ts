/**
 * Manual test instructions:
 *
 * npm run dev
 *
 * # List masteries (saves the playerId cookie to cookies.txt)
 * curl -c cookies.txt http://localhost:8787/api/masteries
 *
 * # Start a session; keep the returned "state" for the next turn
 * curl -b cookies.txt -X POST http://localhost:8787/api/sessions \
 *   -H 'Content-Type: application/json' -d '{"mastery":"python","mode":"story"}'
 *
 * # Answer the current question
 * curl -b cookies.txt -X POST http://localhost:8787/api/advance \
 *   -H 'Content-Type: application/json' -d '{"state":{...},"answer":"def greet(name): return f\"Hello, {name}\""}'
 *
 * # Completed sessions recorded for this player
 * curl -b cookies.txt http://localhost:8787/api/player
 *
 * # Ask a teammate for a hint
 * curl -b cookies.txt -X POST http://localhost:8787/api/hint \
 *   -H 'Content-Type: application/json' -d '{"questionId":"py-medium-01","persona":"senior_dev"}'
 */

import type { SessionEngine } from './domain/engine';
import type { GameMode, PersonaId } from './domain/state';
import { isGameMode } from './domain/state';
import { InvalidInputError, isEngineError } from './domain/errors';
import { resolvePlayer } from './http/cookies';
import { generateUUID } from './http/uuid';
import { parseSessionState } from './http/state-serialization';
import { toTurnDTO, type ErrorDTO } from './http/dto';

export interface HandlerDeps {
	engine: SessionEngine;
	/** Mints player ids for the cookie; defaults to random UUIDs */
	createPlayerId?: () => string;
}

export interface HandlerOptions {
	allowedOrigins: readonly string[];
}

export type RequestHandler = (request: Request) => Promise<Response>;

// ============================================================================
// CORS
// ============================================================================

/**
 * Adds CORS headers when the request comes from an allowed origin.
 */
function addCorsHeaders(headers: Headers, request: Request, allowedOrigins: readonly string[]): Headers {
	const origin = request.headers.get('Origin');

	if (origin && allowedOrigins.includes(origin)) {
		headers.set('Access-Control-Allow-Origin', origin);
		headers.set('Access-Control-Allow-Credentials', 'true');
		headers.set('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
		headers.set('Access-Control-Allow-Headers', 'Content-Type, X-Player-Id');
		headers.set('Access-Control-Max-Age', '86400');
	}

	return headers;
}

// ============================================================================
// Request Parsing
// ============================================================================

async function readJsonObject(request: Request): Promise<Record<string, unknown>> {
	let body: unknown;
	try {
		body = await request.json();
	} catch {
		throw new InvalidInputError('Request body must be valid JSON');
	}
	if (typeof body !== 'object' || body === null || Array.isArray(body)) {
		throw new InvalidInputError('Request body must be a JSON object');
	}
	return Object.fromEntries(Object.entries(body));
}

function readRequiredString(body: Record<string, unknown>, field: string): string {
	const value = body[field];
	if (typeof value !== 'string' || value.trim() === '') {
		throw new InvalidInputError(`${field} is required`);
	}
	return value;
}

function readPersonas(value: unknown): PersonaId[] | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!Array.isArray(value) || value.length === 0) {
		throw new InvalidInputError('personas must be a non-empty array of strings');
	}
	const personas: PersonaId[] = [];
	for (const persona of value) {
		if (typeof persona !== 'string' || persona.trim() === '') {
			throw new InvalidInputError('personas must be a non-empty array of strings');
		}
		personas.push(persona);
	}
	return personas;
}

function readMode(value: unknown): GameMode | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!isGameMode(value)) {
		throw new InvalidInputError('mode must be one of story, adaptive, imposter');
	}
	return value;
}

/**
 * `answer` may be omitted or null (no answer this turn); otherwise a string.
 */
function readAnswer(value: unknown): string | null {
	if (value === undefined || value === null) {
		return null;
	}
	if (typeof value !== 'string') {
		throw new InvalidInputError('answer must be a string or null');
	}
	return value;
}

// ============================================================================
// Handler
// ============================================================================

export function createHandler(deps: HandlerDeps, options: HandlerOptions): RequestHandler {
	const { engine } = deps;
	const createPlayerId = deps.createPlayerId ?? generateUUID;

	async function route(request: Request, url: URL, playerId: string): Promise<Response> {
		// GET / - health check
		if (url.pathname === '/' && request.method === 'GET') {
			return new Response('Quiz chronicle backend is running', {
				headers: { 'Content-Type': 'text/plain; charset=utf-8' },
			});
		}

		// GET /api/masteries - distinct subjects in the question bank
		if (url.pathname === '/api/masteries' && request.method === 'GET') {
			const masteries = await engine.listMasteries();
			return Response.json({ masteries });
		}

		// GET /api/player - sessions this player has completed
		if (url.pathname === '/api/player' && request.method === 'GET') {
			const record = await engine.playerRecord(playerId);
			return Response.json(record);
		}

		// POST /api/sessions - starts a session and serves its first question
		if (url.pathname === '/api/sessions' && request.method === 'POST') {
			const body = await readJsonObject(request);
			const mastery = readRequiredString(body, 'mastery');
			const result = await engine.startSession({
				mastery,
				mode: readMode(body.mode),
				personas: readPersonas(body.personas),
				playerId,
			});
			return Response.json(toTurnDTO(result));
		}

		// POST /api/advance - evaluates an answer and moves the session on
		if (url.pathname === '/api/advance' && request.method === 'POST') {
			const body = await readJsonObject(request);
			const state = parseSessionState(body.state);
			const result = await engine.advance(state, readAnswer(body.answer), { playerId });
			return Response.json(toTurnDTO(result));
		}

		// POST /api/hint - advisory text, never touches state
		if (url.pathname === '/api/hint' && request.method === 'POST') {
			const body = await readJsonObject(request);
			const questionId = readRequiredString(body, 'questionId');
			const persona = typeof body.persona === 'string' && body.persona !== '' ? body.persona : 'senior_dev';
			const hint = await engine.hint(questionId, persona);
			return Response.json({ hint });
		}

		const notFound: ErrorDTO = { error: 'Not Found', code: 'not_found' };
		return Response.json(notFound, { status: 404 });
	}

	return async function handle(request: Request): Promise<Response> {
		const url = new URL(request.url);

		// CORS preflight
		if (request.method === 'OPTIONS') {
			const headers = addCorsHeaders(new Headers(), request, options.allowedOrigins);
			return new Response(null, { headers, status: 204 });
		}

		const player = resolvePlayer(request, createPlayerId);

		let response: Response;
		try {
			response = await route(request, url, player.playerId);
		} catch (error) {
			if (isEngineError(error)) {
				const body: ErrorDTO = { error: error.message, code: error.code };
				response = Response.json(body, { status: error.status });
			} else {
				console.error(`Unhandled error on ${request.method} ${url.pathname}:`, error);
				const body: ErrorDTO = { error: 'An unexpected error occurred', code: 'internal_error' };
				response = Response.json(body, { status: 500 });
			}
		}

		const headers = new Headers(response.headers);
		if (url.pathname.startsWith('/api/')) {
			headers.append('Set-Cookie', player.cookie);
		}
		addCorsHeaders(headers, request, options.allowedOrigins);

		return new Response(response.body, { status: response.status, headers });
	};
}
