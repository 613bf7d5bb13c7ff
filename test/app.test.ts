import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config';

beforeEach(() => {
	vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
	vi.restoreAllMocks();
});

describe('createApp without external services', () => {
	it('serves the bundled seed bank', async () => {
		const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const handle = createApp(loadConfig({}));

		const response = await handle(new Request('http://localhost/api/masteries'));

		expect(await response.json()).toEqual({ masteries: ['mathematics', 'python'] });
		expect(warnSpy).toHaveBeenCalledWith('GEMINI_API_KEY not set; using offline evaluation and scenes');
	});

	it('plays with offline scenes', async () => {
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		const handle = createApp(loadConfig({}));

		const response = await handle(
			new Request('http://localhost/api/sessions', {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify({ mastery: 'mathematics' }),
			})
		);
		const turn = await response.json();

		expect(response.status).toBe(200);
		expect(turn.question.difficultyLevel).toBe('medium');
		expect(turn.narrative.degraded).toBe(true);
	});
});
