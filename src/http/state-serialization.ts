/**
 * Session state (de)serialization for the wire.
 *
 * Converts between in-memory SessionState (badges as a Set) and the
 * JSON-friendly format clients hold between turns (badges as string[]).
 * Incoming state is untrusted: every field is checked before the engine
 * sees it.
 */

import type { GameMode, SessionOutcome, SessionState, SessionStatus } from '../domain/state';
import { createSessionState, isGameMode } from '../domain/state';
import { InvalidInputError } from '../domain/errors';

/**
 * Wire format of SessionState.
 */
export type SerializedSessionState = Omit<SessionState, 'badges'> & { badges: string[] };

/**
 * Converts SessionState to wire format (Set → string[]).
 */
export function serializeState(state: SessionState): SerializedSessionState {
  return {
    ...state,
    badges: Array.from(state.badges),
    teamTrust: { ...state.teamTrust },
    servedQuestionIds: [...state.servedQuestionIds],
  };
}

// ============================================================================
// Parsing
// ============================================================================

const STATUSES: readonly SessionStatus[] = ['in_progress', 'boss_battle', 'completed'];
const OUTCOMES: readonly SessionOutcome[] = ['success', 'failure'];

function fail(field: string, expectation: string): never {
  throw new InvalidInputError(`state.${field} must be ${expectation}`);
}

function requireString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim() === '') {
    fail(field, 'a non-empty string');
  }
  return value;
}

function requireNumber(record: Record<string, unknown>, field: string): number {
  const value = record[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail(field, 'a finite number');
  }
  return value;
}

function requireBoolean(record: Record<string, unknown>, field: string): boolean {
  const value = record[field];
  if (typeof value !== 'boolean') {
    fail(field, 'a boolean');
  }
  return value;
}

function parseMode(value: unknown): GameMode {
  if (!isGameMode(value)) {
    fail('mode', 'one of story, adaptive, imposter');
  }
  return value;
}

function parseStatus(value: unknown): SessionStatus {
  const status = STATUSES.find((candidate) => candidate === value);
  if (!status) {
    fail('status', `one of ${STATUSES.join(', ')}`);
  }
  return status;
}

function parseOutcome(value: unknown): SessionOutcome | null {
  if (value === null || value === undefined) {
    return null;
  }
  const outcome = OUTCOMES.find((candidate) => candidate === value);
  if (!outcome) {
    fail('outcome', 'success, failure or null');
  }
  return outcome;
}

function parseStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    fail(field, 'an array of strings');
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      fail(field, 'an array of strings');
    }
    items.push(item);
  }
  return items;
}

function parseTeamTrust(value: unknown): Record<string, number> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    fail('teamTrust', 'an object of numbers');
  }
  const trust: Record<string, number> = {};
  for (const [persona, level] of Object.entries(value)) {
    if (typeof level !== 'number' || !Number.isFinite(level)) {
      fail(`teamTrust.${persona}`, 'a finite number');
    }
    trust[persona] = level;
  }
  return trust;
}

function parseCurrentQuestionId(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string' || value === '') {
    fail('currentQuestionId', 'a non-empty string or null');
  }
  return value;
}

/**
 * Parses client-supplied state into a SessionState.
 *
 * Types are checked strictly; out-of-range values are then clamped by the
 * state constructor. Throws InvalidInputError on the first bad field.
 */
export function parseSessionState(raw: unknown): SessionState {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidInputError('state must be an object');
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  return createSessionState({
    sessionId: requireString(record, 'sessionId'),
    mode: parseMode(record.mode),
    mastery: requireString(record, 'mastery'),
    difficultyCursor: requireNumber(record, 'difficultyCursor'),
    score: requireNumber(record, 'score'),
    experiencePoints: requireNumber(record, 'experiencePoints'),
    level: requireNumber(record, 'level'),
    streak: requireNumber(record, 'streak'),
    vitality: requireNumber(record, 'vitality'),
    rollingPerformance: requireNumber(record, 'rollingPerformance'),
    badges: parseStringArray(record.badges, 'badges'),
    teamTrust: parseTeamTrust(record.teamTrust),
    sessionQuestionsAnswered: requireNumber(record, 'sessionQuestionsAnswered'),
    bossReady: requireBoolean(record, 'bossReady'),
    bossActive: requireBoolean(record, 'bossActive'),
    status: parseStatus(record.status),
    outcome: parseOutcome(record.outcome),
    currentQuestionId: parseCurrentQuestionId(record.currentQuestionId),
    servedQuestionIds: parseStringArray(record.servedQuestionIds, 'servedQuestionIds'),
  });
}
