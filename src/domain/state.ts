/**
 * Canonical session state definitions for the quiz-chronicle engine.
 *
 * This file defines the present-tense state of one player session and the
 * constructor that enforces its invariants:
 * - Bounded scalars (vitality, rolling performance, team trust) stay in [0, 100]
 * - Counters never go below their minimum
 * - Badges are a set: unique, insertion-ordered
 * - A question id appears at most once in servedQuestionIds
 *
 * Non-goals (not included):
 * - Answers, scores per question or event logs (present-tense only)
 * - Persistence concerns
 * - UI state or presentation data
 */

// ============================================================================
// Modes and Status
// ============================================================================

/**
 * GameMode: Strategy tag shared by progression and narrative.
 *
 * - story: fixed difficulty ladder, narrator frames each question as a scene
 * - adaptive: ladder nudged by rolling performance
 * - imposter: fixed ladder, narrator is a teammate offering flawed code
 */
export type GameMode = 'story' | 'adaptive' | 'imposter';

export const GAME_MODES: readonly GameMode[] = ['story', 'adaptive', 'imposter'];

/**
 * SessionStatus: Exactly one of these describes a session at any time.
 */
export type SessionStatus = 'in_progress' | 'boss_battle' | 'completed';

export type SessionOutcome = 'success' | 'failure';

// ============================================================================
// Personas
// ============================================================================

/**
 * PersonaId: NPC teammate identifier used as a team trust key.
 */
export type PersonaId = string;

export const DEFAULT_PERSONAS: readonly PersonaId[] = [
  'senior_dev',
  'security_lead',
  'junior_dev',
];

export type TeamTrust = Record<PersonaId, number>;

// ============================================================================
// Bounds
// ============================================================================

export const SCALAR_MIN = 0;
export const SCALAR_MAX = 100;

/**
 * Clamps a bounded scalar into [0, 100]. NaN collapses to the lower bound.
 */
export function clampScalar(value: number): number {
  if (Number.isNaN(value)) {
    return SCALAR_MIN;
  }
  return Math.min(SCALAR_MAX, Math.max(SCALAR_MIN, value));
}

function floorCounter(value: number | undefined, minimum: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(minimum, Math.floor(value));
}

// ============================================================================
// Session State
// ============================================================================

/**
 * SessionState: Everything the engine needs to decide the next turn.
 *
 * The whole value travels with every request, so the server keeps no
 * per-session mutable state. Only StateMutator (transitions.ts) and the
 * engine's status bookkeeping produce new values; neither mutates in place.
 */
export interface SessionState {
  sessionId: string;
  mode: GameMode;
  /** Subject filter, chosen once per session */
  mastery: string;
  /** Offset into the difficulty-sorted question sequence; never decreases */
  difficultyCursor: number;
  score: number;
  experiencePoints: number;
  level: number;
  /** Consecutive correct answers; 0 after any incorrect answer */
  streak: number;
  /** Session health in [0, 100]; reaching 0 ends the session in failure */
  vitality: number;
  /** Exponential moving average of evaluation scores, in [0, 100] */
  rollingPerformance: number;
  badges: Set<string>;
  teamTrust: TeamTrust;
  sessionQuestionsAnswered: number;
  /** Forces the next served question to the boss tier */
  bossReady: boolean;
  /** The question awaiting an answer is a boss question */
  bossActive: boolean;
  status: SessionStatus;
  outcome: SessionOutcome | null;
  currentQuestionId: string | null;
  /** Every question served this session, in order; none is served twice */
  servedQuestionIds: string[];
}

/**
 * SessionStateInit: Loosely specified input for the state constructor.
 */
export type SessionStateInit = Partial<
  Omit<SessionState, 'badges' | 'sessionId' | 'mastery' | 'servedQuestionIds'>
> & {
  sessionId: string;
  mastery: string;
  badges?: Iterable<string>;
  servedQuestionIds?: Iterable<string>;
};

/**
 * Builds a SessionState, filling defaults and enforcing bounds.
 *
 * Scalars are clamped, counters floored, badges and served ids
 * de-duplicated, and team trust defaults to the three standard personas at
 * full trust.
 */
export function createSessionState(init: SessionStateInit): SessionState {
  const teamTrust: TeamTrust = {};
  const trustSource =
    init.teamTrust ?? Object.fromEntries(DEFAULT_PERSONAS.map((persona) => [persona, SCALAR_MAX]));
  for (const [persona, trust] of Object.entries(trustSource)) {
    teamTrust[persona] = clampScalar(trust);
  }

  const status = init.status ?? 'in_progress';

  return {
    sessionId: init.sessionId,
    mode: init.mode ?? 'story',
    mastery: init.mastery,
    difficultyCursor: floorCounter(init.difficultyCursor, 0, 0),
    score: floorCounter(init.score, 0, 0),
    experiencePoints: floorCounter(init.experiencePoints, 0, 0),
    level: floorCounter(init.level, 1, 1),
    streak: floorCounter(init.streak, 0, 0),
    vitality: clampScalar(init.vitality ?? SCALAR_MAX),
    rollingPerformance: clampScalar(init.rollingPerformance ?? SCALAR_MAX),
    badges: new Set(init.badges ?? []),
    teamTrust,
    sessionQuestionsAnswered: floorCounter(init.sessionQuestionsAnswered, 0, 0),
    bossReady: init.bossReady ?? false,
    bossActive: init.bossActive ?? false,
    status,
    // outcome only has meaning once the session is over
    outcome: status === 'completed' ? init.outcome ?? null : null,
    currentQuestionId: init.currentQuestionId ?? null,
    servedQuestionIds: Array.from(new Set(init.servedQuestionIds ?? [])),
  };
}

/**
 * Copies a state so the result shares no mutable structure with the input.
 */
export function cloneSessionState(state: SessionState): SessionState {
  return {
    ...state,
    badges: new Set(state.badges),
    teamTrust: { ...state.teamTrust },
    servedQuestionIds: [...state.servedQuestionIds],
  };
}

export function isGameMode(value: unknown): value is GameMode {
  return typeof value === 'string' && GAME_MODES.some((mode) => mode === value);
}
