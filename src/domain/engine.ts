/**
 * Session engine: orchestration layer for one request/response turn.
 *
 * Coordinates the answer evaluator, the pure transitions, the progression
 * policy and the question selector. Collaborators (question repository,
 * text generator, session ledger) are injected so the engine keeps no
 * process-wide state and tests can substitute in-process fakes.
 *
 * Turn sequence: evaluate (fully resolved, success or fallback) → mutate →
 * terminal checks → pick the next question → narrate. Nothing is mutated
 * before the evaluation has resolved.
 */

import type {
  GameMode,
  PersonaId,
  SessionOutcome,
  SessionState,
  SessionStatus,
} from './state.js';
import { DEFAULT_PERSONAS, SCALAR_MAX, createSessionState } from './state.js';
import type { Question, QuestionId, QuestionRepository, SanitizedQuestion } from './questions.js';
import { sanitizeQuestion } from './questions.js';
import type { EngineEvent, SessionCompletedEvent } from './events.js';
import type { EvaluationResult } from './evaluation.js';
import { evaluateAnswer } from './evaluation.js';
import type { TextGenerator } from './text-generation.js';
import { callGenerator, DEFAULT_TIMEOUT_MS } from './text-generation.js';
import { applyEvaluation, applyQuestionServed, applySessionCompleted } from './transitions.js';
import { nextDifficulty } from './progression.js';
import type { SelectionStrategy } from './selector.js';
import { selectQuestion } from './selector.js';
import type { Narrative, NarrativeSummary } from './narrative.js';
import { fallbackHint, fallbackNarrative, parseNarrative, summarize } from './narrative.js';
import { buildHintPrompt, buildNarrativePrompt } from './prompts.js';
import { InvalidInputError, NotFoundError, SessionCompletedError } from './errors.js';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * PlayerRecord: Completed sessions the ledger still remembers for a player.
 */
export interface PlayerRecord {
  playerId: string;
  sessionsCompleted: number;
  successes: number;
  failures: number;
}

/**
 * SessionLedger: Remembers which sessions have completed, and for whom.
 *
 * Completed sessions are rejected even when a client replays an older,
 * still in-progress snapshot of the same session id.
 */
export interface SessionLedger {
  isClosed(sessionId: string): Promise<boolean>;
  close(sessionId: string, outcome: SessionOutcome, playerId: string | null): Promise<void>;
  recordFor(playerId: string): Promise<PlayerRecord>;
}

export interface EngineDeps {
  repository: QuestionRepository;
  /** Null when no generation service is configured; fallbacks are used */
  generator: TextGenerator | null;
  ledger: SessionLedger;
  createSessionId: () => string;
  /** Defaults to sequential */
  selection?: SelectionStrategy;
  /** Random source for the random selection strategy; defaults to Math.random */
  random?: () => number;
  /** Bound on every generation call; defaults to DEFAULT_TIMEOUT_MS */
  timeoutMs?: number;
}

// ============================================================================
// Turn Result
// ============================================================================

/**
 * TurnResult: What one `advance()` returns.
 *
 * `nextQuestion` and `narrative` are present exactly when the session is
 * still running; `outcome` exactly when it has completed.
 */
export interface TurnResult {
  status: SessionStatus;
  outcome?: SessionOutcome;
  updatedState: SessionState;
  evaluation: EvaluationResult | null;
  events: EngineEvent[];
  summary: NarrativeSummary | null;
  nextQuestion?: SanitizedQuestion;
  narrative?: Narrative;
}

/** Who a turn is played for; the ledger records it when the session completes */
export interface TurnContext {
  playerId?: string;
}

export interface StartSessionOptions extends TurnContext {
  mastery: string;
  mode?: GameMode;
  /** Team personas tracked by team trust; defaults to the standard three */
  personas?: PersonaId[];
}

export interface SessionEngine {
  startSession(options: StartSessionOptions): Promise<TurnResult>;
  advance(state: SessionState, answer: string | null, context?: TurnContext): Promise<TurnResult>;
  hint(questionId: QuestionId, persona: PersonaId): Promise<string>;
  listMasteries(): Promise<string[]>;
  playerRecord(playerId: string): Promise<PlayerRecord>;
}

// ============================================================================
// Engine
// ============================================================================

function badgesIn(events: EngineEvent[]): string[] {
  const badges: string[] = [];
  for (const event of events) {
    if (event.type === 'badge_unlocked') {
      badges.push(event.badgeId);
    }
  }
  return badges;
}

export function createSessionEngine(deps: EngineDeps): SessionEngine {
  const { repository, generator, ledger } = deps;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const selectionOptions = {
    strategy: deps.selection ?? 'sequential',
    random: deps.random ?? Math.random,
  };

  async function requireQuestion(id: QuestionId): Promise<Question> {
    const question = await repository.findById(id);
    if (!question) {
      throw new NotFoundError(`Question ${id} not found`);
    }
    return question;
  }

  /** A state pointing at a question the repository never had is corrupt input */
  async function requireCurrentQuestion(id: QuestionId): Promise<Question> {
    const question = await repository.findById(id);
    if (!question) {
      throw new InvalidInputError(`Session references unknown question ${id}`);
    }
    return question;
  }

  async function requireMastery(mastery: string): Promise<void> {
    const count = await repository.countByMastery(mastery);
    if (count === 0) {
      throw new InvalidInputError(`No questions exist for mastery "${mastery}"`);
    }
  }

  async function narrate(
    question: Question,
    state: SessionState,
    lastEvaluation: EvaluationResult | null,
    earnedBadges: string[]
  ): Promise<Narrative> {
    const prompt = buildNarrativePrompt({
      mode: state.mode,
      isBossBattle: state.bossActive,
      question,
      state,
      lastEvaluation,
      earnedBadges,
    });

    const reply = await callGenerator(generator, prompt, timeoutMs);
    if (reply.ok) {
      const parsed = parseNarrative(reply.value);
      if (parsed) {
        return { ...parsed, degraded: false };
      }
      console.warn(`Unusable narrative reply for question ${question.id}; using offline scene`);
    } else {
      console.warn(`Narrative service unavailable (${reply.error.reason}); using offline scene`);
    }

    return fallbackNarrative(question, state, state.bossActive, lastEvaluation);
  }

  async function present(
    state: SessionState,
    question: Question,
    events: EngineEvent[],
    evaluation: EvaluationResult | null
  ): Promise<TurnResult> {
    const narrative = await narrate(question, state, evaluation, badgesIn(events));
    return {
      status: state.status,
      updatedState: state,
      evaluation,
      events,
      summary: summarize(events, state),
      nextQuestion: sanitizeQuestion(question),
      narrative,
    };
  }

  async function complete(
    state: SessionState,
    outcome: SessionOutcome,
    reason: SessionCompletedEvent['reason'],
    events: EngineEvent[],
    evaluation: EvaluationResult | null,
    context: TurnContext
  ): Promise<TurnResult> {
    const done = applySessionCompleted(state, outcome, reason);
    await ledger.close(state.sessionId, outcome, context.playerId ?? null);
    console.log(`Session ${state.sessionId} completed: ${outcome} (${reason})`);

    const allEvents = [...events, ...done.events];
    return {
      status: 'completed',
      outcome,
      updatedState: done.state,
      evaluation,
      events: allEvents,
      summary: summarize(allEvents, done.state),
    };
  }

  async function serveNext(
    state: SessionState,
    events: EngineEvent[],
    evaluation: EvaluationResult | null,
    context: TurnContext
  ): Promise<TurnResult> {
    const decision = nextDifficulty(state);
    const selection = await selectQuestion(
      repository,
      {
        tier: decision.tier,
        mastery: decision.mastery,
        cursor: state.difficultyCursor,
        exclude: state.servedQuestionIds,
      },
      selectionOptions
    );

    // An exhausted repository is the natural end of a session, not an error
    if (!selection) {
      return complete(state, 'success', 'questions_exhausted', events, evaluation, context);
    }

    const served = applyQuestionServed(state, selection.question, selection.widened);
    return present(served.state, selection.question, [...events, ...served.events], evaluation);
  }

  async function advance(
    state: SessionState,
    answer: string | null,
    context: TurnContext = {}
  ): Promise<TurnResult> {
    if (state.status === 'completed' || (await ledger.isClosed(state.sessionId))) {
      throw new SessionCompletedError(state.sessionId);
    }

    if (answer === null) {
      if (state.currentQuestionId === null) {
        await requireMastery(state.mastery);
        return serveNext(state, [], null, context);
      }
      // Retry of a turn already served: same question, fresh scene, no mutation
      const current = await requireCurrentQuestion(state.currentQuestionId);
      return present(state, current, [], null);
    }

    if (state.currentQuestionId === null) {
      throw new InvalidInputError('An answer was submitted but no question is awaiting one');
    }

    const question = await requireCurrentQuestion(state.currentQuestionId);
    const evaluation = await evaluateAnswer(answer, question, generator, timeoutMs);
    const events: EngineEvent[] = [
      {
        type: 'answer_evaluated',
        questionId: question.id,
        isCorrect: evaluation.isCorrect,
        score: evaluation.score,
        source: evaluation.source,
      },
    ];

    const mutated = applyEvaluation(state, evaluation);
    events.push(...mutated.events);

    if (mutated.state.vitality <= 0) {
      return complete(mutated.state, 'failure', 'vitality_depleted', events, evaluation, context);
    }
    if (state.bossActive && evaluation.isCorrect) {
      return complete(mutated.state, 'success', 'boss_defeated', events, evaluation, context);
    }

    return serveNext(mutated.state, events, evaluation, context);
  }

  async function startSession(options: StartSessionOptions): Promise<TurnResult> {
    const mastery = options.mastery.trim();
    if (mastery === '') {
      throw new InvalidInputError('A mastery is required to start a session');
    }

    const personas = options.personas ?? DEFAULT_PERSONAS;
    const state = createSessionState({
      sessionId: deps.createSessionId(),
      mastery,
      mode: options.mode ?? 'story',
      teamTrust: Object.fromEntries(personas.map((persona) => [persona, SCALAR_MAX])),
    });

    return advance(state, null, { playerId: options.playerId });
  }

  async function hint(questionId: QuestionId, persona: PersonaId): Promise<string> {
    const question = await requireQuestion(questionId);
    const reply = await callGenerator(generator, buildHintPrompt(question, persona), timeoutMs);
    if (reply.ok && reply.value.trim() !== '') {
      return reply.value.trim();
    }
    return fallbackHint(question, persona);
  }

  return {
    startSession,
    advance,
    hint,
    listMasteries: () => repository.listMasteries(),
    playerRecord: (playerId) => ledger.recordFor(playerId),
  };
}
