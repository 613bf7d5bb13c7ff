/**
 * HTTP DTOs for API requests and responses.
 *
 * These types represent the external API contract. Responses never carry a
 * question's expected outcome.
 */

import type { SessionOutcome, SessionStatus } from '../domain/state';
import type { SanitizedQuestion } from '../domain/questions';
import type { EngineEvent } from '../domain/events';
import type { EvaluationResult } from '../domain/evaluation';
import type { Narrative, NarrativeSummary } from '../domain/narrative';
import type { TurnResult } from '../domain/engine';
import type { ErrorCode } from '../domain/errors';
import type { SerializedSessionState } from './state-serialization';
import { serializeState } from './state-serialization';

/**
 * TurnDTO: Body of POST /api/sessions and POST /api/advance.
 *
 * `state` is what the client sends back on its next turn.
 */
export interface TurnDTO {
  status: SessionStatus;
  outcome: SessionOutcome | null;
  state: SerializedSessionState;
  evaluation: EvaluationResult | null;
  events: EngineEvent[];
  summary: NarrativeSummary | null;
  question: SanitizedQuestion | null;
  narrative: Narrative | null;
}

export interface ErrorDTO {
  error: string;
  code: ErrorCode;
}

export function toTurnDTO(result: TurnResult): TurnDTO {
  return {
    status: result.status,
    outcome: result.outcome ?? null,
    state: serializeState(result.updatedState),
    evaluation: result.evaluation,
    events: result.events,
    summary: result.summary,
    question: result.nextQuestion ?? null,
    narrative: result.narrative ?? null,
  };
}
