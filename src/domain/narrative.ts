/**
 * Narrative layer: turns engine events into short player-facing summaries,
 * parses generated scenes, and supplies the offline scenes used when the
 * text-generation service is unavailable.
 */

import type { EngineEvent } from './events.js';
import type { SessionState } from './state.js';
import type { Question } from './questions.js';
import type { EvaluationResult } from './evaluation.js';
import { getPersonaProfile } from './prompts.js';
import { stripCodeFences } from './text-generation.js';

// ============================================================================
// Event Summaries
// ============================================================================

export type NarrativeTone = 'calm' | 'warm' | 'firm';

/**
 * NarrativeSummary: Minimal player-facing recap of a turn.
 */
export interface NarrativeSummary {
  tone: NarrativeTone;
  title: string; // <= 32 chars
  line: string; // <= 140 chars
}

/**
 * Summarizes events into a narrative recap.
 * Returns null if events are empty.
 *
 * Priority order:
 * 1. session_completed
 * 2. level_up
 * 3. badge_unlocked
 * 4. answer_evaluated
 * 5. question_served
 */
export function summarize(
  events: EngineEvent[],
  state: SessionState
): NarrativeSummary | null {
  if (events.length === 0) {
    return null;
  }

  for (const event of events) {
    if (event.type === 'session_completed') {
      return event.outcome === 'success'
        ? {
            tone: 'warm',
            title: 'Crisis averted',
            line: `Session complete at level ${state.level} with ${state.score} points.`,
          }
        : {
            tone: 'firm',
            title: 'System breached',
            line: 'Vitality ran out. Regroup and start a fresh session.',
          };
    }
  }

  for (const event of events) {
    if (event.type === 'level_up') {
      return {
        tone: 'warm',
        title: `Level ${event.newLevel} reached`,
        line: 'Your experience crossed the threshold. Something hostile has noticed.',
      };
    }
  }

  for (const event of events) {
    if (event.type === 'badge_unlocked') {
      return {
        tone: 'warm',
        title: 'Badge unlocked',
        line: `You earned ${formatBadge(event.badgeId)}.`,
      };
    }
  }

  for (const event of events) {
    if (event.type === 'answer_evaluated') {
      return event.isCorrect
        ? {
            tone: 'warm',
            title: 'Solution deployed',
            line: `Score ${Math.round(event.score)}. Streak at ${state.streak}.`,
          }
        : {
            tone: 'firm',
            title: 'Still compromised',
            line: `Score ${Math.round(event.score)}. Vitality at ${Math.round(state.vitality)}.`,
          };
    }
  }

  for (const event of events) {
    if (event.type === 'question_served') {
      return event.tier === 'boss'
        ? { tone: 'firm', title: 'Boss battle', line: 'The Warden steps out of the dark.' }
        : { tone: 'calm', title: 'New incident', line: 'Another system needs you.' };
    }
  }

  return null;
}

/**
 * Gets a human-readable label for a badge id: `code_warrior` → `Code Warrior`.
 */
export function formatBadge(badgeId: string): string {
  return badgeId
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}

// ============================================================================
// Scenes
// ============================================================================

/**
 * Narrative: The scene wrapped around the next question.
 * `degraded` marks offline text written without the generation service.
 */
export interface Narrative {
  text: string;
  callToAction: string;
  degraded: boolean;
}

const DEFAULT_CALL_TO_ACTION = 'Solve the challenge before the system collapses.';

/**
 * Parses a generated scene.
 *
 * Accepts strict JSON, JSON embedded in surrounding text, or bare prose
 * (used as the scene with a default call to action). Empty replies yield null.
 */
export function parseNarrative(reply: string): Omit<Narrative, 'degraded'> | null {
  const cleaned = stripCodeFences(reply);
  if (cleaned === '') {
    return null;
  }

  const candidates = [cleaned];
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(cleaned.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
      const chapter = record.narrative_chapter;
      if (typeof chapter === 'string' && chapter.trim() !== '') {
        const callToAction = record.call_to_action;
        return {
          text: chapter.trim(),
          callToAction:
            typeof callToAction === 'string' && callToAction.trim() !== ''
              ? callToAction.trim()
              : DEFAULT_CALL_TO_ACTION,
        };
      }
    }
  }

  // Prose without the JSON envelope is still a usable scene
  if (start === -1) {
    return { text: cleaned, callToAction: DEFAULT_CALL_TO_ACTION };
  }
  return null;
}

/**
 * One-line teammate reaction to the previous answer, rotating through the
 * session's personas.
 */
export function describeReaction(
  evaluation: EvaluationResult,
  state: SessionState
): string {
  const personas = Object.keys(state.teamTrust);
  if (personas.length === 0) {
    return evaluation.isCorrect
      ? 'System stabilizing. Threat neutralized for now.'
      : 'That did not hold. The system is still compromised.';
  }

  const persona = personas[state.sessionQuestionsAnswered % personas.length];
  const name = getPersonaProfile(persona).name;
  return evaluation.isCorrect
    ? `${name}: "Clean work. System stabilizing."`
    : `${name}: "That's not going to work. We need a different approach, fast!"`;
}

/**
 * Offline scene used when the generation service is unavailable or its
 * reply is unusable.
 */
export function fallbackNarrative(
  question: Question,
  state: SessionState,
  isBossBattle: boolean,
  lastEvaluation: EvaluationResult | null
): Narrative {
  const reaction = lastEvaluation ? `${describeReaction(lastEvaluation, state)}\n\n` : '';

  if (isBossBattle) {
    return {
      text: `${reaction}The Warden's firewall flickers into view, taunting you with its "flawless" defense: ${question.questionText}`,
      callToAction: "Break the Warden's defense.",
      degraded: true,
    };
  }

  return {
    text: `${reaction}URGENT: System crisis detected! ${question.title} requires immediate attention. ${question.questionText}`,
    callToAction: 'Decipher the fragment and restore the connection.',
    degraded: true,
  };
}

/**
 * Offline hint: nudges the player without revealing the answer.
 */
export function fallbackHint(question: Question, persona: string): string {
  const profile = getPersonaProfile(persona);
  return `${profile.name}: "Break '${question.title}' into the smallest case you can check by hand, then build up from there."`;
}
