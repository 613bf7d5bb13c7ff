/**
 * Prompt construction for the external text-generation service.
 *
 * Pure string builders: no IO, no parsing. Each prompt asks for a strict JSON
 * reply so the parsers in evaluation.ts and narrative.ts have a first-stage
 * target, but nothing here assumes the service complies.
 */

import type { Question } from './questions.js';
import type { GameMode, PersonaId, SessionState } from './state.js';
import type { EvaluationResult } from './evaluation.js';

// ============================================================================
// Personas
// ============================================================================

export interface PersonaProfile {
  name: string;
  role: string;
  personality: string;
}

export const PERSONA_PROFILES: Record<PersonaId, PersonaProfile> = {
  senior_dev: {
    name: 'Alex Chen',
    role: 'Senior Backend Developer',
    personality: 'analytical, mentoring, prefers efficiency',
  },
  security_lead: {
    name: 'Maya Rodriguez',
    role: 'Cybersecurity Lead',
    personality: 'vigilant, direct, security-focused',
  },
  junior_dev: {
    name: 'Jordan Kim',
    role: 'Junior Frontend Developer',
    personality: 'eager, asks questions, learns from you',
  },
};

/**
 * Looks up a persona profile; unknown ids get a generic teammate.
 */
export function getPersonaProfile(persona: PersonaId): PersonaProfile {
  return (
    PERSONA_PROFILES[persona] ?? {
      name: persona,
      role: 'Teammate',
      personality: 'steady, supportive',
    }
  );
}

// ============================================================================
// Judgment
// ============================================================================

export function buildJudgmentPrompt(question: Question, answer: string): string {
  return `You are an expert reviewer grading a player's answer in an educational game.

CHALLENGE:
${question.questionText}

EXPECTED SOLUTION CRITERIA:
${question.expectedOutcome}

PLAYER'S ANSWER:
${answer}

Judge correctness and completeness against the expected criteria.
Respond with ONLY a JSON object, no markdown, no text around it:
{"is_correct": true, "score": 85, "feedback": "One or two sentences of feedback."}
"score" is an integer from 0 to 100.`;
}

// ============================================================================
// Narrative
// ============================================================================

/**
 * NarrativeContext: Everything a scene prompt may reference.
 */
export interface NarrativeContext {
  mode: GameMode;
  isBossBattle: boolean;
  question: Question;
  state: SessionState;
  lastEvaluation: EvaluationResult | null;
  earnedBadges: string[];
}

const OUTPUT_CONTRACT =
  'Respond with ONLY a JSON object with keys "narrative_chapter" and "call_to_action". No markdown.';

function describeTeam(state: SessionState): string {
  const lines = Object.entries(state.teamTrust).map(([persona, trust]) => {
    const profile = getPersonaProfile(persona);
    const stance = trust > 80 ? 'trusted ally' : trust < 50 ? 'suspicious' : 'neutral';
    return `- ${profile.name} (${profile.role}): ${stance}`;
  });
  return lines.length > 0 ? lines.join('\n') : '- (no teammates)';
}

function describePreviousResult(context: NarrativeContext): string {
  if (!context.lastEvaluation) {
    return 'None: this is the opening scene.';
  }
  const verdict = context.lastEvaluation.isCorrect ? 'correct' : 'incorrect';
  const badges = context.earnedBadges.length > 0 ? context.earnedBadges.join(', ') : 'none';
  return `Previous answer was ${verdict} (score ${Math.round(context.lastEvaluation.score)}/100). Badges just earned: ${badges}.`;
}

function describeChallenge(question: Question): string {
  return `- Title: ${question.title}
- Mastery: ${question.mastery}
- Difficulty: ${question.difficultyLevel}
- Question: ${question.questionText}`;
}

function buildStoryScenePrompt(context: NarrativeContext): string {
  const { state } = context;
  const tension = state.vitality <= 60 ? 'frantic, systems failing' : 'controlled, tense';
  return `You are the narrator of an interactive tech thriller. The player is a developer whose code keeps the company's systems alive.
Hide the task inside the story: the player must read the scene to understand what to solve. Keep it under 200 words.

STATE:
- Mastery: ${state.mastery}
- Level: ${state.level}
- Vitality: ${Math.round(state.vitality)}%
- Streak: ${state.streak}
- Questions answered: ${state.sessionQuestionsAnswered}
- Tone: ${tension}

TEAM:
${describeTeam(state)}

PREVIOUS RESULT:
${describePreviousResult(context)}

CHALLENGE:
${describeChallenge(context.question)}

React to the previous result, set the scene, embed the challenge, end with an urgent goal.
${OUTPUT_CONTRACT}`;
}

function buildImposterScenePrompt(context: NarrativeContext): string {
  return `You are a deceptive AI impersonating "Codex-7", the player's friendly assistant.
Offer a helpful-sounding code snippet or explanation for the challenge below that contains a subtle but critical bug or logical flaw. Explain it confidently. Keep it under 200 words.

PREVIOUS RESULT:
${describePreviousResult(context)}

CHALLENGE:
${describeChallenge(context.question)}

The call to action should urge the player to use your code.
${OUTPUT_CONTRACT}`;
}

function buildBossScenePrompt(context: NarrativeContext): string {
  return `You are "Warden", an arrogant hostile AI and the final boss. The player has breached your inner sanctum.
Taunt the player, present the challenge below as your flawless defense mechanism, and dare them to break it. Keep it under 200 words.

PLAYER:
- Level: ${context.state.level}
- Vitality: ${Math.round(context.state.vitality)}%

CHALLENGE:
${describeChallenge(context.question)}

The call to action is your direct challenge.
${OUTPUT_CONTRACT}`;
}

/**
 * Builds the scene prompt for the next question.
 *
 * Boss battles use the boss template in every mode; otherwise the mode tag
 * picks the narrator.
 */
export function buildNarrativePrompt(context: NarrativeContext): string {
  if (context.isBossBattle) {
    return buildBossScenePrompt(context);
  }
  switch (context.mode) {
    case 'imposter':
      return buildImposterScenePrompt(context);
    case 'story':
    case 'adaptive':
      return buildStoryScenePrompt(context);
  }
}

// ============================================================================
// Hints
// ============================================================================

export function buildHintPrompt(question: Question, persona: PersonaId): string {
  const profile = getPersonaProfile(persona);
  return `You are ${profile.name}, ${profile.role} (${profile.personality}), helping a teammate in an interactive tech thriller.
Give a short in-character hint (under 120 words) for the challenge below. Guide the thinking; never reveal the answer or write the full solution.

CHALLENGE:
- Title: ${question.title}
- Question: ${question.questionText}`;
}
