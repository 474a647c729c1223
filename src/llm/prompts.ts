/**
 * Prompt builders for the language-model collaborators.
 */

import { renderContext } from '../dialogue/index.js';
import type { ConversationTurn, DistilledContext } from '../types/index.js';
import { ACTION_TYPES } from '../types/index.js';
import type { Message } from './provider.js';

/**
 * A persona the generator can speak as.
 */
export interface PersonaPrompt {
  name: string;
  persona: string;
}

/**
 * Roster entry shown to the router.
 */
export interface RosterEntry {
  name: string;
  description: string;
}

const CARE_TEAM_CONTRACT = `Respond with a single JSON object and nothing else:
{"message": "<what you say to the member>", "action": {"type": "${ACTION_TYPES.none}", "payload": {}}}

Available action types:
- ${ACTION_TYPES.none}: no side effect
- ${ACTION_TYPES.updateNarrativeFlag}: record a fact about the engagement, payload {"flag": "<snake_case_name>", "value": <any JSON value>}
  e.g. {"flag": "consultation_scheduled", "value": true}
- ${ACTION_TYPES.initiateSickDayProtocol}: payload {"reason": "<why>"}
- ${ACTION_TYPES.flagForExpert}: payload {"expert": "<team member>", "reason": "<why>"}`;

const MEMBER_CONTRACT = `Respond with a single JSON object and nothing else.
When asking a new question: {"question": "<your message>"}
When replying to a message: {"reply": "<your message>"}`;

/**
 * Messages for a care-team member responding to a trigger.
 */
export function buildResponderMessages(
  persona: PersonaPrompt,
  context: DistilledContext,
  trigger: string
): Message[] {
  const system = [
    `You are ${persona.name}, part of a health-coaching care team working with ${context.member.name}.`,
    persona.persona,
    'Write the way a real person writes in a chat app: short, warm, specific. No sign-offs.',
    '',
    CARE_TEAM_CONTRACT,
  ].join('\n');

  const user = [renderContext(context), '', `## Trigger`, trigger].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}

/**
 * Messages for the member writing to the care team.
 */
export function buildMemberMessages(
  persona: PersonaPrompt,
  context: DistilledContext,
  trigger: string
): Message[] {
  const system = [
    `You are ${persona.name}, a client of a health-coaching service, chatting with your care team.`,
    persona.persona,
    `Your goals:\n${context.member.goals.map((goal) => `- ${goal}`).join('\n')}`,
    'Keep messages brief, like chat messages. Do not repeat questions you already asked.',
    '',
    MEMBER_CONTRACT,
  ].join('\n');

  const user = [renderContext(context), '', '## Task', trigger].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}

/**
 * Messages asking the router to pick one roster name.
 */
export function buildRoutingMessages(
  question: string,
  history: readonly ConversationTurn[],
  roster: readonly RosterEntry[]
): Message[] {
  const system = [
    'You route client questions to the best-suited member of a health-coaching care team.',
    'Team:',
    ...roster.map((entry) => `- ${entry.name}: ${entry.description}`),
    '',
    'Answer with exactly one name from the team list and nothing else.',
  ].join('\n');

  const transcript =
    history.length === 0
      ? '(no prior messages)'
      : history.map((turn) => `[${turn.timestamp}] ${turn.source}: ${turn.content}`).join('\n');

  const user = ['## Recent conversation', transcript, '', '## Question', question].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}
