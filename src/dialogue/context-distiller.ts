import type { SimulationState } from '../core/simulation-state.js';
import type { ConversationTurn, DistilledContext, SimEvent } from '../types/index.js';
import { getMessageContent } from '../types/index.js';

/** Non-message events this recent (in days) count as critical. */
export const CRITICAL_WINDOW_DAYS = 1.0;

/** Number of recent messages included in every context. */
export const RECENT_MESSAGE_LIMIT = 15;

function toTurn(event: SimEvent): ConversationTurn {
  return {
    day: event.day,
    timestamp: event.timestamp,
    source: event.source,
    content: getMessageContent(event),
  };
}

/**
 * Most recent MESSAGE events, oldest first.
 */
export function recentConversation(
  state: SimulationState,
  limit = RECENT_MESSAGE_LIMIT
): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  const events = state.eventLog.all();
  for (let i = events.length - 1; i >= 0 && turns.length < limit; i--) {
    const event = events[i];
    if (event?.type === 'MESSAGE') {
      turns.push(toTurn(event));
    }
  }
  return turns.reverse();
}

/**
 * Build the bounded snapshot a collaborator sees when `requester` is asked to speak.
 */
export function distillContext(state: SimulationState, requester: string): DistilledContext {
  const day = state.currentDay;
  const windowStart = day - CRITICAL_WINDOW_DAYS;
  const { memberProfile, healthData, interventionPlan, logistics } = state;

  const criticalEvents: SimEvent[] = [];
  const events = state.eventLog.all();
  // Log is day-ordered, so walk back until the window closes
  for (let i = events.length - 1; i >= 0; i--) {
    const event = events[i];
    if (!event || event.day < windowStart) break;
    if (event.type !== 'MESSAGE') {
      // Copies: collaborators must not reach the log through their context
      criticalEvents.push({ ...event, payload: structuredClone(event.payload) });
    }
  }
  criticalEvents.reverse();

  return {
    day,
    timestamp: state.currentTimestamp(),
    member: {
      name: memberProfile.name,
      age: memberProfile.age,
      goals: [...memberProfile.goals],
    },
    location: logistics.location,
    isTraveling: logistics.isTraveling,
    activeIssue: state.activeIssue ?? null,
    adherenceStatus: interventionPlan.adherenceStatus,
    narrativeFlags: state.narrativeFlagsSnapshot(),
    labResults: healthData.labResults ? { ...healthData.labResults } : null,
    wearables: { ...healthData.wearableStream },
    criticalEvents,
    recentMessages: recentConversation(state),
    ownRecentMessages: [...state.recentMessagesBy(requester)],
  };
}

function formatDay(day: number): string {
  return day.toFixed(2);
}

/**
 * Render a distilled context as prompt text.
 */
export function renderContext(context: DistilledContext): string {
  const lines: string[] = [];

  lines.push(`## Current situation (day ${formatDay(context.day)}, ${context.timestamp})`);
  lines.push(`Member: ${context.member.name}, ${String(context.member.age)}`);
  lines.push(
    `Location: ${context.location}${context.isTraveling ? ' (traveling)' : ''}`
  );
  lines.push(`Active health issue: ${context.activeIssue ?? 'none'}`);
  lines.push(`Plan adherence: ${context.adherenceStatus}`);

  const wearables = Object.entries(context.wearables);
  if (wearables.length > 0) {
    lines.push(`Wearables: ${wearables.map(([k, v]) => `${k}=${String(v)}`).join(', ')}`);
  }
  if (context.labResults) {
    const labs = context.labResults;
    lines.push(
      `Latest labs (day ${formatDay(labs.lastTestDay)}): cholesterol ${String(labs.cholesterol)}, blood pressure ${labs.bloodPressure}`
    );
  }

  lines.push('');
  lines.push('## Member goals');
  context.member.goals.forEach((goal, i) => lines.push(`${String(i + 1)}. ${goal}`));

  lines.push('');
  lines.push('## Narrative flags');
  lines.push(JSON.stringify(context.narrativeFlags));

  if (context.criticalEvents.length > 0) {
    lines.push('');
    lines.push('## Critical events (last 24h)');
    for (const event of context.criticalEvents) {
      lines.push(`- [${event.timestamp}] ${event.type} ${JSON.stringify(event.payload)}`);
    }
  }

  lines.push('');
  lines.push('## Recent conversation');
  if (context.recentMessages.length === 0) {
    lines.push('(no messages yet)');
  }
  for (const turn of context.recentMessages) {
    lines.push(`[${turn.timestamp}] ${turn.source}: ${turn.content}`);
  }

  if (context.ownRecentMessages.length > 0) {
    lines.push('');
    lines.push('## Your recent messages');
    for (const message of context.ownRecentMessages) {
      lines.push(`- ${message}`);
    }
  }

  return lines.join('\n');
}
