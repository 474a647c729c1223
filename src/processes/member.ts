/**
 * Member behavior process.
 *
 * The member acts on a stochastic cadence. If the latest event is a care-team
 * message, the member replies to it; otherwise they ask a new question, which
 * is routed to a responder after a short typing delay.
 */

import type { SimProcess } from '../core/scheduler.js';
import { CollaboratorError, errorMessage } from '../core/errors.js';
import { exponential, uniform } from '../core/random.js';
import {
  askResponder,
  distillContext,
  parseResponse,
  recentConversation,
  resolveResponder,
} from '../dialogue/index.js';
import { getMessageContent, SIM_CORE_SOURCE } from '../types/index.js';
import type { Logger, SimEvent } from '../types/index.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { DialogueContext } from './types.js';
import { careTeamRoster, responderFor } from './types.js';

/** Delay before the member's first action. */
export const MEMBER_START_DELAY_DAYS = 0.1;

/** Bounds of the wait between asking a question and it being routed. */
export const ROUTING_DELAY_DAYS = { min: 0.01, max: 0.1 } as const;

export const INITIATE_TRIGGER =
  'Ask the care team one new, specific question that follows from your goals and the current situation.';

export type MemberMode = { mode: 'reply'; message: SimEvent } | { mode: 'initiate' };

/**
 * Reply when the latest message is from someone other than the member, i.e.
 * nothing the member wrote came after it. Non-message events in between
 * (ACTION_EXECUTED, PLAN_UPDATE, ...) do not count as an answer.
 */
export function selectMemberMode(state: SimulationState, member: string): MemberMode {
  const message = state.eventLog.lastOfType('MESSAGE');
  if (message && message.source !== member) {
    return { mode: 'reply', message };
  }
  return { mode: 'initiate' };
}

export function replyTrigger(message: SimEvent): string {
  return `Reply to ${message.source}, who wrote: ${getMessageContent(message)}`;
}

/**
 * Generate text as the member. Returns the parsed message, or null after
 * logging an ERROR event.
 */
async function speakAsMember(
  ctx: DialogueContext,
  logger: Logger,
  trigger: string,
  stage: 'reply' | 'question'
): Promise<string | null> {
  const { state, generator } = ctx;
  const member = state.memberProfile.name;

  try {
    const raw = await generator.generate(member, distillContext(state, member), trigger);
    return parseResponse(raw).message;
  } catch (error) {
    const failure = new CollaboratorError('generate', member, errorMessage(error), { cause: error });
    logger.warn({ stage, error: failure.message }, 'Member generation failed');
    state.log('ERROR', member, { stage, error: failure.message });
    return null;
  }
}

export async function replyToMessage(
  ctx: DialogueContext,
  logger: Logger,
  message: SimEvent
): Promise<void> {
  const { state } = ctx;
  const member = state.memberProfile.name;

  const reply = await speakAsMember(ctx, logger, replyTrigger(message), 'reply');
  if (!reply) return;

  state.log('MESSAGE', member, {
    content: reply,
    inReplyTo: {
      source: message.source,
      day: message.day,
      content: getMessageContent(message),
    },
  });
  state.remember(member, reply);
}

/**
 * Ask a question, wait, route it and have the chosen responder answer.
 * Yields the typing delay so other processes run in between.
 */
export async function* initiateConversation(ctx: DialogueContext, logger: Logger): SimProcess {
  const { state, rng, router, settings } = ctx;
  const member = state.memberProfile.name;

  const question = await speakAsMember(ctx, logger, INITIATE_TRIGGER, 'question');
  if (!question) return;

  state.log('MESSAGE', member, { content: question });
  state.remember(member, question);

  yield uniform(rng, ROUTING_DELAY_DAYS.min, ROUTING_DELAY_DAYS.max);

  let requested: string;
  try {
    requested = await router.route(question, recentConversation(state));
  } catch (error) {
    const failure = new CollaboratorError('route', member, errorMessage(error), { cause: error });
    logger.warn({ stage: 'route', error: failure.message }, 'Routing failed');
    state.log('ERROR', member, { stage: 'route', error: failure.message });
    return;
  }

  const decision = resolveResponder(
    requested,
    careTeamRoster(settings),
    responderFor(settings, 'logistics')
  );
  state.log('ROUTING', SIM_CORE_SOURCE, {
    question,
    routedTo: decision.responder,
    requested,
    method: decision.method,
  });
  if (decision.method === 'fallback') {
    logger.debug({ requested, responder: decision.responder }, 'Router answer not on roster');
  }

  await askResponder(
    { state, generator: ctx.generator, actionExecutor: ctx.actionExecutor, logger },
    decision.responder,
    `${member} asked: ${question}`
  );
}

export async function* memberProcess(ctx: DialogueContext): SimProcess {
  const { state, rng, settings } = ctx;
  const logger = ctx.logger.child({ component: 'member' });
  const member = state.memberProfile.name;

  yield MEMBER_START_DELAY_DAYS;
  for (;;) {
    yield exponential(rng, settings.member.meanDaysBetweenActions);

    const mode = selectMemberMode(state, member);
    if (mode.mode === 'reply') {
      await replyToMessage(ctx, logger, mode.message);
    } else {
      yield* initiateConversation(ctx, logger);
    }
  }
}
