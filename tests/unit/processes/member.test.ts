import { describe, it, expect } from 'vitest';
import {
  INITIATE_TRIGGER,
  initiateConversation,
  memberProcess,
  selectMemberMode,
} from '../../../src/processes/member.js';
import type { DialogueContext } from '../../../src/processes/types.js';
import { ActionExecutor } from '../../../src/dialogue/action-executor.js';
import { createDialogueContext, createTestState } from '../../helpers/factories.js';
import { ScriptedRandom } from '../../helpers/scripted-random.js';
import { ScriptedGenerator, ScriptedRouter } from '../../helpers/scripted-collaborators.js';

const MEMBER = 'Rohan Patel';

function setup(
  generator: ScriptedGenerator,
  router: ScriptedRouter,
  draws: number[] = [0]
): DialogueContext {
  return createDialogueContext(new ScriptedRandom(draws, 0.999), { generator, router });
}

describe('selectMemberMode', () => {
  it('initiates when nothing has been said', () => {
    expect(selectMemberMode(createTestState(), MEMBER)).toEqual({ mode: 'initiate' });
  });

  it('replies to a care-team message', () => {
    const state = createTestState();
    const message = state.log('MESSAGE', 'Carla', { content: 'Log your meals today.' });
    expect(selectMemberMode(state, MEMBER)).toEqual({ mode: 'reply', message });
  });

  it('initiates once its own message is the latest one', () => {
    const state = createTestState();
    state.log('MESSAGE', 'Ruby', { content: 'Welcome aboard.' });
    state.log('MESSAGE', MEMBER, { content: 'Any news?' });
    state.log('PLAN_UPDATE', 'SIM_CORE', { plan: 'exercise' });
    expect(selectMemberMode(state, MEMBER).mode).toBe('initiate');
  });

  it('still replies when an action was logged after the message', () => {
    const state = createTestState();
    const message = state.log('MESSAGE', 'Ruby', { content: 'Consult booked for Monday.' });
    new ActionExecutor().execute(
      state,
      'Ruby',
      { type: 'UPDATE_NARRATIVE_FLAG', payload: { flag: 'consult_day', value: 'Monday' } }
    );
    state.log('PLAN_UPDATE', 'SIM_CORE', { plan: 'exercise' });

    expect(state.lastEvent()?.type).toBe('PLAN_UPDATE');
    expect(selectMemberMode(state, MEMBER)).toEqual({ mode: 'reply', message });
  });
});

describe('initiateConversation', () => {
  it('asks, waits, routes and lets the responder answer', async () => {
    const generator = new ScriptedGenerator([
      '{"question": "Can we move my blood test to Friday?"}',
      '{"message": "Done, moved to Friday 9am.", "action": {"type": "update_narrative_flag", "payload": {"flag": "blood_test_rescheduled", "value": true}}}',
    ]);
    const router = new ScriptedRouter([' ruby ']);
    const ctx = setup(generator, router);

    ctx.scheduler.spawn('initiate', initiateConversation(ctx, ctx.logger));
    await ctx.scheduler.run(1);

    const events = ctx.state.eventLog.all().map((e) => ({
      day: e.day,
      type: e.type,
      source: e.source,
      payload: e.payload,
    }));
    expect(events).toEqual([
      {
        day: 0,
        type: 'MESSAGE',
        source: MEMBER,
        payload: { content: 'Can we move my blood test to Friday?' },
      },
      {
        day: 0.01,
        type: 'ROUTING',
        source: 'SIM_CORE',
        payload: {
          question: 'Can we move my blood test to Friday?',
          routedTo: 'Ruby',
          requested: ' ruby ',
          method: 'semantic',
        },
      },
      {
        day: 0.01,
        type: 'MESSAGE',
        source: 'Ruby',
        payload: {
          content: 'Done, moved to Friday 9am.',
          trigger: 'Rohan Patel asked: Can we move my blood test to Friday?',
        },
      },
      {
        day: 0.01,
        type: 'ACTION_EXECUTED',
        source: 'Ruby',
        payload: {
          action: 'UPDATE_NARRATIVE_FLAG',
          payload: { flag: 'blood_test_rescheduled', value: true },
          applied: true,
        },
      },
    ]);

    expect(generator.calls.map((c) => [c.personaId, c.trigger])).toEqual([
      [MEMBER, INITIATE_TRIGGER],
      ['Ruby', 'Rohan Patel asked: Can we move my blood test to Friday?'],
    ]);
    expect(router.calls[0]?.question).toBe('Can we move my blood test to Friday?');
    expect(router.calls[0]?.history.map((t) => t.source)).toEqual([MEMBER]);
    expect(ctx.state.narrativeFlags.dynamic).toEqual({ blood_test_rescheduled: true });
    expect(ctx.state.recentMessagesBy(MEMBER)).toEqual(['Can we move my blood test to Friday?']);
  });

  it('falls back to the logistics responder for an unknown name', async () => {
    const generator = new ScriptedGenerator(['Is coffee OK before training?', 'Yes, before 2pm.']);
    const ctx = setup(generator, new ScriptedRouter(['Dr. House']));

    ctx.scheduler.spawn('initiate', initiateConversation(ctx, ctx.logger));
    await ctx.scheduler.run(1);

    const [routing] = ctx.state.eventLog.ofType('ROUTING');
    expect(routing?.payload).toEqual({
      question: 'Is coffee OK before training?',
      routedTo: 'Ruby',
      requested: 'Dr. House',
      method: 'fallback',
    });
    expect(ctx.state.eventLog.ofType('MESSAGE').map((e) => e.source)).toEqual([MEMBER, 'Ruby']);
  });

  it('logs a routing failure and stops the exchange', async () => {
    const generator = new ScriptedGenerator(['Should I skip today?']);
    const ctx = setup(generator, new ScriptedRouter([new Error('timeout')]));

    ctx.scheduler.spawn('initiate', initiateConversation(ctx, ctx.logger));
    await ctx.scheduler.run(1);

    expect(ctx.state.eventLog.ofType('ROUTING')).toHaveLength(0);
    const [error] = ctx.state.eventLog.ofType('ERROR');
    expect(error?.source).toBe(MEMBER);
    expect(error?.payload).toEqual({
      stage: 'route',
      error: 'route failed for Rohan Patel: timeout',
    });
    expect(generator.calls).toHaveLength(1);
  });

  it('logs a question failure without routing or waiting', async () => {
    const router = new ScriptedRouter([]);
    const ctx = createDialogueContext(new ScriptedRandom([]), {
      generator: new ScriptedGenerator([new Error('offline')]),
      router,
    });

    ctx.scheduler.spawn('initiate', initiateConversation(ctx, ctx.logger));
    await ctx.scheduler.run(1);

    expect(ctx.state.eventLog.all().map((e) => [e.type, e.source, e.payload])).toEqual([
      ['ERROR', MEMBER, { stage: 'question', error: 'generate failed for Rohan Patel: offline' }],
    ]);
    expect(router.calls).toHaveLength(0);
  });
});

describe('memberProcess', () => {
  it('replies to the latest care-team message', async () => {
    const generator = new ScriptedGenerator(['Slept badly, about 5 hours.']);
    const ctx = setup(generator, new ScriptedRouter([]));
    ctx.state.log('MESSAGE', 'Ruby', { content: 'How did you sleep?' });

    ctx.scheduler.spawn('member', memberProcess(ctx));
    await ctx.scheduler.run(0.5);

    expect(generator.calls[0]?.trigger).toBe('Reply to Ruby, who wrote: How did you sleep?');
    const reply = ctx.state.lastEvent();
    expect(reply?.day).toBe(0.1);
    expect(reply?.source).toBe(MEMBER);
    expect(reply?.payload).toEqual({
      content: 'Slept badly, about 5 hours.',
      inReplyTo: { source: 'Ruby', day: 0, content: 'How did you sleep?' },
    });
  });

  it('logs a failed reply as an ERROR event', async () => {
    const ctx = setup(new ScriptedGenerator([new Error('rate limited')]), new ScriptedRouter([]));
    ctx.state.log('MESSAGE', 'Advik', { content: 'Your HRV dipped.' });

    ctx.scheduler.spawn('member', memberProcess(ctx));
    await ctx.scheduler.run(0.5);

    expect(ctx.state.lastEvent()?.type).toBe('ERROR');
    expect(ctx.state.lastEvent()?.payload).toEqual({
      stage: 'reply',
      error: 'generate failed for Rohan Patel: rate limited',
    });
  });

  it('does not act before its start delay', async () => {
    const generator = new ScriptedGenerator([]);
    const ctx = setup(generator, new ScriptedRouter([]));

    ctx.scheduler.spawn('member', memberProcess(ctx));
    await ctx.scheduler.run(0.1);

    expect(generator.calls).toHaveLength(0);
  });
});
