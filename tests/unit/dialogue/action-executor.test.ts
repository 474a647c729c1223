import { describe, it, expect, beforeEach } from 'vitest';
import {
  ActionExecutor,
  createActionExecutor,
  toEngineAction,
} from '../../../src/dialogue/action-executor.js';
import type { SimulationState } from '../../../src/core/simulation-state.js';
import { createMockLogger, createTestState } from '../../helpers/factories.js';

describe('toEngineAction', () => {
  it('classifies NONE in any case', () => {
    expect(toEngineAction({ type: 'none' })).toEqual({ kind: 'none' });
  });

  it('reads a narrative flag update', () => {
    expect(
      toEngineAction({ type: 'UPDATE_NARRATIVE_FLAG', payload: { flag: ' diet_logged ', value: 3 } })
    ).toEqual({ kind: 'update_narrative_flag', flag: 'diet_logged', value: 3 });
  });

  it('rejects a flag update without a flag name', () => {
    expect(toEngineAction({ type: 'UPDATE_NARRATIVE_FLAG', payload: { value: 1 } })).toEqual({
      kind: 'invalid',
      type: 'UPDATE_NARRATIVE_FLAG',
      reason: 'payload.flag must be a non-empty string',
      payload: { value: 1 },
    });
  });

  it('rejects a flag update without a value', () => {
    const action = toEngineAction({ type: 'UPDATE_NARRATIVE_FLAG', payload: { flag: 'x' } });
    expect(action).toMatchObject({ kind: 'invalid', reason: 'payload.value is missing' });
  });

  it('accepts an explicit null value', () => {
    expect(
      toEngineAction({ type: 'UPDATE_NARRATIVE_FLAG', payload: { flag: 'x', value: null } })
    ).toEqual({ kind: 'update_narrative_flag', flag: 'x', value: null });
  });

  it('passes other types through as unrecognized', () => {
    expect(toEngineAction({ type: 'FLAG_FOR_EXPERT', payload: { reason: 'labs' } })).toEqual({
      kind: 'unrecognized',
      type: 'FLAG_FOR_EXPERT',
      payload: { reason: 'labs' },
    });
  });
});

describe('ActionExecutor', () => {
  let state: SimulationState;
  let executor: ActionExecutor;

  beforeEach(() => {
    state = createTestState();
    executor = createActionExecutor({ logger: createMockLogger() });
  });

  it('ignores NONE without logging', () => {
    expect(executor.execute(state, 'Ruby', { type: 'NONE', payload: {} })).toBeNull();
    expect(state.eventLog.length).toBe(0);
  });

  it('applies a flag update and logs it', () => {
    const outcome = executor.execute(state, 'Carla', {
      type: 'UPDATE_NARRATIVE_FLAG',
      payload: { flag: 'meal_plan_sent', value: true },
    });

    expect(outcome).toEqual({ applied: true });
    expect(state.narrativeFlags.dynamic['meal_plan_sent']).toBe(true);
    expect(state.lastEvent()).toMatchObject({
      type: 'ACTION_EXECUTED',
      source: 'Carla',
      payload: {
        action: 'UPDATE_NARRATIVE_FLAG',
        payload: { flag: 'meal_plan_sent', value: true },
        applied: true,
      },
    });
  });

  it('logs refused engine-owned flags with a reason', () => {
    executor.execute(state, 'Ruby', {
      type: 'UPDATE_NARRATIVE_FLAG',
      payload: { flag: 'onboarding_docs_sent', value: true },
    });

    expect(state.narrativeFlags.lifecycle.onboardingDocsSent).toBe(false);
    expect(state.lastEvent()?.payload).toEqual({
      action: 'UPDATE_NARRATIVE_FLAG',
      payload: { flag: 'onboarding_docs_sent', value: true },
      applied: false,
      reason: '"onboarding_docs_sent" is managed by the engine',
    });
  });

  it('logs invalid payloads', () => {
    const outcome = executor.execute(state, 'Ruby', {
      type: 'UPDATE_NARRATIVE_FLAG',
      payload: { flag: '' },
    });
    expect(outcome).toEqual({ applied: false, reason: 'payload.flag must be a non-empty string' });
  });

  it('logs action types without an engine effect', () => {
    const outcome = executor.execute(state, 'Dr. Warren', {
      type: 'FLAG_FOR_EXPERT',
      payload: { topic: 'lipids' },
    });

    expect(outcome).toEqual({ applied: false, reason: 'no engine effect for this action type' });
    expect(state.lastEvent()?.payload).toEqual({
      action: 'FLAG_FOR_EXPERT',
      payload: { topic: 'lipids' },
      applied: false,
      reason: 'no engine effect for this action type',
    });
  });

  it('dispatches registered handlers by type', () => {
    const custom = new ActionExecutor({
      handlers: {
        INITIATE_SICK_DAY_PROTOCOL: (payload, s, source) => {
          s.setNarrativeFlag('sick_day_protocol', { by: source, ...payload });
          return { applied: true };
        },
      },
    });

    const outcome = custom.execute(state, 'Dr. Warren', {
      type: 'initiate_sick_day_protocol',
      payload: { days: 2 },
    });

    expect(outcome).toEqual({ applied: true });
    expect(state.narrativeFlags.dynamic['sick_day_protocol']).toEqual({ by: 'Dr. Warren', days: 2 });
    expect(state.lastEvent()?.payload['action']).toBe('INITIATE_SICK_DAY_PROTOCOL');
  });

  it('logs a text-only action with an empty payload', () => {
    executor.execute(state, 'Neel', { type: 'CUSTOM' });
    expect(state.lastEvent()?.payload['payload']).toEqual({});
  });
});
