import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  EventLog,
  formatSimulationTimestamp,
  parseStartDate,
} from '../../../src/core/event-log.js';
import { ConfigurationError, EventOrderError } from '../../../src/core/errors.js';

const START = DateTime.fromISO('2025-01-15', { zone: 'utc' });

describe('formatSimulationTimestamp', () => {
  it('renders the start date at day 0', () => {
    expect(formatSimulationTimestamp(START, 0)).toBe('01/15/25, 12:00 AM');
  });

  it('renders fractional days as time of day', () => {
    expect(formatSimulationTimestamp(START, 0.25)).toBe('01/15/25, 06:00 AM');
    expect(formatSimulationTimestamp(START, 1.5)).toBe('01/16/25, 12:00 PM');
  });
});

describe('parseStartDate', () => {
  it('parses an ISO date as UTC midnight', () => {
    expect(parseStartDate('2025-01-15').toISO()).toBe('2025-01-15T00:00:00.000Z');
  });

  it('rejects an invalid date', () => {
    expect(() => parseStartDate('not-a-date')).toThrow(ConfigurationError);
  });
});

describe('EventLog', () => {
  it('appends events with timestamps', () => {
    const log = new EventLog(START);
    const event = log.append(2, 'TRAVEL_START', 'SIM_CORE', { location: 'UK' });

    expect(event).toEqual({
      day: 2,
      timestamp: '01/17/25, 12:00 AM',
      type: 'TRAVEL_START',
      source: 'SIM_CORE',
      payload: { location: 'UK' },
    });
    expect(log.length).toBe(1);
    expect(log.last()).toBe(event);
  });

  it('accepts equal days and rejects earlier ones', () => {
    const log = new EventLog(START);
    log.append(3, 'PLAN_UPDATE', 'SIM_CORE', {});
    log.append(3, 'MESSAGE', 'Ruby', { content: 'hi' });

    expect(() => log.append(2.5, 'MESSAGE', 'Ruby', { content: 'late' })).toThrow(EventOrderError);
    expect(log.length).toBe(2);
  });

  it('filters by type', () => {
    const log = new EventLog(START);
    log.append(0, 'SIM_START', 'SIM_CORE', {});
    log.append(1, 'MESSAGE', 'Ruby', { content: 'a' });
    log.append(2, 'MESSAGE', 'Rohan Patel', { content: 'b' });

    expect(log.ofType('MESSAGE').map((e) => e.source)).toEqual(['Ruby', 'Rohan Patel']);
  });

  it('rounds days to two decimals when serialized', () => {
    const log = new EventLog(START);
    log.append(1.23456, 'MESSAGE', 'Ruby', { content: 'a' });

    const [serialized] = log.toJSON();
    expect(serialized?.day).toBe(1.23);
    expect(log.at(0)?.day).toBe(1.23456);
  });
});
