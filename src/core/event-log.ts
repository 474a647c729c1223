import { DateTime } from 'luxon';
import type { EventPayload, EventType, SerializedEvent, SimEvent } from '../types/index.js';
import { ConfigurationError, EventOrderError } from './errors.js';

const MS_PER_DAY = 86_400_000;

/**
 * Display format for event timestamps, e.g. "01/15/25, 09:30 AM".
 */
export const TIMESTAMP_FORMAT = 'MM/dd/yy, hh:mm a';

/**
 * Render a simulated day as a wall-clock timestamp.
 */
export function formatSimulationTimestamp(startDate: DateTime, day: number): string {
  return startDate
    .plus({ milliseconds: Math.round(day * MS_PER_DAY) })
    .setLocale('en-US')
    .toFormat(TIMESTAMP_FORMAT);
}

/**
 * Parse the configured start date (ISO 8601) as a UTC midnight.
 */
export function parseStartDate(iso: string): DateTime {
  const parsed = DateTime.fromISO(iso, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ConfigurationError(`Invalid start date: ${iso}`);
  }
  return parsed;
}

/**
 * Append-only event log.
 *
 * Entries are non-decreasing in `day`; an out-of-order append throws.
 */
export class EventLog implements Iterable<SimEvent> {
  private readonly events: SimEvent[] = [];

  constructor(private readonly startDate: DateTime) {}

  append(day: number, type: EventType, source: string, payload: EventPayload): SimEvent {
    const last = this.last();
    if (last && day < last.day) {
      throw new EventOrderError(day, last.day);
    }

    const event: SimEvent = {
      day,
      timestamp: this.timestampFor(day),
      type,
      source,
      payload,
    };
    this.events.push(event);
    return event;
  }

  timestampFor(day: number): string {
    return formatSimulationTimestamp(this.startDate, day);
  }

  get length(): number {
    return this.events.length;
  }

  at(index: number): SimEvent | undefined {
    return this.events.at(index);
  }

  last(): SimEvent | undefined {
    return this.events[this.events.length - 1];
  }

  all(): readonly SimEvent[] {
    return this.events;
  }

  ofType(type: EventType): SimEvent[] {
    return this.events.filter((event) => event.type === type);
  }

  lastOfType(type: EventType): SimEvent | undefined {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const event = this.events[i];
      if (event?.type === type) return event;
    }
    return undefined;
  }

  [Symbol.iterator](): Iterator<SimEvent> {
    return this.events[Symbol.iterator]();
  }

  /**
   * Serializable copy with days rounded to 2 decimals.
   */
  toJSON(): SerializedEvent[] {
    return this.events.map((event) => ({
      ...event,
      day: Math.round(event.day * 100) / 100,
    }));
  }
}
