/**
 * Error Types
 *
 * Typed errors for the simulation engine and its collaborators.
 */

/**
 * Error codes for classification in logs.
 */
export type SimulationErrorCode =
  | 'CONFIGURATION'
  | 'COLLABORATOR'
  | 'SCHEDULER'
  | 'EVENT_ORDER'
  | 'STATE_TRANSITION';

/**
 * Base simulation error class.
 */
export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/**
 * Invalid configuration or provider selection.
 * Raised before the scheduler starts; fatal.
 */
export class ConfigurationError extends SimulationError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * A response-generation or routing call failed.
 * Recovered inside the calling process and logged as an ERROR event.
 */
export class CollaboratorError extends SimulationError {
  constructor(
    public readonly collaborator: 'generate' | 'route',
    public readonly identity: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${collaborator} failed for ${identity}: ${message}`, 'COLLABORATOR');
    this.name = 'CollaboratorError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Invalid scheduler usage (negative delay, horizon in the past, re-entrant run).
 */
export class SchedulerError extends SimulationError {
  constructor(message: string) {
    super(message, 'SCHEDULER');
    this.name = 'SchedulerError';
  }
}

/**
 * An event was appended with a day earlier than the last logged event.
 */
export class EventOrderError extends SimulationError {
  constructor(day: number, lastDay: number) {
    super(
      `Event day ${String(day)} precedes last logged day ${String(lastDay)}`,
      'EVENT_ORDER'
    );
    this.name = 'EventOrderError';
  }
}

/**
 * A state transition would break an engine invariant.
 */
export class StateTransitionError extends SimulationError {
  constructor(message: string) {
    super(message, 'STATE_TRANSITION');
    this.name = 'StateTransitionError';
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
