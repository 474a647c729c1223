/**
 * Structured logger accepted by every component.
 *
 * Shaped after pino so a pino logger can be passed straight in, while tests
 * can hand in a plain recording object.
 */
export interface LogFn {
  (bindings: object, msg?: string): void;
  (msg: string): void;
}

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child(bindings: Record<string, unknown>): Logger;
}
