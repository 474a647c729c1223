import fs from 'node:fs';
import path from 'node:path';
import { DateTime } from 'luxon';
import pino from 'pino';

const LOG_PREFIX = 'run-';
const LOG_SUFFIX = '.log';

export interface LoggerConfig {
  /** Directory for per-run log files */
  logDir: string;
  /** Run logs to keep, newest first */
  maxFiles: number;
  level: pino.Level;
  /** pino-pretty on the console instead of JSON lines */
  pretty: boolean;
  toFile: boolean;
}

const LOGGER_DEFAULTS: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

/**
 * File name for a run started at `startedAt`, e.g. "run-20250115-093000.log".
 */
export function runLogFileName(startedAt: DateTime = DateTime.now()): string {
  return `${LOG_PREFIX}${startedAt.toFormat('yyyyMMdd-HHmmss')}${LOG_SUFFIX}`;
}

/**
 * Delete empty run logs and all but the newest `keep` non-empty ones.
 * Returns the deleted paths.
 */
export function pruneRunLogs(logDir: string, keep: number): string[] {
  if (!fs.existsSync(logDir)) return [];

  const logs = fs
    .readdirSync(logDir)
    .filter((name) => name.startsWith(LOG_PREFIX) && name.endsWith(LOG_SUFFIX))
    .map((name) => {
      const file = path.join(logDir, name);
      const { mtimeMs, size } = fs.statSync(file);
      return { file, mtimeMs, size };
    });

  const empty = logs.filter((log) => log.size === 0);
  const overflow = logs
    .filter((log) => log.size > 0)
    .sort((a, b) => b.mtimeMs - a.mtimeMs)
    .slice(keep);

  const removed: string[] = [];
  for (const { file } of [...empty, ...overflow]) {
    try {
      fs.unlinkSync(file);
      removed.push(file);
    } catch (error) {
      process.emitWarning(`Could not remove old run log ${file}: ${String(error)}`);
    }
  }
  return removed;
}

/**
 * Root pino logger for one run: console output plus an optional run log file.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...LOGGER_DEFAULTS, ...config };

  const consoleTarget: pino.TransportTargetOptions = pretty
    ? { target: 'pino-pretty', level, options: { colorize: true } }
    : { target: 'pino/file', level, options: { destination: 1 } };
  const targets = [consoleTarget];

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    // Keep one slot free for the log this run is about to open
    pruneRunLogs(logDir, Math.max(0, maxFiles - 1));
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, runLogFileName()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({ level, base: { app: 'coaching-sim' }, transport: { targets } });
}
