import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DateTime } from 'luxon';
import type { EventLog } from '../core/event-log.js';
import type { Logger, SerializedEvent } from '../types/index.js';
import { getMessageContent, isMessageEvent } from '../types/index.js';

/**
 * Paths of the files written for one run.
 */
export interface RunOutputPaths {
  eventLogPath: string;
  transcriptPath: string;
}

export interface WriteRunOutputsOptions {
  outputDir: string;
  /** Suffix shared by both files; defaults to the current wall-clock time */
  stamp?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * Ordered JSON array of events, days rounded to 2 decimals.
 */
export function serializeEventLog(log: EventLog): SerializedEvent[] {
  return log.toJSON();
}

/**
 * One `[timestamp] source: content` line per MESSAGE event, in log order.
 */
export function renderTranscript(log: EventLog): string {
  const lines: string[] = [];
  for (const event of log) {
    if (!isMessageEvent(event)) continue;
    lines.push(`[${event.timestamp}] ${event.source}: ${getMessageContent(event)}`);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * File-name stamp, e.g. "20250115_093000".
 */
export function outputStamp(now: DateTime = DateTime.now()): string {
  return now.toFormat('yyyyMMdd_HHmmss');
}

/**
 * Write to a temp file, then rename over the target.
 */
async function writeAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, path);
}

/**
 * Persist the event log and chat transcript of a run.
 */
export async function writeRunOutputs(
  log: EventLog,
  options: WriteRunOutputsOptions
): Promise<RunOutputPaths> {
  const stamp = options.stamp ?? outputStamp();
  await mkdir(options.outputDir, { recursive: true });

  const eventLogPath = join(options.outputDir, `simulation-log-${stamp}.json`);
  const transcriptPath = join(options.outputDir, `chat-log-${stamp}.txt`);

  await writeAtomic(eventLogPath, JSON.stringify(serializeEventLog(log), null, 2));
  await writeAtomic(transcriptPath, renderTranscript(log));

  options.logger?.info(
    { eventLogPath, transcriptPath, events: log.length },
    'Run outputs written'
  );

  return { eventLogPath, transcriptPath };
}
