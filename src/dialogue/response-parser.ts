/**
 * Response parser.
 *
 * Turns raw collaborator output into a message and an action. Never throws:
 * anything that is not a usable JSON object falls back to plain text.
 */

import { z } from 'zod';
import { NO_ACTION } from '../types/index.js';
import type { RawAction } from '../types/index.js';

/**
 * Parsed collaborator response.
 */
export interface ParsedResponse {
  message: string;
  action: RawAction;
}

const ActionSchema = z.union([
  z.object({
    type: z.string().trim().min(1),
    payload: z.record(z.unknown()).nullish(),
  }),
  z.string().trim().min(1),
]);

/** Keys read for the message text, in priority order. */
const MESSAGE_KEYS = ['message', 'reply', 'question'] as const;

const FENCE_PATTERN = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function textFallback(text: string): ParsedResponse {
  return { message: text, action: { type: NO_ACTION } };
}

/**
 * Unwrap one level of `{"response": ...}` nesting.
 * The nested value may be an object or a JSON-encoded string.
 */
function unwrapResponse(obj: Record<string, unknown>): Record<string, unknown> | string {
  const nested = obj['response'];
  if (nested === undefined) return obj;
  if (isRecord(nested)) return nested;
  if (typeof nested === 'string') {
    const inner = tryParseJson(nested.trim());
    return isRecord(inner) ? inner : nested.trim();
  }
  return obj;
}

function readAction(value: unknown): RawAction {
  const parsed = ActionSchema.safeParse(value);
  if (!parsed.success) {
    return { type: NO_ACTION, payload: {} };
  }
  if (typeof parsed.data === 'string') {
    return { type: parsed.data.toUpperCase(), payload: {} };
  }
  return {
    type: parsed.data.type.toUpperCase(),
    payload: parsed.data.payload ?? {},
  };
}

/**
 * Parse raw collaborator output.
 *
 * Accepts a JSON object (optionally inside a markdown fence, optionally nested
 * under `response`) carrying `message` (or `reply` / `question`) and `action`.
 * Anything else becomes a plain-text message with action `{type: NONE}`.
 */
export function parseResponse(raw: string): ParsedResponse {
  const text = raw.trim();
  if (!text) {
    return textFallback('');
  }

  const fenced = FENCE_PATTERN.exec(text);
  const candidate = fenced?.[1]?.trim() ?? text;

  const parsed = tryParseJson(candidate);
  if (!isRecord(parsed)) {
    return textFallback(text);
  }

  const body = unwrapResponse(parsed);
  if (typeof body === 'string') {
    return textFallback(body);
  }

  let message: string | undefined;
  for (const key of MESSAGE_KEYS) {
    const value = body[key];
    if (typeof value === 'string') {
      message = value.trim();
      break;
    }
  }

  const hasAction = body['action'] !== undefined && body['action'] !== null;
  if (message === undefined && !hasAction) {
    return textFallback(text);
  }

  return {
    message: message ?? '',
    action: hasAction ? readAction(body['action']) : { type: NO_ACTION, payload: {} },
  };
}
