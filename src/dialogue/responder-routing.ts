/**
 * How a routed responder was chosen.
 * - 'semantic': the router's answer matched the roster
 * - 'fallback': the answer was unknown and the default responder was used
 */
export type RoutingMethod = 'semantic' | 'fallback';

export interface RoutingDecision {
  responder: string;
  method: RoutingMethod;
}

/**
 * Validate a router answer against the roster.
 *
 * Matching ignores surrounding whitespace and letter case; the canonical
 * roster spelling is returned. Anything else resolves to `fallback`.
 */
export function resolveResponder(
  requested: string,
  roster: readonly string[],
  fallback: string
): RoutingDecision {
  const normalized = requested.trim().toLowerCase();
  const match = roster.find((name) => name.toLowerCase() === normalized);
  if (match !== undefined && normalized !== '') {
    return { responder: match, method: 'semantic' };
  }
  return { responder: fallback, method: 'fallback' };
}
