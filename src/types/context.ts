/**
 * Distilled context handed to collaborators.
 */

import type { AdherenceStatus, LabResults } from './state.js';
import type { SimEvent } from './event.js';

/**
 * One MESSAGE event as seen by collaborators.
 */
export interface ConversationTurn {
  day: number;
  timestamp: string;
  source: string;
  content: string;
}

/**
 * Bounded snapshot of the world for a single collaborator call.
 */
export interface DistilledContext {
  day: number;
  timestamp: string;
  member: {
    name: string;
    age: number;
    goals: readonly string[];
  };
  location: string;
  isTraveling: boolean;
  activeIssue: string | null;
  adherenceStatus: AdherenceStatus;
  narrativeFlags: Record<string, unknown>;
  labResults: LabResults | null;
  wearables: Record<string, number>;
  /** Non-message events from the last simulated day */
  criticalEvents: readonly SimEvent[];
  /** Most recent messages, oldest first */
  recentMessages: readonly ConversationTurn[];
  /** The requester's own latest messages, oldest first */
  ownRecentMessages: readonly string[];
}
