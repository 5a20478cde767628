/**
 * @fileoverview Session coordinator types
 */

import type { TaskMode } from '../../core/types/index.js';
import type { AgentSession } from '../agent/session.js';
import type { Orchestrator } from '../agent/orchestrator.js';

// =============================================================================
// Inbound Requests
// =============================================================================

export interface TaskRequest {
  content: string;
  mode?: TaskMode;
  images?: Array<{ mediaType: string; data: string }>;
}

/**
 * Requests that act on one session's state. Produced by the gateway after
 * validation; the coordinator trusts their shape.
 */
export type ControlMessage =
  | { type: 'guidance'; content: string }
  | { type: 'cancel' }
  | { type: 'keep' }
  | { type: 'revert' }
  | { type: 'checkpoint_restore'; id: string }
  | { type: 'reset' }
  | { type: 'plan_approve'; steps?: string[] }
  | { type: 'plan_reject' }
  | { type: 'plan_feedback'; feedback: string }
  | { type: 'answer'; toolUseId: string; answer: string }
  | { type: 'add_todo'; content: string }
  | { type: 'remove_todo'; id: string };

export type ControlType = ControlMessage['type'];

// =============================================================================
// Active Sessions
// =============================================================================

/**
 * A session loaded into memory with the orchestrator that runs its tasks.
 */
export interface ActiveSession {
  session: AgentSession;
  orchestrator: Orchestrator;
  /** Settles when the current run ends; null while no run is in progress */
  run: Promise<void> | null;
}

export interface Attachment {
  sessionId: string;
  detach(): void;
}
