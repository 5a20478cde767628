/**
 * @fileoverview Active Session Store
 *
 * Typed interface + Map-backed implementation for the sessions currently
 * loaded in memory.
 */
import type { ActiveSession } from '../types.js';

// =============================================================================
// Interface
// =============================================================================

export interface ActiveSessionStore {
  get(sessionId: string): ActiveSession | undefined;
  set(sessionId: string, session: ActiveSession): void;
  delete(sessionId: string): void;
  clear(): void;
  get size(): number;
  values(): IterableIterator<ActiveSession>;
}

// =============================================================================
// Implementation
// =============================================================================

export class MapActiveSessionStore implements ActiveSessionStore {
  private sessions = new Map<string, ActiveSession>();

  get(sessionId: string): ActiveSession | undefined {
    return this.sessions.get(sessionId);
  }

  set(sessionId: string, session: ActiveSession): void {
    this.sessions.set(sessionId, session);
  }

  delete(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  clear(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }

  values(): IterableIterator<ActiveSession> {
    return this.sessions.values();
  }
}
