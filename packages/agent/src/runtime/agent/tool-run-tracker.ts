/**
 * @fileoverview Tool run tracker
 *
 * Records the lifecycle of every tool call in the current run so that a
 * cancellation can account for each one: nothing stays pending or running
 * once cancelActive() returns.
 */

import type { ToolRunStatus } from '../../core/types/index.js';

export interface ToolRun {
  toolUseId: string;
  name: string;
  status: ToolRunStatus;
  startedAt?: number;
  finishedAt?: number;
}

type FinalStatus = Extract<ToolRunStatus, 'succeeded' | 'failed' | 'cancelled'>;

export class ToolRunTracker {
  private readonly runs = new Map<string, ToolRun>();

  constructor(private readonly now: () => number = Date.now) {}

  register(toolUseId: string, name: string): ToolRun {
    const run: ToolRun = { toolUseId, name, status: 'pending' };
    this.runs.set(toolUseId, run);
    return run;
  }

  start(toolUseId: string): void {
    const run = this.runs.get(toolUseId);
    if (run?.status === 'pending') {
      run.status = 'running';
      run.startedAt = this.now();
    }
  }

  /**
   * Close a run. A run that already reached a final status keeps it.
   */
  finish(toolUseId: string, status: FinalStatus): void {
    const run = this.runs.get(toolUseId);
    if (run && (run.status === 'pending' || run.status === 'running')) {
      run.status = status;
      run.finishedAt = this.now();
    }
  }

  get(toolUseId: string): ToolRun | undefined {
    return this.runs.get(toolUseId);
  }

  active(): ToolRun[] {
    return [...this.runs.values()].filter(run => run.status === 'pending' || run.status === 'running');
  }

  /**
   * Mark every pending or running run cancelled.
   * @returns the runs that were cancelled, in registration order
   */
  cancelActive(): ToolRun[] {
    const cancelled = this.active();
    for (const run of cancelled) {
      this.finish(run.toolUseId, 'cancelled');
    }
    return cancelled;
  }

  clear(): void {
    this.runs.clear();
  }
}
