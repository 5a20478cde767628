/**
 * @fileoverview Guidance queue
 *
 * Holds user guidance sent while a task runs until the next turn boundary.
 */

import type { GuidanceSettings } from '../../infrastructure/settings/index.js';

export type GuidanceVerdict =
  | { accepted: true; content: string }
  | { accepted: false; level: 'ignore' | 'info' | 'error'; reason: string };

export class GuidanceQueue {
  private items: string[] = [];
  private lastAcceptedAt: number | null = null;

  constructor(
    private readonly settings: GuidanceSettings,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.items.length;
  }

  submit(raw: string, running: boolean): GuidanceVerdict {
    const content = raw.trim();
    if (content === '') {
      return { accepted: false, level: 'ignore', reason: 'Empty guidance' };
    }
    if (content.length > this.settings.maxLength) {
      return {
        accepted: false,
        level: 'error',
        reason: `Guidance is too long (${content.length} characters, maximum ${this.settings.maxLength})`,
      };
    }
    if (!running) {
      return { accepted: false, level: 'info', reason: 'No task is running; send it as a new task instead' };
    }
    const now = this.now();
    if (this.lastAcceptedAt !== null && now - this.lastAcceptedAt < this.settings.cooldownMs) {
      return { accepted: false, level: 'info', reason: 'Guidance is arriving too quickly; wait a moment and resend' };
    }

    this.items.push(content);
    this.lastAcceptedAt = now;
    return { accepted: true, content };
  }

  drain(): string[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): void {
    this.items = [];
  }
}
