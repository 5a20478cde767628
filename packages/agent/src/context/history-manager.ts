/**
 * @fileoverview History Manager
 *
 * Owns a session's conversation history and keeps it inside the context
 * budget. Compaction picks one of three tiers from the budget utilization:
 *
 * - summarize: fold everything before the last K1 turns into a summary turn
 * - summarize_aggressive: the same with the shorter tail K2
 * - truncate: drop everything before the last K3 turns, leaving a marker
 *   that restates the original task
 *
 * The verbatim tail is never split between a tool call and its result, so
 * it may be longer than K but never shorter.
 */

import type { CompactionTier, HistoryFix, Turn } from '../core/types/index.js';
import { isToolResult, turnText, userTurn } from '../core/types/index.js';
import { repairHistory } from '../core/utils/index.js';
import { createLogger, type TillerLogger } from '../infrastructure/logging/index.js';
import type { CompactionTierSettings, HistorySettings } from '../infrastructure/settings/index.js';
import {
  HeuristicSummarizer,
  parseRenderedSummary,
  renderSummary,
  renderTruncationMarker,
  type Summarizer,
  type SummarySections,
} from './summarizer.js';
import { estimateTurnsTokens } from './token-estimator.js';

// =============================================================================
// Types
// =============================================================================

export interface CompactionResult {
  tier: CompactionTier;
  turnsBefore: number;
  turnsAfter: number;
  tokensBefore: number;
  tokensAfter: number;
}

export interface HistoryManagerOptions {
  settings: HistorySettings;
  summarizer?: Summarizer;
  turns?: Turn[];
  sessionId?: string;
}

// =============================================================================
// History Manager
// =============================================================================

export class HistoryManager {
  private history: Turn[];
  private readonly settings: HistorySettings;
  private readonly summarizer: Summarizer;
  private readonly fallback = new HeuristicSummarizer();
  private readonly logger: TillerLogger;

  constructor(options: HistoryManagerOptions) {
    this.settings = options.settings;
    this.summarizer = options.summarizer ?? this.fallback;
    this.history = [...(options.turns ?? [])];
    this.logger = createLogger('history', options.sessionId ? { sessionId: options.sessionId } : undefined);
  }

  append(turn: Turn): void {
    this.history.push(turn);
  }

  turns(): readonly Turn[] {
    return this.history;
  }

  get length(): number {
    return this.history.length;
  }

  estimateTokens(): number {
    return estimateTurnsTokens(this.history);
  }

  replace(turns: Turn[]): void {
    this.history = [...turns];
  }

  clear(): void {
    this.history = [];
  }

  /**
   * The task the conversation started with. Survives compaction through the
   * summary or truncation marker that replaced the first turns.
   */
  originalTask(): string {
    for (const turn of this.history) {
      if (turn.role !== 'user') continue;
      const text = turnText(turn);
      if (turn.synthetic) {
        const parsed = parseRenderedSummary(text);
        if (parsed?.originalTask) return parsed.originalTask;
        continue;
      }
      if (text.trim() !== '') return text.trim();
    }
    return '';
  }

  /**
   * The tier that applies at the given budget, or null below the first
   * threshold.
   */
  selectTier(budget: number): CompactionTier | null {
    if (budget <= 0) return 'truncate';
    const utilization = this.estimateTokens() / budget;
    const { summarize, summarizeAggressive, truncate } = this.settings;
    if (utilization >= truncate.threshold) return 'truncate';
    if (utilization >= summarizeAggressive.threshold) return 'summarize_aggressive';
    if (utilization >= summarize.threshold) return 'summarize';
    return null;
  }

  /**
   * Index where the verbatim tail starts for a tier. Moves earlier while the
   * turn at the boundary holds tool results, whose calls sit in the turn
   * before it.
   */
  tailStart(tailTurns: number): number {
    let start = Math.max(0, this.history.length - tailTurns);
    while (start > 0 && this.history[start]?.content.some(isToolResult)) {
      start--;
    }
    return start;
  }

  /**
   * Compact the history for the given token budget, or at `forceTier`
   * whatever the utilization.
   * @returns what was done, or null when no compaction applied
   */
  async compact(budget: number, signal?: AbortSignal, forceTier?: CompactionTier): Promise<CompactionResult | null> {
    const tier = forceTier ?? this.selectTier(budget);
    if (!tier) return null;

    const tierSettings = this.tierSettings(tier);
    const start = this.tailStart(tierSettings.tailTurns);
    if (start === 0) {
      this.logger.debug('Compaction skipped: history is all tail', { tier, turns: this.history.length });
      return null;
    }

    const turnsBefore = this.history.length;
    const tokensBefore = this.estimateTokens();
    const originalTask = this.originalTask();
    const head = this.history.slice(0, start);
    const tail = this.history.slice(start);

    let replacement: Turn;
    if (tier === 'truncate') {
      replacement = userTurn(renderTruncationMarker(originalTask), true);
    } else {
      const input = {
        turns: head,
        originalTask,
        referentTurns: head.slice(-this.settings.referentWindowTurns),
      };
      let sections: SummarySections;
      try {
        sections = await this.summarizer.summarize(input, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        this.logger.warn('Summarizer failed, using heuristic summary', {
          error: error instanceof Error ? error.message : String(error),
        });
        sections = await this.fallback.summarize(input);
      }
      replacement = userTurn(renderSummary(sections), true);
    }

    this.history = [replacement, ...tail];
    const result: CompactionResult = {
      tier,
      turnsBefore,
      turnsAfter: this.history.length,
      tokensBefore,
      tokensAfter: this.estimateTokens(),
    };
    this.logger.info('History compacted', { ...result });
    return result;
  }

  /**
   * Restore tool call/result pairing in place.
   * @returns the fixes applied; empty when the history was valid
   */
  repair(): HistoryFix[] {
    const { turns, fixes } = repairHistory(this.history);
    if (fixes.length > 0) {
      this.history = turns;
      this.logger.warn('History repaired', { fixes: fixes.length });
    }
    return fixes;
  }

  private tierSettings(tier: CompactionTier): CompactionTierSettings {
    switch (tier) {
      case 'summarize':
        return this.settings.summarize;
      case 'summarize_aggressive':
        return this.settings.summarizeAggressive;
      case 'truncate':
        return this.settings.truncate;
    }
  }
}
