/**
 * @fileoverview Change Controller
 *
 * Resolves a session's keep/revert gate and rewinds to checkpoints.
 *
 * ## Responsibilities
 *
 * - Keep or revert the open change-set, explicitly or implicitly
 * - Rewind files to a checkpoint
 * - Leave a synthetic note in history so the reasoning service knows what
 *   happened to its edits
 * - Reopen the gate when files are still modified afterwards
 */

import { userTurn } from '../../../core/types/index.js';
import { createLogger } from '../../../infrastructure/logging/index.js';
import type { AgentSession } from '../../agent/session.js';
import type { RestoreResult } from '../../checkpoints/index.js';

const logger = createLogger('change-controller');

/** Paths named in a history note before the rest are counted */
const MAX_LISTED_PATHS = 20;

export function describePaths(paths: readonly string[]): string {
  const listed = paths.slice(0, MAX_LISTED_PATHS).join(', ');
  const remaining = paths.length - MAX_LISTED_PATHS;
  return remaining > 0 ? `${listed} (and ${remaining} more)` : listed;
}

function fileCount(count: number): string {
  return `${count} file${count === 1 ? '' : 's'}`;
}

function failureNote(result: RestoreResult): string {
  if (result.failed.length === 0) return '';
  return ` Could not restore ${fileCount(result.failed.length)}: ${describePaths(result.failed.map(f => f.path))}.`;
}

// =============================================================================
// ChangeController Class
// =============================================================================

export class ChangeController {
  /**
   * Accept every pending change.
   * @param implicit set when a new task arrived while the gate was open
   * @returns false when nothing was pending
   */
  keep(session: AgentSession, implicit = false): boolean {
    if (!session.changes.hasChanges()) {
      session.emit({ type: 'info', message: 'No pending changes to keep' });
      return false;
    }

    const paths = session.changes.keep();
    session.emit({ type: 'keep', paths, implicit });
    session.history.append(
      userTurn(`[The user kept the changes to ${fileCount(paths.length)}: ${describePaths(paths)}]`, true)
    );
    session.pendingDiff = [];
    if (!implicit) {
      session.setStatus('idle');
    }
    logger.info('Changes kept', { sessionId: session.id, files: paths.length, implicit });
    return true;
  }

  /**
   * Restore every pending file to its original state.
   * @returns false when nothing was pending
   */
  async revert(session: AgentSession): Promise<boolean> {
    if (!session.changes.hasChanges()) {
      session.emit({ type: 'info', message: 'No pending changes to revert' });
      return false;
    }

    const result = await session.changes.revert();
    session.emit({ type: 'revert', restored: result.restored, removed: result.removed, failed: result.failed });

    const reverted = [...result.restored, ...result.removed];
    session.history.append(
      userTurn(
        `[The user reverted the changes to ${fileCount(reverted.length)}: ${describePaths(reverted)}.${failureNote(result)}]`,
        true
      )
    );
    logger.info('Changes reverted', {
      sessionId: session.id,
      restored: result.restored.length,
      removed: result.removed.length,
      failed: result.failed.length,
    });

    await this.reopenGate(session);
    return true;
  }

  /**
   * Bring files back to their state at a checkpoint.
   * @throws NoSuchCheckpointError
   */
  async rewind(session: AgentSession, checkpointId: string): Promise<void> {
    const result = await session.changes.rewind(checkpointId);
    session.emit({
      type: 'rewind',
      checkpointId: result.checkpointId,
      restored: result.restored,
      removed: result.removed,
      failed: result.failed,
      discarded: result.discarded,
    });

    const touched = [...result.restored, ...result.removed];
    session.history.append(
      userTurn(
        `[The user rewound the files to checkpoint ${result.checkpointId}, restoring ${fileCount(touched.length)}` +
          `${touched.length > 0 ? `: ${describePaths(touched)}` : ''}.${failureNote(result)}]`,
        true
      )
    );
    logger.info('Rewound to checkpoint', { sessionId: session.id, checkpointId: result.checkpointId });

    await this.reopenGate(session);
  }

  private async reopenGate(session: AgentSession): Promise<void> {
    if (!session.changes.hasChanges()) {
      session.pendingDiff = [];
      session.setStatus('idle');
      return;
    }
    const files = await session.changes.diff();
    session.pendingDiff = files;
    session.emit({ type: 'diff', files });
    session.setStatus('awaiting_keep_revert');
  }
}
