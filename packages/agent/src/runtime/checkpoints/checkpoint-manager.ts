/**
 * @fileoverview Checkpoint & Snapshot Manager
 *
 * Tracks the original state of every file a session mutates and lets the
 * session keep the changes, revert them, or rewind to a checkpoint.
 *
 * - ModifiedFiles: one immutable snapshot per (backend, path), taken on first
 *   touch and never overwritten until keep or revert clears it.
 * - Checkpoints: copy-on-write copies of ModifiedFiles plus the content of each
 *   tracked path at capture time.
 *
 * Restore operations never throw on a per-path backend failure. The failure is
 * reported and the entry stays tracked so a later revert can retry it.
 *
 * Loaded entries keep the key they were stored under. Entries and checkpoints
 * captured on another backend are set aside: they are persisted again
 * unchanged but never restored, diffed or counted as pending changes.
 */

import { NoSuchCheckpointError } from '../../core/errors/index.js';
import type {
  ChangeSetSnapshot,
  FailedPath,
  FileDiff,
  SerializedCheckpoint,
  SerializedFileSnapshot,
} from '../../core/types/index.js';
import type { ExecutionBackend } from '../../infrastructure/backend/index.js';
import { createLogger, type TillerLogger } from '../../infrastructure/logging/index.js';
import { unifiedDiff } from './diff.js';
import { parseSnapshotKey, snapshotKey, type SnapshotKey } from './snapshot-key.js';

// =============================================================================
// Types
// =============================================================================

export interface FileSnapshot {
  readonly key: SnapshotKey;
  readonly path: string;
  readonly originalContent: Buffer | null;
  readonly existedBefore: boolean;
  readonly capturedAt: number;
}

export interface CheckpointRecord {
  readonly id: string;
  readonly sequence: number;
  readonly label: string | null;
  readonly createdAt: string;
  readonly entries: ReadonlyMap<SnapshotKey, FileSnapshot>;
  readonly contents: ReadonlyMap<SnapshotKey, Buffer | null>;
}

export interface CheckpointInfo {
  id: string;
  sequence: number;
  label: string | null;
}

export interface RestoreResult {
  restored: string[];
  removed: string[];
  failed: FailedPath[];
}

export interface RewindResult extends RestoreResult {
  checkpointId: string;
  /** Ids of checkpoints newer than the target, now gone */
  discarded: string[];
}

export interface CheckpointManagerOptions {
  maxRetained?: number;
  sessionId?: string;
  now?: () => number;
}

const DEFAULT_MAX_RETAINED = 25;

// =============================================================================
// Manager
// =============================================================================

export class CheckpointManager {
  private modified = new Map<SnapshotKey, FileSnapshot>();
  private checkpoints: CheckpointRecord[] = [];
  private setAside: SerializedFileSnapshot[] = [];
  private setAsideCheckpoints: SerializedCheckpoint[] = [];
  private nextSequence = 1;
  private readonly maxRetained: number;
  private readonly now: () => number;
  private readonly logger: TillerLogger;

  constructor(
    private readonly backend: ExecutionBackend,
    options: CheckpointManagerOptions = {}
  ) {
    this.maxRetained = options.maxRetained ?? DEFAULT_MAX_RETAINED;
    this.now = options.now ?? Date.now;
    this.logger = createLogger('checkpoints', options.sessionId ? { sessionId: options.sessionId } : undefined);
  }

  get backendId(): string {
    return this.backend.id;
  }

  /**
   * Capture the current state of `path` unless it is already tracked.
   * Must complete before the write it protects.
   */
  async track(path: string): Promise<void> {
    const normalized = this.backend.resolve(path);
    const key = snapshotKey(this.backend.id, normalized);
    if (this.modified.has(key)) {
      return;
    }

    const content = await this.readCurrent(normalized);
    // A concurrent track of the same path may have finished first
    if (this.modified.has(key)) {
      return;
    }
    this.modified.set(key, {
      key,
      path: normalized,
      originalContent: content,
      existedBefore: content !== null,
      capturedAt: this.now(),
    });
    this.logger.debug('Tracking file', { path: normalized, existedBefore: content !== null });
  }

  hasChanges(): boolean {
    return this.modified.size > 0;
  }

  trackedPaths(): string[] {
    return [...this.modified.values()].map(entry => entry.path);
  }

  /**
   * Paths of loaded entries that belong to another backend.
   */
  setAsidePaths(): string[] {
    return [...new Set(this.setAside.map(entry => entry.path))];
  }

  listCheckpoints(): CheckpointInfo[] {
    return this.checkpoints.map(cp => ({ id: cp.id, sequence: cp.sequence, label: cp.label }));
  }

  async checkpoint(label: string | null = null): Promise<CheckpointInfo> {
    const entries = new Map(this.modified);
    const contents = new Map<SnapshotKey, Buffer | null>();
    for (const [key, entry] of entries) {
      contents.set(key, await this.readCurrent(entry.path));
    }

    const sequence = this.nextSequence++;
    const record: CheckpointRecord = {
      id: `ckpt-${sequence}`,
      sequence,
      label,
      createdAt: new Date(this.now()).toISOString(),
      entries,
      contents,
    };
    this.checkpoints.push(record);

    while (this.checkpoints.length > this.maxRetained) {
      const dropped = this.checkpoints.shift();
      this.logger.debug('Dropped oldest checkpoint', { checkpointId: dropped?.id });
    }

    this.logger.info('Checkpoint created', { checkpointId: record.id, label, files: entries.size });
    return { id: record.id, sequence, label };
  }

  /**
   * Accept all changes. Returns the paths that were tracked.
   */
  keep(): string[] {
    const paths = this.trackedPaths();
    this.modified.clear();
    this.checkpoints = [];
    if (paths.length > 0) {
      this.logger.info('Changes kept', { files: paths.length });
    }
    return paths;
  }

  /**
   * Restore every tracked file to its original state. Files that did not
   * exist are removed first, then pre-existing files are rewritten.
   */
  async revert(): Promise<RestoreResult> {
    const result: RestoreResult = { restored: [], removed: [], failed: [] };
    const entries = [...this.modified.values()];
    const ordered = [
      ...entries.filter(entry => !entry.existedBefore),
      ...entries.filter(entry => entry.existedBefore),
    ];

    for (const entry of ordered) {
      if (await this.restoreOriginal(entry, result)) {
        this.modified.delete(entry.key);
      }
    }
    this.checkpoints = [];

    this.logger.info('Changes reverted', {
      restored: result.restored.length,
      removed: result.removed.length,
      failed: result.failed.length,
    });
    return result;
  }

  /**
   * Return the tracked files to their state at a checkpoint.
   * @throws NoSuchCheckpointError before anything is touched
   */
  async rewind(checkpointId: string | 'latest'): Promise<RewindResult> {
    const index = checkpointId === 'latest'
      ? this.checkpoints.length - 1
      : this.checkpoints.findIndex(cp => cp.id === checkpointId);
    const target = this.checkpoints[index];
    if (!target) {
      throw new NoSuchCheckpointError(checkpointId);
    }

    const result: RewindResult = {
      checkpointId: target.id,
      restored: [],
      removed: [],
      failed: [],
      discarded: [],
    };

    for (const entry of [...this.modified.values()]) {
      if (target.entries.has(entry.key)) {
        await this.writeState(entry.path, target.contents.get(entry.key) ?? null, result);
      } else if (await this.restoreOriginal(entry, result)) {
        // created after the checkpoint, so it leaves the change-set entirely
        this.modified.delete(entry.key);
      }
    }

    result.discarded = this.checkpoints.slice(index + 1).map(cp => cp.id);
    this.checkpoints = this.checkpoints.slice(0, index + 1);

    this.logger.info('Rewound to checkpoint', {
      checkpointId: target.id,
      restored: result.restored.length,
      removed: result.removed.length,
      failed: result.failed.length,
      discarded: result.discarded.length,
    });
    return result;
  }

  /**
   * Diff of each tracked file's original against its current content.
   * Files whose content is back to the original are omitted.
   */
  async diff(): Promise<FileDiff[]> {
    const files: FileDiff[] = [];
    for (const entry of this.modified.values()) {
      let current: Buffer | null;
      try {
        current = await this.readCurrent(entry.path);
      } catch (error) {
        this.logger.warn('Cannot read file for diff', { path: entry.path, error: String(error) });
        continue;
      }

      const before = entry.originalContent;
      if (before === null && current === null) continue;
      if (before !== null && current !== null && before.equals(current)) continue;

      files.push({
        path: entry.path,
        change: before === null ? 'added' : current === null ? 'deleted' : 'modified',
        diff: unifiedDiff(entry.path, before, current),
      });
    }
    return files;
  }

  /**
   * Forget every tracked file and checkpoint without touching the backend.
   */
  clear(): void {
    this.modified = new Map();
    this.checkpoints = [];
    this.setAside = [];
    this.setAsideCheckpoints = [];
    this.nextSequence = 1;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  toSnapshot(): ChangeSetSnapshot {
    const checkpoints: SerializedCheckpoint[] = this.checkpoints.map(cp => ({
      id: cp.id,
      sequence: cp.sequence,
      label: cp.label,
      createdAt: cp.createdAt,
      entries: [...cp.entries.values()].map(serializeEntry),
      contents: Object.fromEntries(
        [...cp.entries.values()].map(entry => [entry.path, encode(cp.contents.get(entry.key) ?? null)])
      ),
    }));
    return {
      modifiedFiles: [...[...this.modified.values()].map(serializeEntry), ...this.setAside],
      checkpoints: [...checkpoints, ...this.setAsideCheckpoints].sort((a, b) => a.sequence - b.sequence),
      nextSequence: this.nextSequence,
    };
  }

  /**
   * Replace the manager's state with a persisted snapshot.
   * @returns paths set aside because they were captured on another backend
   */
  load(snapshot: ChangeSetSnapshot): string[] {
    this.modified = new Map();
    this.setAside = [];
    for (const raw of snapshot.modifiedFiles) {
      const entry = this.deserializeEntry(raw);
      if (entry) {
        this.modified.set(entry.key, entry);
      } else {
        this.setAside.push(raw);
      }
    }

    this.checkpoints = [];
    this.setAsideCheckpoints = [];
    for (const raw of snapshot.checkpoints) {
      const record = this.deserializeCheckpoint(raw);
      if (record) {
        this.checkpoints.push(record);
      } else {
        this.setAsideCheckpoints.push(raw);
      }
    }

    const highest = snapshot.checkpoints.reduce((max, cp) => Math.max(max, cp.sequence), 0);
    this.nextSequence = Math.max(snapshot.nextSequence, highest + 1);

    const setAside = this.setAsidePaths();
    if (setAside.length > 0) {
      this.logger.warn('Set aside changes from another backend', { backendId: this.backend.id, files: setAside.length });
    }
    return setAside;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async readCurrent(path: string): Promise<Buffer | null> {
    if (!(await this.backend.exists(path))) {
      return null;
    }
    return this.backend.readFile(path);
  }

  /**
   * Put one entry back to its original state.
   * @returns true on success
   */
  private async restoreOriginal(entry: FileSnapshot, result: RestoreResult): Promise<boolean> {
    return this.writeState(entry.path, entry.existedBefore ? entry.originalContent : null, result);
  }

  private async writeState(path: string, content: Buffer | null, result: RestoreResult): Promise<boolean> {
    try {
      if (content === null) {
        await this.backend.remove(path);
        result.removed.push(path);
      } else {
        await this.backend.writeFile(path, content);
        result.restored.push(path);
      }
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Restore failed', { path, reason });
      result.failed.push({ path, reason });
      return false;
    }
  }

  /**
   * @returns null when the entry was captured on another backend
   */
  private deserializeEntry(raw: SerializedFileSnapshot): FileSnapshot | null {
    const parts = parseSnapshotKey(raw.key);
    if (!parts || parts.backendId !== this.backend.id) {
      return null;
    }
    return {
      key: snapshotKey(parts.backendId, parts.path),
      path: raw.path,
      originalContent: decode(raw.originalContent),
      existedBefore: raw.existedBefore,
      capturedAt: raw.capturedAt,
    };
  }

  private deserializeCheckpoint(raw: SerializedCheckpoint): CheckpointRecord | null {
    const entries = new Map<SnapshotKey, FileSnapshot>();
    const contents = new Map<SnapshotKey, Buffer | null>();
    for (const rawEntry of raw.entries) {
      const entry = this.deserializeEntry(rawEntry);
      if (!entry) {
        return null;
      }
      entries.set(entry.key, entry);
      contents.set(entry.key, decode(raw.contents[entry.path] ?? null));
    }
    return { id: raw.id, sequence: raw.sequence, label: raw.label, createdAt: raw.createdAt, entries, contents };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function encode(content: Buffer | null): string | null {
  return content === null ? null : content.toString('base64');
}

function decode(content: string | null): Buffer | null {
  return content === null ? null : Buffer.from(content, 'base64');
}

function serializeEntry(entry: FileSnapshot): SerializedFileSnapshot {
  return {
    key: entry.key,
    path: entry.path,
    originalContent: encode(entry.originalContent),
    existedBefore: entry.existedBefore,
    capturedAt: entry.capturedAt,
  };
}
