/**
 * @fileoverview Checkpoint exports
 */

export {
  CheckpointManager,
  type CheckpointInfo,
  type CheckpointManagerOptions,
  type CheckpointRecord,
  type FileSnapshot,
  type RestoreResult,
  type RewindResult,
} from './checkpoint-manager.js';
export { parseSnapshotKey, snapshotKey, type SnapshotKey, type SnapshotKeyParts } from './snapshot-key.js';
export { unifiedDiff, renderHunk } from './diff.js';
