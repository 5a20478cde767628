/**
 * @fileoverview CheckpointManager tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { CheckpointManager } from '../index.js';
import { MemoryBackend } from '../../../infrastructure/backend/index.js';
import { BackendIOError, NoSuchCheckpointError } from '../../../core/errors/index.js';

/** Backend whose writes to selected paths fail */
class FlakyBackend extends MemoryBackend {
  readonly failingWrites = new Set<string>();

  override async writeFile(target: string, content: Buffer | string): Promise<void> {
    if (this.failingWrites.has(target)) {
      throw new BackendIOError(`Cannot write ${target}: disk full`, { path: target, operation: 'write' });
    }
    return super.writeFile(target, content);
  }
}

async function write(manager: CheckpointManager, backend: MemoryBackend, path: string, content: string): Promise<void> {
  await manager.track(path);
  await backend.writeFile(path, content);
}

describe('CheckpointManager', () => {
  let backend: FlakyBackend;
  let manager: CheckpointManager;

  beforeEach(() => {
    backend = new FlakyBackend({ files: { 'b.py': 'x=1\n', 'c.py': 'keep me\n' } });
    manager = new CheckpointManager(backend, { now: () => 1_700_000_000_000 });
  });

  describe('track', () => {
    it('captures the original only on first touch', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await write(manager, backend, 'b.py', 'x=3\n');

      await manager.revert();
      expect(backend.text('b.py')).toBe('x=1\n');
    });

    it('normalizes paths so aliases share one entry', async () => {
      await manager.track('b.py');
      await manager.track('./sub/../b.py');
      expect(manager.trackedPaths()).toEqual(['b.py']);
    });
  });

  describe('revert', () => {
    it('removes created files and restores edited ones', async () => {
      await write(manager, backend, 'a.py', 'print("new")\n');
      await write(manager, backend, 'b.py', 'x=2\n');

      const result = await manager.revert();

      expect(await backend.exists('a.py')).toBe(false);
      expect(backend.text('b.py')).toBe('x=1\n');
      expect(result).toEqual({ restored: ['b.py'], removed: ['a.py'], failed: [] });
      expect(manager.hasChanges()).toBe(false);
    });

    it('restores a file that was deleted', async () => {
      await manager.track('c.py');
      await backend.remove('c.py');

      await manager.revert();
      expect(backend.text('c.py')).toBe('keep me\n');
    });

    it('tolerates a created file that is already gone', async () => {
      await write(manager, backend, 'tmp.txt', 'scratch');
      await backend.remove('tmp.txt');

      const result = await manager.revert();
      expect(result.failed).toEqual([]);
      expect(result.removed).toEqual(['tmp.txt']);
    });

    it('reports failures, continues, and keeps failed entries tracked', async () => {
      await write(manager, backend, 'a.py', 'new');
      await write(manager, backend, 'b.py', 'x=2\n');
      backend.failingWrites.add('b.py');

      const result = await manager.revert();

      expect(result.removed).toEqual(['a.py']);
      expect(result.failed).toEqual([{ path: 'b.py', reason: 'Cannot write b.py: disk full' }]);
      expect(manager.trackedPaths()).toEqual(['b.py']);

      backend.failingWrites.clear();
      const retry = await manager.revert();
      expect(retry.restored).toEqual(['b.py']);
      expect(backend.text('b.py')).toBe('x=1\n');
    });
  });

  describe('keep', () => {
    it('clears tracking without touching files', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await manager.checkpoint('step-1');

      expect(manager.keep()).toEqual(['b.py']);
      expect(manager.hasChanges()).toBe(false);
      expect(manager.listCheckpoints()).toEqual([]);
      expect(backend.text('b.py')).toBe('x=2\n');
    });

    it('is a no-op when repeated or when nothing is tracked', async () => {
      expect(manager.keep()).toEqual([]);
      await write(manager, backend, 'b.py', 'x=2\n');
      manager.keep();
      expect(manager.keep()).toEqual([]);
      expect(backend.text('b.py')).toBe('x=2\n');
    });

    it('makes the kept content the new baseline', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      manager.keep();
      await write(manager, backend, 'b.py', 'x=3\n');

      await manager.revert();
      expect(backend.text('b.py')).toBe('x=2\n');
    });
  });

  describe('rewind', () => {
    it('restores post-step-1 content and discards later checkpoints', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      const step1 = await manager.checkpoint('step-1');

      await write(manager, backend, 'b.py', 'x=3\n');
      await write(manager, backend, 'a.py', 'created in step 2\n');
      const step2 = await manager.checkpoint('step-2');

      const result = await manager.rewind(step1.id);

      expect(backend.text('b.py')).toBe('x=2\n');
      expect(await backend.exists('a.py')).toBe(false);
      expect(result).toEqual({
        checkpointId: step1.id,
        restored: ['b.py'],
        removed: ['a.py'],
        failed: [],
        discarded: [step2.id],
      });
      expect(manager.listCheckpoints()).toEqual([{ id: step1.id, sequence: 1, label: 'step-1' }]);
      expect(manager.trackedPaths()).toEqual(['b.py']);

      // original baseline survives the rewind
      await manager.revert();
      expect(backend.text('b.py')).toBe('x=1\n');
    });

    it('rewinds to the latest checkpoint', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await manager.checkpoint(null);
      await backend.writeFile('b.py', 'x=99\n');

      const result = await manager.rewind('latest');
      expect(result.checkpointId).toBe('ckpt-1');
      expect(backend.text('b.py')).toBe('x=2\n');
    });

    it('rejects an unknown id without changing anything', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await manager.checkpoint('step-1');

      await expect(manager.rewind('ckpt-42')).rejects.toBeInstanceOf(NoSuchCheckpointError);
      expect(backend.text('b.py')).toBe('x=2\n');
      expect(manager.listCheckpoints()).toHaveLength(1);
    });

    it('rejects latest when there are no checkpoints', async () => {
      await expect(manager.rewind('latest')).rejects.toThrow('No such checkpoint: latest');
    });
  });

  describe('checkpoint', () => {
    it('numbers checkpoints monotonically and caps retention', async () => {
      const capped = new CheckpointManager(backend, { maxRetained: 2 });
      await capped.checkpoint('one');
      await capped.checkpoint('two');
      await capped.checkpoint('three');

      expect(capped.listCheckpoints().map(cp => cp.id)).toEqual(['ckpt-2', 'ckpt-3']);
    });
  });

  describe('diff', () => {
    it('renders added, modified and deleted files', async () => {
      await write(manager, backend, 'a.py', 'hi\n');
      await write(manager, backend, 'b.py', 'x=2\n');
      await manager.track('c.py');
      await backend.remove('c.py');

      expect(await manager.diff()).toEqual([
        { path: 'a.py', change: 'added', diff: '--- /dev/null\n+++ b/a.py\n@@ -0,0 +1,1 @@\n+hi' },
        { path: 'b.py', change: 'modified', diff: '--- a/b.py\n+++ b/b.py\n@@ -1,1 +1,1 @@\n-x=1\n+x=2' },
        { path: 'c.py', change: 'deleted', diff: '--- a/c.py\n+++ /dev/null\n@@ -1,1 +0,0 @@\n-keep me' },
      ]);
    });

    it('omits files whose content is back to the original', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await backend.writeFile('b.py', 'x=1\n');
      expect(await manager.diff()).toEqual([]);
    });
  });

  describe('serialization', () => {
    it('survives a snapshot round trip', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');
      await manager.checkpoint('step-1');
      await write(manager, backend, 'a.py', 'new\n');

      const restored = new CheckpointManager(backend);
      restored.load(JSON.parse(JSON.stringify(manager.toSnapshot())));

      expect(restored.trackedPaths()).toEqual(['b.py', 'a.py']);
      const next = await restored.checkpoint('step-2');
      expect(next.id).toBe('ckpt-2');

      await restored.rewind('ckpt-1');
      expect(backend.text('b.py')).toBe('x=2\n');
      expect(await backend.exists('a.py')).toBe(false);
    });

    it('keeps the stored key of each entry', async () => {
      await write(manager, backend, 'b.py', 'x=2\n');

      const snapshot = manager.toSnapshot();
      const restored = new CheckpointManager(backend);
      restored.load(snapshot);

      expect(restored.toSnapshot().modifiedFiles.map(entry => entry.key)).toEqual(['["memory","b.py"]']);
    });
  });

  describe('backend isolation', () => {
    it('never shares snapshots between backends with the same path', async () => {
      const other = new MemoryBackend({ id: 'remote-a', files: { 'b.py': 'REMOTE ORIGINAL' } });
      const remote = new CheckpointManager(other);
      await write(remote, other, 'b.py', 'remote edit');
      await backend.writeFile('b.py', 'local work');

      const local = new CheckpointManager(backend);
      const setAside = local.load(remote.toSnapshot());

      expect(setAside).toEqual(['b.py']);
      expect(local.hasChanges()).toBe(false);
      expect(await local.diff()).toEqual([]);
      expect(await local.revert()).toEqual({ restored: [], removed: [], failed: [] });
      expect(backend.text('b.py')).toBe('local work');
    });

    it('persists set-aside entries and checkpoints unchanged', async () => {
      const other = new MemoryBackend({ id: 'remote-a', files: { 'b.py': 'REMOTE ORIGINAL' } });
      const remote = new CheckpointManager(other);
      await write(remote, other, 'b.py', 'remote edit');
      await remote.checkpoint('step-1');
      const snapshot = remote.toSnapshot();

      const local = new CheckpointManager(backend);
      local.load(snapshot);
      await expect(local.rewind('ckpt-1')).rejects.toBeInstanceOf(NoSuchCheckpointError);
      expect(local.toSnapshot()).toEqual(snapshot);

      const back = new CheckpointManager(other);
      expect(back.load(local.toSnapshot())).toEqual([]);
      await back.revert();
      expect(other.text('b.py')).toBe('REMOTE ORIGINAL');
    });

    it('forgets set-aside entries on clear', async () => {
      const other = new MemoryBackend({ id: 'remote-a', files: { 'b.py': 'x' } });
      const remote = new CheckpointManager(other);
      await remote.track('b.py');

      const local = new CheckpointManager(backend);
      local.load(remote.toSnapshot());
      local.clear();

      expect(local.setAsidePaths()).toEqual([]);
      expect(local.toSnapshot().modifiedFiles).toEqual([]);
    });
  });
});
