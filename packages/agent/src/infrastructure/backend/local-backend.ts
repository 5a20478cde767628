/**
 * @fileoverview Local filesystem backend
 *
 * Confines every path to a root directory and runs commands through
 * `/bin/sh -c` in that directory. Commands are spawned in their own process
 * group so an abort or timeout reaches every descendant: SIGTERM first, then
 * SIGKILL once the grace period runs out.
 */

import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BackendIOError, PathEscapeError } from '../../core/errors/index.js';
import { createLogger } from '../logging/index.js';
import type { CommandOptions, CommandResult, DirEntry, ExecutionBackend } from './types.js';

const logger = createLogger('local-backend');

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_KILL_GRACE_MS = 2_000;
/** Output kept in memory per command; the tail beyond this is dropped */
const MAX_BUFFERED_OUTPUT = 1_000_000;

export interface LocalBackendOptions {
  root: string;
  id?: string;
  killGraceMs?: number;
  shell?: string;
}

export class LocalBackend implements ExecutionBackend {
  readonly id: string;
  readonly root: string;
  private readonly killGraceMs: number;
  private readonly shell: string;

  constructor(options: LocalBackendOptions) {
    this.root = path.resolve(options.root);
    this.id = options.id ?? `local:${this.root}`;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.shell = options.shell ?? '/bin/sh';
  }

  resolve(target: string): string {
    const absolute = path.resolve(this.root, target);
    const relative = path.relative(this.root, absolute);
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new PathEscapeError(target, this.root);
    }
    return relative.split(path.sep).join('/');
  }

  private absolute(target: string): string {
    return path.join(this.root, this.resolve(target));
  }

  async readFile(target: string): Promise<Buffer> {
    const file = this.absolute(target);
    try {
      return await fs.readFile(file);
    } catch (error) {
      throw ioError('read', target, error);
    }
  }

  async writeFile(target: string, content: Buffer | string): Promise<void> {
    const file = this.absolute(target);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, content);
    } catch (error) {
      throw ioError('write', target, error);
    }
  }

  async remove(target: string): Promise<void> {
    const file = this.absolute(target);
    try {
      await fs.rm(file, { force: true });
    } catch (error) {
      throw ioError('remove', target, error);
    }
  }

  async exists(target: string): Promise<boolean> {
    const file = this.absolute(target);
    try {
      await fs.stat(file);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw ioError('stat', target, error);
    }
  }

  async listDir(target: string): Promise<DirEntry[]> {
    const dir = this.absolute(target);
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .map((entry): DirEntry => ({
          name: entry.name,
          kind: entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : 'other',
        }))
        .sort((a, b) => a.name.localeCompare(b.name));
    } catch (error) {
      throw ioError('list', target, error);
    }
  }

  runCommand(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    const { signal, onOutput } = options;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (signal?.aborted) {
      return Promise.resolve({ exitCode: 130, output: '', timedOut: false, aborted: true });
    }

    return new Promise((resolve, reject) => {
      let output = '';
      let timedOut = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;

      const proc = spawn(this.shell, ['-c', command], {
        cwd: this.root,
        env: { ...process.env },
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const terminate = (): void => {
        signalGroup(proc, 'SIGTERM');
        killTimer = setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            logger.debug('Command ignored SIGTERM, sending SIGKILL', { command, pid: proc.pid });
            signalGroup(proc, 'SIGKILL');
          }
        }, this.killGraceMs);
      };

      const timeoutId = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeoutMs);

      const abortHandler = (): void => {
        aborted = true;
        terminate();
      };
      signal?.addEventListener('abort', abortHandler, { once: true });

      const collect = (stream: 'stdout' | 'stderr') => (data: Buffer) => {
        const chunk = data.toString();
        if (output.length < MAX_BUFFERED_OUTPUT) {
          output += chunk;
        }
        onOutput?.(stream, chunk);
      };
      proc.stdout?.on('data', collect('stdout'));
      proc.stderr?.on('data', collect('stderr'));

      const cleanup = (): void => {
        clearTimeout(timeoutId);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', abortHandler);
      };

      proc.on('close', (code: number | null) => {
        cleanup();
        const fallback = timedOut ? 137 : aborted ? 130 : 1;
        resolve({ exitCode: code ?? fallback, output, timedOut, aborted });
      });

      proc.on('error', (error: Error) => {
        cleanup();
        reject(new BackendIOError(`Failed to start command: ${error.message}`, {
          path: this.root,
          operation: 'exec',
          cause: error,
        }));
      });
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function signalGroup(proc: ChildProcess, sig: NodeJS.Signals): void {
  if (proc.pid === undefined) return;
  try {
    process.kill(-proc.pid, sig);
  } catch (error) {
    // group already gone; fall back to the direct child
    logger.trace('Process group signal failed', { pid: proc.pid, sig, error: String(error) });
    proc.kill(sig);
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function ioError(operation: BackendIOError['operation'], target: string, error: unknown): BackendIOError {
  const code = errnoCode(error);
  const reason = code === 'ENOENT' ? 'no such file or directory' : error instanceof Error ? error.message : String(error);
  return new BackendIOError(`Cannot ${operation} ${target}: ${reason}`, {
    path: target,
    operation,
    cause: error,
  });
}
