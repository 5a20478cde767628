/**
 * @fileoverview In-memory backend
 *
 * Holds files in a map keyed by root-relative path. Directories exist
 * implicitly as prefixes of file paths. Commands are answered by an optional
 * handler; without one every command exits 0 with no output.
 */

import * as path from 'path';
import { BackendIOError, PathEscapeError } from '../../core/errors/index.js';
import type { CommandOptions, CommandResult, DirEntry, ExecutionBackend } from './types.js';

export type CommandHandler = (
  command: string,
  options: CommandOptions
) => CommandResult | Promise<CommandResult>;

export interface MemoryBackendOptions {
  id?: string;
  files?: Record<string, string>;
  commandHandler?: CommandHandler;
}

export class MemoryBackend implements ExecutionBackend {
  readonly id: string;
  readonly root = '/workspace';
  readonly files = new Map<string, Buffer>();
  readonly commands: string[] = [];
  private readonly commandHandler?: CommandHandler;

  constructor(options: MemoryBackendOptions = {}) {
    this.id = options.id ?? 'memory';
    this.commandHandler = options.commandHandler;
    for (const [file, content] of Object.entries(options.files ?? {})) {
      this.files.set(this.resolve(file), Buffer.from(content));
    }
  }

  resolve(target: string): string {
    const absolute = path.posix.resolve(this.root, target);
    const relative = path.posix.relative(this.root, absolute);
    if (relative === '..' || relative.startsWith('../')) {
      throw new PathEscapeError(target, this.root);
    }
    return relative;
  }

  /** Convenience for assertions: file content as UTF-8, or undefined */
  text(target: string): string | undefined {
    return this.files.get(this.resolve(target))?.toString('utf-8');
  }

  async readFile(target: string): Promise<Buffer> {
    const content = this.files.get(this.resolve(target));
    if (!content) {
      throw new BackendIOError(`Cannot read ${target}: no such file or directory`, {
        path: target,
        operation: 'read',
      });
    }
    return Buffer.from(content);
  }

  async writeFile(target: string, content: Buffer | string): Promise<void> {
    this.files.set(this.resolve(target), Buffer.from(content));
  }

  async remove(target: string): Promise<void> {
    this.files.delete(this.resolve(target));
  }

  async exists(target: string): Promise<boolean> {
    const key = this.resolve(target);
    if (this.files.has(key)) return true;
    return [...this.files.keys()].some(file => key === '' || file.startsWith(`${key}/`));
  }

  async listDir(target: string): Promise<DirEntry[]> {
    const key = this.resolve(target);
    const prefix = key === '' ? '' : `${key}/`;
    const entries = new Map<string, DirEntry['kind']>();
    for (const file of this.files.keys()) {
      if (!file.startsWith(prefix)) continue;
      const [head, ...rest] = file.slice(prefix.length).split('/');
      if (head) {
        entries.set(head, rest.length > 0 ? 'directory' : 'file');
      }
    }
    if (entries.size === 0 && !(await this.exists(target))) {
      throw new BackendIOError(`Cannot list ${target}: no such file or directory`, {
        path: target,
        operation: 'list',
      });
    }
    return [...entries.entries()]
      .map(([name, kind]) => ({ name, kind }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async runCommand(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    this.commands.push(command);
    if (options.signal?.aborted) {
      return { exitCode: 130, output: '', timedOut: false, aborted: true };
    }
    if (this.commandHandler) {
      return this.commandHandler(command, options);
    }
    return { exitCode: 0, output: '', timedOut: false, aborted: false };
  }
}
