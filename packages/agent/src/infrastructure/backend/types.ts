/**
 * @fileoverview Execution backend contract
 *
 * The environment file reads, writes and commands run against. Paths are
 * interpreted relative to the backend root; anything resolving outside it is
 * rejected with PathEscapeError.
 */

export type OutputStream = 'stdout' | 'stderr';

export interface DirEntry {
  name: string;
  kind: 'file' | 'directory' | 'other';
}

export interface CommandOptions {
  signal?: AbortSignal;
  /** Called with each chunk as the command produces it */
  onOutput?: (stream: OutputStream, chunk: string) => void;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  timedOut: boolean;
  aborted: boolean;
}

export interface ExecutionBackend {
  /** Opaque identity; snapshot keys from different backends never collide */
  readonly id: string;
  readonly root: string;

  /**
   * Normalize a path to its root-relative POSIX form.
   * @throws PathEscapeError
   */
  resolve(path: string): string;
  readFile(path: string): Promise<Buffer>;
  writeFile(path: string, content: Buffer | string): Promise<void>;
  /** Removes a file; a missing file is not an error */
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  listDir(path: string): Promise<DirEntry[]>;
  runCommand(command: string, options?: CommandOptions): Promise<CommandResult>;
}
