/**
 * @fileoverview Tool contracts
 *
 * A tool validates its raw input into a prepared call. The prepared call
 * names the paths it will mutate before anything runs, so the caller can
 * snapshot them first.
 */

import type { TaskMode, TodoItem } from '../../core/types/index.js';
import type { ExecutionBackend, OutputStream } from '../../infrastructure/backend/index.js';
import type { ToolDefinition } from '../../llm/types.js';

export interface ToolContext {
  backend: ExecutionBackend;
  signal: AbortSignal;
  toolUseId: string;
  commandTimeoutMs: number;
  onOutput?: (stream: OutputStream, chunk: string) => void;
  /** Suspends until the user answers; rejects when the run is cancelled */
  ask?: (question: string) => Promise<string>;
}

/**
 * Session-level side effects a tool asks the orchestrator to apply.
 */
export type ToolEffect =
  | { kind: 'plan'; summary: string; steps: string[] }
  | { kind: 'todos'; todos: TodoItem[] };

export interface ToolOutcome {
  content: string;
  isError: boolean;
  effect?: ToolEffect;
}

export interface PreparedCall {
  readonly tool: string;
  readonly mutatedPaths: readonly string[];
  execute(context: ToolContext): Promise<ToolOutcome>;
}

export type PrepareResult =
  | { ok: true; call: PreparedCall }
  | { ok: false; error: string };

export interface AgentTool {
  readonly name: string;
  readonly description: string;
  /** Modes in which the tool is offered to the reasoning service */
  readonly modes: readonly TaskMode[];
  definition(): ToolDefinition;
  prepare(input: Record<string, unknown>): PrepareResult;
}
