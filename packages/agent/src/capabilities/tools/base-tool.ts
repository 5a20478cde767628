/**
 * @fileoverview Base class for zod-validated tools
 */

import type { z } from 'zod';
import type { TaskMode } from '../../core/types/index.js';
import type { ToolDefinition } from '../../llm/types.js';
import type { AgentTool, PrepareResult, ToolContext, ToolOutcome } from './types.js';

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
}

export abstract class BaseTool<TInput> implements AgentTool {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameters: JsonSchemaObject;
  readonly modes: readonly TaskMode[] = ['build', 'plan'];

  protected abstract readonly schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  definition(): ToolDefinition {
    return { name: this.name, description: this.description, inputSchema: { ...this.parameters } };
  }

  prepare(raw: Record<string, unknown>): PrepareResult {
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
        .join('; ');
      return { ok: false, error: `Invalid input for ${this.name}: ${issues}` };
    }

    const input = parsed.data;
    return {
      ok: true,
      call: {
        tool: this.name,
        mutatedPaths: this.mutatedPaths(input),
        execute: context => this.execute(input, context),
      },
    };
  }

  /**
   * Paths the call writes or deletes. Read-only tools keep the default.
   */
  mutatedPaths(_input: TInput): string[] {
    return [];
  }

  protected abstract execute(input: TInput, context: ToolContext): Promise<ToolOutcome>;
}
