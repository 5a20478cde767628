/**
 * @fileoverview Tool registry
 *
 * Looks tools up by name, filters them by task mode and prepares calls.
 */

import type { TaskMode } from '../../core/types/index.js';
import type { ToolDefinition } from '../../llm/types.js';
import { DeleteFileTool, EditFileTool, ListDirectoryTool, ReadFileTool, WriteFileTool } from './fs/index.js';
import { RunCommandTool } from './system/run-command.js';
import type { AgentTool, PrepareResult } from './types.js';
import { AskUserTool, ProposePlanTool, UpdateTodosTool } from './ui/index.js';

export class ToolRegistry {
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: AgentTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: AgentTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(mode: TaskMode): ToolDefinition[] {
    return [...this.tools.values()].filter(tool => tool.modes.includes(mode)).map(tool => tool.definition());
  }

  prepare(name: string, input: Record<string, unknown>, mode: TaskMode): PrepareResult {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: `Unknown tool: ${name}. Available tools: ${this.names().join(', ')}` };
    }
    if (!tool.modes.includes(mode)) {
      return { ok: false, error: `Tool ${name} is not available in ${mode} mode` };
    }
    return tool.prepare(input);
  }
}

export function createDefaultToolRegistry(): ToolRegistry {
  return new ToolRegistry([
    new ReadFileTool(),
    new ListDirectoryTool(),
    new WriteFileTool(),
    new EditFileTool(),
    new DeleteFileTool(),
    new RunCommandTool(),
    new ProposePlanTool(),
    new UpdateTodosTool(),
    new AskUserTool(),
  ]);
}
