/**
 * @fileoverview Tools module exports
 *
 * Tools are organized by domain:
 * - fs/     - Filesystem operations (read, list, write, edit, delete)
 * - system/ - Shell commands
 * - ui/     - Plan proposals, todos and clarifying questions
 */

export { BaseTool, type JsonSchemaObject } from './base-tool.js';
export { ToolRegistry, createDefaultToolRegistry } from './registry.js';
export type { AgentTool, PreparedCall, PrepareResult, ToolContext, ToolEffect, ToolOutcome } from './types.js';
export { truncateOutput, type TruncateResult } from './utils.js';

export { ReadFileTool, ListDirectoryTool, WriteFileTool, EditFileTool, DeleteFileTool } from './fs/index.js';
export { RunCommandTool } from './system/run-command.js';
export { ProposePlanTool, UpdateTodosTool, AskUserTool, formatTodos } from './ui/index.js';
