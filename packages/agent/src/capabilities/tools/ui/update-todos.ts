/**
 * @fileoverview Todo list tool
 *
 * Replaces the session's todo list. Items without an id get one from their
 * position.
 */

import { z } from 'zod';
import type { TodoItem } from '../../../core/types/index.js';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';

const schema = z.object({
  todos: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        content: z.string().min(1),
        status: z.enum(['pending', 'in_progress', 'completed']),
      })
    )
    .max(100),
});

type UpdateTodosInput = z.infer<typeof schema>;

const STATUS_MARKERS: Record<TodoItem['status'], string> = {
  pending: '[ ]',
  in_progress: '[>]',
  completed: '[x]',
};

export function formatTodos(todos: readonly TodoItem[]): string {
  if (todos.length === 0) return '(no todos)';
  return todos.map(todo => `${STATUS_MARKERS[todo.status]} ${todo.content}`).join('\n');
}

export class UpdateTodosTool extends BaseTool<UpdateTodosInput> {
  readonly name = 'update_todos';
  readonly description =
    'Replace the task checklist. Send the full list each time; mark one item in_progress while you work on it.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      todos: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            content: { type: 'string' },
            status: { type: 'string', enum: ['pending', 'in_progress', 'completed'] },
          },
          required: ['content', 'status'],
        },
      },
    },
    required: ['todos'],
  };
  protected readonly schema = schema;

  protected async execute(input: UpdateTodosInput, _context: ToolContext): Promise<ToolOutcome> {
    const todos: TodoItem[] = input.todos.map((todo, index) => ({
      id: todo.id ?? `todo-${index + 1}`,
      content: todo.content.trim(),
      status: todo.status,
    }));
    const completed = todos.filter(todo => todo.status === 'completed').length;
    return {
      content: `Todos updated (${completed}/${todos.length} completed)\n${formatTodos(todos)}`,
      isError: false,
      effect: { kind: 'todos', todos },
    };
  }
}
