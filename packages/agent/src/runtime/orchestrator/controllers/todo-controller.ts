/**
 * @fileoverview Todo Controller
 *
 * Adds and removes items on a session's todo list at the user's request.
 * The update_todos tool replaces the whole list through the orchestrator.
 */

import { ErrorCodes, TillerError } from '../../../core/errors/index.js';
import type { TodoItem } from '../../../core/types/index.js';
import type { AgentSession } from '../../agent/session.js';

export class TodoController {
  add(session: AgentSession, content: string): TodoItem {
    const taken = new Set(session.todos.map(todo => todo.id));
    let next = session.todos.length + 1;
    while (taken.has(`todo-${next}`)) {
      next++;
    }

    const todo: TodoItem = { id: `todo-${next}`, content: content.trim(), status: 'pending' };
    session.todos = [...session.todos, todo];
    session.emit({ type: 'todos', todos: session.todos });
    return todo;
  }

  /**
   * @throws TillerError when no todo has the id
   */
  remove(session: AgentSession, id: string): void {
    const remaining = session.todos.filter(todo => todo.id !== id);
    if (remaining.length === session.todos.length) {
      throw new TillerError(`No todo with id ${id}`, { code: ErrorCodes.INVALID_STATE, category: 'invalid_request' });
    }
    session.todos = remaining;
    session.emit({ type: 'todos', todos: session.todos });
  }
}
