/**
 * @fileoverview Controller exports
 */

export { ChangeController, describePaths } from './change-controller.js';
export { TodoController } from './todo-controller.js';
