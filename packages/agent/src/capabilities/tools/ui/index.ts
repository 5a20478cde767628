export { ProposePlanTool } from './propose-plan.js';
export { UpdateTodosTool, formatTodos } from './update-todos.js';
export { AskUserTool } from './ask-user.js';
