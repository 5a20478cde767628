export { ReadFileTool } from './read.js';
export { ListDirectoryTool } from './list.js';
export { WriteFileTool } from './write.js';
export { EditFileTool } from './edit.js';
export { DeleteFileTool } from './delete.js';
