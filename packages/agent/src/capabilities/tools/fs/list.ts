/**
 * @fileoverview Directory listing tool
 */

import { z } from 'zod';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { formatBackendError } from '../utils.js';

const schema = z.object({
  path: z.string().default('.'),
});

type ListInput = z.infer<typeof schema>;

export class ListDirectoryTool extends BaseTool<ListInput> {
  readonly name = 'list_directory';
  readonly description = 'List the entries of a directory. Directories are shown with a trailing slash.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      path: { type: 'string', description: 'Directory to list, relative to the project root (default ".")' },
    },
  };
  protected readonly schema = schema;

  protected async execute(input: ListInput, { backend }: ToolContext): Promise<ToolOutcome> {
    try {
      const entries = await backend.listDir(input.path);
      if (entries.length === 0) {
        return { content: '(empty directory)', isError: false };
      }
      return {
        content: entries.map(entry => (entry.kind === 'directory' ? `${entry.name}/` : entry.name)).join('\n'),
        isError: false,
      };
    } catch (error) {
      return formatBackendError(error, 'listing directory');
    }
  }
}
