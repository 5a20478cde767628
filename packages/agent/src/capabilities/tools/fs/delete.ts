/**
 * @fileoverview Delete tool
 */

import { z } from 'zod';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { formatBackendError } from '../utils.js';

const schema = z.object({
  path: z.string().min(1),
});

type DeleteInput = z.infer<typeof schema>;

export class DeleteFileTool extends BaseTool<DeleteInput> {
  readonly name = 'delete_file';
  override readonly modes = ['build'] as const;
  readonly description = 'Delete a file.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the project root' },
    },
    required: ['path'],
  };
  protected readonly schema = schema;

  override mutatedPaths(input: DeleteInput): string[] {
    return [input.path];
  }

  protected async execute(input: DeleteInput, { backend }: ToolContext): Promise<ToolOutcome> {
    try {
      if (!(await backend.exists(input.path))) {
        return { content: `File not found: ${input.path}`, isError: true };
      }
      await backend.remove(input.path);
      return { content: `Deleted ${input.path}`, isError: false };
    } catch (error) {
      return formatBackendError(error, 'deleting file');
    }
  }
}
