/**
 * @fileoverview Write tool for creating and overwriting files
 */

import { z } from 'zod';
import { createLogger } from '../../../infrastructure/logging/index.js';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { formatBackendError } from '../utils.js';

const logger = createLogger('tool:write');

const schema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

type WriteInput = z.infer<typeof schema>;

export class WriteFileTool extends BaseTool<WriteInput> {
  readonly name = 'write_file';
  override readonly modes = ['build'] as const;
  readonly description =
    'Write content to a file, creating it and its parent directories if needed. Overwrites existing files.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the project root' },
      content: { type: 'string', description: 'The full content to write' },
    },
    required: ['path', 'content'],
  };
  protected readonly schema = schema;

  override mutatedPaths(input: WriteInput): string[] {
    return [input.path];
  }

  protected async execute(input: WriteInput, { backend }: ToolContext): Promise<ToolOutcome> {
    try {
      const existed = await backend.exists(input.path);
      await backend.writeFile(input.path, input.content);
      const bytesWritten = Buffer.byteLength(input.content);
      logger.info('File write completed', { path: input.path, bytesWritten, created: !existed });
      return {
        content: existed
          ? `Successfully wrote ${bytesWritten} bytes to ${input.path} (overwritten)`
          : `Successfully created ${input.path} with ${bytesWritten} bytes`,
        isError: false,
      };
    } catch (error) {
      return formatBackendError(error, 'writing file');
    }
  }
}
