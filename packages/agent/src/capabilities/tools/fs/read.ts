/**
 * @fileoverview Read tool for file reading
 *
 * Reads files with line numbers, offset, and limit support.
 */

import { z } from 'zod';
import { createLogger } from '../../../infrastructure/logging/index.js';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { formatBackendError, isBinary } from '../utils.js';

const logger = createLogger('tool:read');

const DEFAULT_LIMIT_LINES = 2000;
const MAX_LINE_LENGTH = 2000;

const schema = z.object({
  path: z.string().min(1),
  offset: z.number().int().min(1).optional(),
  limit: z.number().int().min(1).optional(),
});

type ReadInput = z.infer<typeof schema>;

export class ReadFileTool extends BaseTool<ReadInput> {
  readonly name = 'read_file';
  readonly description = 'Read the contents of a file. Returns the file content with line numbers.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the project root' },
      offset: { type: 'integer', description: 'Line number to start reading from (1-based)' },
      limit: { type: 'integer', description: `Maximum number of lines to read (default ${DEFAULT_LIMIT_LINES})` },
    },
    required: ['path'],
  };
  protected readonly schema = schema;

  protected async execute(input: ReadInput, { backend }: ToolContext): Promise<ToolOutcome> {
    let content: Buffer;
    try {
      content = await backend.readFile(input.path);
    } catch (error) {
      logger.debug('File read failed', { path: input.path, error: error instanceof Error ? error.message : String(error) });
      return formatBackendError(error, 'reading file');
    }

    if (isBinary(content)) {
      return { content: `Binary file ${input.path} (${content.length} bytes)`, isError: false };
    }

    const lines = content.toString('utf-8').split('\n');
    const startLine = (input.offset ?? 1) - 1;
    const endLine = Math.min(lines.length, startLine + (input.limit ?? DEFAULT_LIMIT_LINES));
    if (startLine >= lines.length && lines.length > 0) {
      return { content: `Offset ${startLine + 1} is past the end of ${input.path} (${lines.length} lines)`, isError: true };
    }

    const formatted = lines
      .slice(startLine, endLine)
      .map((line, idx) => {
        const truncatedLine = line.length > MAX_LINE_LENGTH ? `${line.substring(0, MAX_LINE_LENGTH)}... [truncated]` : line;
        return `${String(startLine + idx + 1).padStart(6)}→${truncatedLine}`;
      })
      .join('\n');

    const remaining = lines.length - endLine;
    logger.debug('File read completed', { path: input.path, totalLines: lines.length, linesReturned: endLine - startLine });
    return {
      content: remaining > 0 ? `${formatted}\n\n... [${remaining} more lines; use offset to continue]` : formatted,
      isError: false,
    };
  }
}
