/**
 * @fileoverview Edit tool for file editing
 *
 * Performs exact-match search and replace on a file and returns a unified
 * diff of the change.
 */

import { z } from 'zod';
import { createLogger } from '../../../infrastructure/logging/index.js';
import { renderHunk } from '../../../runtime/checkpoints/diff.js';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { countOccurrences, formatBackendError, preview } from '../utils.js';

const logger = createLogger('tool:edit');

const schema = z.object({
  path: z.string().min(1),
  old_string: z.string().min(1),
  new_string: z.string(),
  replace_all: z.boolean().default(false),
});

type EditInput = z.infer<typeof schema>;

export class EditFileTool extends BaseTool<EditInput> {
  readonly name = 'edit_file';
  override readonly modes = ['build'] as const;
  readonly description = 'Edit a file by replacing old_string with new_string. Requires exact match.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the project root' },
      old_string: { type: 'string', description: 'The exact string to search for and replace' },
      new_string: { type: 'string', description: 'The string to replace old_string with' },
      replace_all: { type: 'boolean', description: 'Replace all occurrences (default: false)', default: false },
    },
    required: ['path', 'old_string', 'new_string'],
  };
  protected readonly schema = schema;

  override mutatedPaths(input: EditInput): string[] {
    return [input.path];
  }

  protected async execute(input: EditInput, { backend }: ToolContext): Promise<ToolOutcome> {
    if (input.old_string === input.new_string) {
      return { content: 'Error: old_string and new_string are the same. No changes needed.', isError: true };
    }

    let content: string;
    try {
      content = (await backend.readFile(input.path)).toString('utf-8');
    } catch (error) {
      return formatBackendError(error, 'editing file');
    }

    const occurrences = countOccurrences(content, input.old_string);
    if (occurrences === 0) {
      return {
        content: `Error: old_string not found in file. The exact string "${preview(input.old_string, 50)}" does not exist in ${input.path}`,
        isError: true,
      };
    }
    if (occurrences > 1 && !input.replace_all) {
      return {
        content: `Error: old_string appears multiple times (${occurrences} occurrences). Use replace_all: true to replace all occurrences, or provide more context to make the match unique.`,
        isError: true,
      };
    }

    const updated = input.replace_all
      ? content.split(input.old_string).join(input.new_string)
      : content.replace(input.old_string, () => input.new_string);

    try {
      await backend.writeFile(input.path, updated);
    } catch (error) {
      return formatBackendError(error, 'editing file');
    }

    const replacements = input.replace_all ? occurrences : 1;
    logger.info('File edit completed', { path: input.path, replacements });
    return {
      content: [
        `Successfully replaced ${replacements} occurrence${replacements > 1 ? 's' : ''} in ${input.path}`,
        '',
        renderHunk(content, updated, 2),
      ].join('\n'),
      isError: false,
    };
  }
}
