/**
 * @fileoverview Command tool
 *
 * Runs a shell command in the project root through the backend, streaming
 * its output as it arrives. An abort kills the whole process group.
 */

import { z } from 'zod';
import { createLogger } from '../../../infrastructure/logging/index.js';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';
import { formatBackendError } from '../utils.js';

const logger = createLogger('tool:run-command');

const MAX_TIMEOUT_MS = 600_000;

const schema = z.object({
  command: z.string().min(1),
  timeout_ms: z.number().int().min(1).max(MAX_TIMEOUT_MS).optional(),
});

type RunCommandInput = z.infer<typeof schema>;

export class RunCommandTool extends BaseTool<RunCommandInput> {
  readonly name = 'run_command';
  override readonly modes = ['build'] as const;
  readonly description =
    'Run a shell command in the project root. Returns combined stdout and stderr and the exit code.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      command: { type: 'string', description: 'The command to run with /bin/sh' },
      timeout_ms: { type: 'integer', description: `Timeout in milliseconds (max ${MAX_TIMEOUT_MS})` },
    },
    required: ['command'],
  };
  protected readonly schema = schema;

  protected async execute(input: RunCommandInput, context: ToolContext): Promise<ToolOutcome> {
    const { command } = input;
    if (context.signal.aborted) {
      return { content: 'Command execution was interrupted before it started', isError: true };
    }

    const timeoutMs = input.timeout_ms ?? context.commandTimeoutMs;
    const startTime = Date.now();
    try {
      const result = await context.backend.runCommand(command, {
        signal: context.signal,
        timeoutMs,
        onOutput: context.onOutput,
      });
      const durationMs = Date.now() - startTime;
      const output = result.output.trimEnd();

      if (result.aborted) {
        logger.info('Command interrupted', { command, durationMs });
        return {
          content: output ? `Command interrupted. Partial output:\n${output}` : 'Command interrupted (no output captured)',
          isError: true,
        };
      }
      if (result.timedOut) {
        logger.warn('Command timed out', { command, timeoutMs });
        return {
          content: `Command timed out after ${timeoutMs}ms${output ? `. Partial output:\n${output}` : ''}`,
          isError: true,
        };
      }

      logger.debug('Command completed', { command, exitCode: result.exitCode, durationMs });
      const body = output === '' ? '(no output)' : output;
      return {
        content: result.exitCode === 0 ? body : `${body}\n\nExit code: ${result.exitCode}`,
        isError: result.exitCode !== 0,
      };
    } catch (error) {
      return formatBackendError(error, 'running command');
    }
  }
}
