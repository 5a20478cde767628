/**
 * @fileoverview Clarifying question tool
 *
 * Suspends the run until the user answers through the session.
 */

import { z } from 'zod';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';

const schema = z.object({
  question: z.string().min(1).max(2000),
});

type AskUserInput = z.infer<typeof schema>;

export class AskUserTool extends BaseTool<AskUserInput> {
  readonly name = 'ask_user';
  readonly description =
    'Ask the user one focused clarifying question and wait for the answer. Use only when the task is ambiguous in a way that changes the outcome.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      question: { type: 'string', description: 'The question to ask' },
    },
    required: ['question'],
  };
  protected readonly schema = schema;

  protected async execute(input: AskUserInput, context: ToolContext): Promise<ToolOutcome> {
    if (!context.ask) {
      return { content: 'No user is available to answer questions. Proceed with your best judgement.', isError: true };
    }
    const answer = await context.ask(input.question.trim());
    return { content: `User answered: ${answer}`, isError: false };
  }
}
