/**
 * @fileoverview Plan proposal tool (plan mode only)
 */

import { z } from 'zod';
import { BaseTool } from '../base-tool.js';
import type { ToolContext, ToolOutcome } from '../types.js';

const schema = z.object({
  summary: z.string().min(1),
  steps: z.array(z.string().min(1)).min(1).max(50),
});

type ProposePlanInput = z.infer<typeof schema>;

export class ProposePlanTool extends BaseTool<ProposePlanInput> {
  readonly name = 'propose_plan';
  override readonly modes = ['plan'] as const;
  readonly description =
    'Propose an implementation plan for user approval. Call once, after investigating, with a short summary and ordered concrete steps.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      summary: { type: 'string', description: 'One-paragraph summary of the approach' },
      steps: { type: 'array', items: { type: 'string' }, description: 'Ordered implementation steps' },
    },
    required: ['summary', 'steps'],
  };
  protected readonly schema = schema;

  protected async execute(input: ProposePlanInput, _context: ToolContext): Promise<ToolOutcome> {
    const steps = input.steps.map(step => step.trim());
    return {
      content: `Plan recorded with ${steps.length} step${steps.length === 1 ? '' : 's'}. Waiting for user approval.`,
      isError: false,
      effect: { kind: 'plan', summary: input.summary.trim(), steps },
    };
  }
}
