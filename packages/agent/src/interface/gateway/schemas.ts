/**
 * @fileoverview Inbound message schemas
 *
 * Every message a client sends is a JSON object discriminated by `type`.
 * Messages are validated here, once, before anything reaches the
 * coordinator.
 */

import { z } from 'zod';

const text = z.string().min(1);

const imageSchema = z.object({
  mediaType: z.enum(['image/png', 'image/jpeg', 'image/gif', 'image/webp']),
  data: z.string().min(1),
});

export const taskMessageSchema = z.object({
  type: z.literal('task'),
  content: text,
  mode: z.enum(['build', 'plan']).optional(),
  images: z.array(imageSchema).optional(),
});

export const inboundMessageSchema = z.discriminatedUnion('type', [
  taskMessageSchema,
  z.object({ type: z.literal('guidance'), content: z.string() }),
  z.object({ type: z.literal('cancel') }),
  z.object({ type: z.literal('keep') }),
  z.object({ type: z.literal('revert') }),
  z.object({ type: z.literal('checkpoint_restore'), id: text }),
  z.object({ type: z.literal('reset') }),
  z.object({ type: z.literal('plan_approve'), steps: z.array(text).min(1).optional() }),
  z.object({ type: z.literal('plan_reject') }),
  z.object({ type: z.literal('plan_feedback'), feedback: text }),
  z.object({ type: z.literal('answer'), toolUseId: text, answer: z.string() }),
  z.object({ type: z.literal('add_todo'), content: text }),
  z.object({ type: z.literal('remove_todo'), id: text }),
  z.object({ type: z.literal('list_sessions') }),
  z.object({ type: z.literal('rename_session'), name: text }),
  z.object({ type: z.literal('delete_session'), sessionId: text }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;
export type InboundType = InboundMessage['type'];

export type ParseResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; request: string; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse one raw frame. `request` on failure is the frame's `type` when it
 * has one, so the reply can name what was rejected.
 */
export function parseInboundMessage(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, request: 'unknown', error: 'Message is not valid JSON' };
  }

  const result = inboundMessageSchema.safeParse(json);
  if (result.success) {
    return { ok: true, message: result.data };
  }

  const request =
    typeof json === 'object' && json !== null && 'type' in json && typeof json.type === 'string'
      ? json.type
      : 'unknown';
  return { ok: false, request, error: describeIssues(result.error) };
}
