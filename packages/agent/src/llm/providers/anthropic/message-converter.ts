/**
 * @fileoverview Anthropic message conversion
 *
 * Converts engine turns and tool definitions into Messages API parameters.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock, Turn } from '../../../core/types/index.js';
import type { ToolDefinition } from '../../types.js';

type MessageParam = Anthropic.Messages.MessageParam;
type BlockParam = Anthropic.Messages.ContentBlockParam;
type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

const IMAGE_MEDIA_TYPES: readonly ImageMediaType[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

/** Prefix for guidance turns, which the API sees as user text */
export const GUIDANCE_PREFIX = '[User guidance while you were working]';

function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.some(type => type === value);
}

function convertBlock(block: ContentBlock): BlockParam | null {
  switch (block.type) {
    case 'text':
      return block.text.length > 0 ? { type: 'text', text: block.text } : null;
    case 'thinking':
      // Unsigned thinking is display-only and cannot be sent back
      return block.signature
        ? { type: 'thinking', thinking: block.thinking, signature: block.signature }
        : null;
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.toolUseId,
        content: block.content,
        is_error: !block.success,
      };
    case 'image':
      if (!isImageMediaType(block.mediaType)) {
        return { type: 'text', text: `[unsupported image type ${block.mediaType}]` };
      }
      return { type: 'image', source: { type: 'base64', media_type: block.mediaType, data: block.data } };
  }
}

/**
 * Convert a history to Messages API form. Guidance turns become user text,
 * consecutive same-role turns are merged, and turns left empty are dropped.
 */
export function convertTurns(turns: readonly Turn[]): MessageParam[] {
  const messages: Array<{ role: 'user' | 'assistant'; content: BlockParam[] }> = [];

  for (const turn of turns) {
    const role = turn.role === 'assistant' ? 'assistant' : 'user';
    const content = turn.content
      .map(convertBlock)
      .filter((block): block is BlockParam => block !== null)
      .map((block): BlockParam =>
        turn.role === 'guidance' && block.type === 'text'
          ? { type: 'text', text: `${GUIDANCE_PREFIX}\n${block.text}` }
          : block
      );
    if (content.length === 0) continue;

    const previous = messages[messages.length - 1];
    if (previous && previous.role === role) {
      previous.content.push(...content);
    } else {
      messages.push({ role, content });
    }
  }

  return messages;
}

export function convertTools(tools: readonly ToolDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.inputSchema, type: 'object' as const },
  }));
}
