/**
 * @fileoverview Scripted reasoning service
 *
 * Each call to stream() consumes the next step of the script. A step is a
 * list of chunks to yield, an error to throw, or a generator for cases that
 * need the abort signal. An exhausted script answers with plain text.
 */

import type { ReasoningChunk, ReasoningRequest, ReasoningService } from '../llm/index.js';

export type ScriptStep =
  | ReasoningChunk[]
  | Error
  | ((signal: AbortSignal) => AsyncIterable<ReasoningChunk>);

export class ScriptedReasoningService implements ReasoningService {
  readonly model = 'scripted-model';
  readonly requests: ReasoningRequest[] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[] = []) {
    this.script = [...script];
  }

  get remaining(): number {
    return this.script.length;
  }

  push(...steps: ScriptStep[]): void {
    this.script.push(...steps);
  }

  async *stream(request: ReasoningRequest, signal: AbortSignal): AsyncIterable<ReasoningChunk> {
    this.requests.push({ ...request, turns: structuredClone(request.turns) });
    const step = this.script.shift();
    if (step === undefined) {
      yield { type: 'text', delta: 'Done.' };
      return;
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      yield* step(signal);
      return;
    }
    for (const chunk of step) {
      yield chunk;
    }
  }
}

export function say(text: string): ReasoningChunk {
  return { type: 'text', delta: text };
}

export function callTool(id: string, name: string, input: Record<string, unknown>): ReasoningChunk {
  return { type: 'tool_use', id, name, input };
}

export function usage(inputTokens: number, outputTokens: number): ReasoningChunk {
  return { type: 'usage', usage: { inputTokens, outputTokens, cacheReadTokens: 0, cacheWriteTokens: 0 } };
}

/**
 * A step that yields the given chunks and then waits until the run is
 * aborted, rejecting with the abort reason.
 */
export function hangAfter(chunks: ReasoningChunk[] = []): (signal: AbortSignal) => AsyncIterable<ReasoningChunk> {
  return async function* (signal: AbortSignal) {
    for (const chunk of chunks) {
      yield chunk;
    }
    await new Promise<never>((_resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  };
}
