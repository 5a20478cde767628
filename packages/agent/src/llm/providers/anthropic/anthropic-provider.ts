/**
 * @fileoverview Anthropic reasoning service
 *
 * Streams a Messages API response and converts provider errors into the
 * engine's error classes. The service never retries on its own; the
 * orchestrator owns the recovery policy.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  StructuralHistoryError,
  TillerError,
  TransientServiceError,
  formatError,
  parseError,
} from '../../../core/errors/index.js';
import { createLogger } from '../../../infrastructure/logging/index.js';
import { classifyServiceError } from '../../error-classifier.js';
import type { ReasoningChunk, ReasoningRequest, ReasoningService } from '../../types.js';
import { convertTools, convertTurns } from './message-converter.js';
import { createStreamState, processAnthropicStream } from './stream-handler.js';

const logger = createLogger('anthropic');

/** Output room reserved above the thinking budget */
const MIN_OUTPUT_ABOVE_THINKING = 1024;

export interface AnthropicServiceConfig {
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** Injected client, for callers that configure the SDK themselves */
  client?: Anthropic;
}

export class AnthropicReasoningService implements ReasoningService {
  readonly model: string;
  private readonly client: Anthropic;

  constructor(config: AnthropicServiceConfig) {
    this.model = config.model;
    this.client = config.client ?? new Anthropic({
      apiKey: config.apiKey ?? process.env.ANTHROPIC_API_KEY,
      baseURL: config.baseURL,
      // retries are decided by the orchestrator
      maxRetries: 0,
    });
    logger.info('Anthropic reasoning service initialized', { model: this.model });
  }

  buildParams(request: ReasoningRequest): Anthropic.Messages.MessageCreateParams {
    const budget = request.thinkingBudgetTokens ?? 0;
    const params: Anthropic.Messages.MessageCreateParams = {
      model: this.model,
      max_tokens: budget > 0
        ? Math.max(request.maxOutputTokens, budget + MIN_OUTPUT_ABOVE_THINKING)
        : request.maxOutputTokens,
      system: request.system,
      messages: convertTurns(request.turns),
    };
    if (request.tools.length > 0) {
      params.tools = convertTools(request.tools);
    }
    if (budget > 0) {
      params.thinking = { type: 'enabled', budget_tokens: budget };
    }
    return params;
  }

  async *stream(request: ReasoningRequest, signal: AbortSignal): AsyncGenerator<ReasoningChunk> {
    const params = this.buildParams(request);
    logger.debug('Starting stream', {
      model: this.model,
      maxTokens: params.max_tokens,
      messageCount: params.messages.length,
      toolCount: request.tools.length,
    });

    try {
      const stream = this.client.messages.stream(params, { signal });
      yield* processAnthropicStream(stream, createStreamState());
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw toServiceError(error);
    }
  }
}

/**
 * Map a provider error onto the engine's classes so the recovery policy can
 * tell transient, structural and fatal failures apart.
 */
export function toServiceError(error: unknown): TillerError {
  const parsed = parseError(error);
  const message = formatError(error);
  logger.warn('Anthropic API error', { category: parsed.category, details: parsed.details });

  switch (classifyServiceError(error)) {
    case 'structural':
      return new StructuralHistoryError(parsed.details ?? message, { cause: error });
    case 'transient':
      return new TransientServiceError(message, { category: parsed.category, cause: error });
    case 'fatal':
      return TillerError.from(error);
  }
}
