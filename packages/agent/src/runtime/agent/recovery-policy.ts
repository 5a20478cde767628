/**
 * @fileoverview Recovery policy for reasoning-service failures
 *
 * Pure decisions over the failures seen so far for one turn. The caller
 * performs the retry, repair or abort the decision names.
 */

import { StreamFailedError, TillerError } from '../../core/errors/index.js';
import type { RetrySettings } from '../../infrastructure/settings/index.js';
import type { ServiceErrorClass } from '../../llm/index.js';

export type RecoveryPolicy = RetrySettings;

export interface FailureRecord {
  classification: ServiceErrorClass;
  /** Recurrence key; see failureSignature() */
  signature: string;
  message: string;
  error: unknown;
}

/**
 * Outcome of one attempt at a step.
 */
export type StepResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retry'; failure: FailureRecord }
  | { kind: 'fatal'; failure: FailureRecord };

export type RecoveryDecision =
  | { action: 'retry'; attempt: number; delayMs: number; repair: boolean }
  | { action: 'abort'; error: TillerError };

export function backoffDelay(attempt: number, policy: RecoveryPolicy): number {
  return Math.min(policy.backoffBaseMs * 2 ** (attempt - 1), policy.backoffMaxMs);
}

/**
 * Number of failures at the end of the list sharing the last one's signature.
 */
export function consecutiveRepeats(failures: readonly FailureRecord[]): number {
  const last = failures[failures.length - 1];
  if (!last) return 0;
  let count = 0;
  for (let i = failures.length - 1; i >= 0 && failures[i]?.signature === last.signature; i--) {
    count++;
  }
  return count;
}

export function decideRecovery(failures: readonly FailureRecord[], policy: RecoveryPolicy): RecoveryDecision {
  const last = failures[failures.length - 1];
  if (!last) {
    throw new Error('decideRecovery needs at least one failure');
  }

  if (last.classification === 'fatal') {
    return { action: 'abort', error: TillerError.from(last.error) };
  }

  const attempts = failures.length;
  const repeats = consecutiveRepeats(failures);
  if (repeats >= policy.abortAfterRepeats || attempts >= policy.maxAttempts) {
    return {
      action: 'abort',
      error: new StreamFailedError(`Reasoning service failed after ${attempts} attempts: ${last.message}`, {
        attempts,
        signature: last.signature,
        cause: last.error,
      }),
    };
  }

  return {
    action: 'retry',
    attempt: attempts,
    delayMs: backoffDelay(attempts, policy),
    repair: last.classification === 'structural' || repeats >= policy.repairAfterRepeats,
  };
}
