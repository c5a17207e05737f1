import { isRetryableFailureKind, type FailureKind } from './pipelineErrors';

export type RetryDecision =
  | { action: 'retry'; backoffMs: number; nextRetryCount: number }
  | { action: 'terminal'; reason: 'non_retryable' | 'max_attempts_exceeded' };

export type RetryPolicyOptions = {
  /** Total attempts allowed for one stage, first attempt included. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  overloadBackoffBaseMs: number;
};

export type RetryPolicy = {
  decide(input: { kind: FailureKind; retryCount: number; maxAttempts?: number }): RetryDecision;
};

export function computeBackoffMs(retryCount: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, retryCount);
  const delay = baseMs * 2 ** exponent;
  return Math.min(maxMs, delay);
}

export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  return {
    decide({ kind, retryCount, maxAttempts }) {
      if (!isRetryableFailureKind(kind)) return { action: 'terminal', reason: 'non_retryable' };
      const limit = Math.max(1, Math.round(maxAttempts ?? options.maxAttempts));
      if (retryCount + 1 >= limit) return { action: 'terminal', reason: 'max_attempts_exceeded' };

      const baseMs = kind === 'resource-exhaustion' ? options.overloadBackoffBaseMs : options.backoffBaseMs;
      const maxMs = Math.max(options.backoffMaxMs, baseMs);
      return {
        action: 'retry',
        backoffMs: computeBackoffMs(retryCount, baseMs, maxMs),
        nextRetryCount: retryCount + 1,
      };
    },
  };
}
