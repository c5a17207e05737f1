export type FailureKind =
  | 'transient-unavailable'
  | 'timeout'
  | 'invalid-input'
  | 'resource-exhaustion'
  | 'internal-inconsistency';

export class PipelineError extends Error {
  readonly kind: FailureKind;
  readonly context?: Record<string, unknown>;

  constructor(kind: FailureKind, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.context = context;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Normalizes anything thrown by a stage into a classified failure. Unclassified
 * errors are treated as the collaborator being unavailable.
 */
export function toPipelineError(
  error: unknown,
  fallbackMessage: string,
  context?: Record<string, unknown>,
): PipelineError {
  if (isPipelineError(error)) return error;
  if (isAbortError(error)) {
    return new PipelineError('timeout', error instanceof Error ? error.message : fallbackMessage, context);
  }
  const message = error instanceof Error ? error.message : fallbackMessage;
  return new PipelineError('transient-unavailable', message, context);
}

const RETRYABLE_KINDS = new Set<FailureKind>(['transient-unavailable', 'timeout', 'resource-exhaustion']);

export function isRetryableFailureKind(kind: FailureKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export function invalidInput(message: string, context?: Record<string, unknown>): never {
  throw new PipelineError('invalid-input', message, context);
}

export function internalInconsistency(message: string, context?: Record<string, unknown>): never {
  throw new PipelineError('internal-inconsistency', message, context);
}
