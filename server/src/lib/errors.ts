export type PipelineErrorKind =
  | 'UnsupportedPlatform'
  | 'SourceUnavailable'
  | 'NoValidCandidate'
  | 'StandardizationFailure'
  | 'ChainValidationFailure'
  | 'ChainBudgetExceeded';

/**
 * Failure raised by the audience pipeline. `kind` drives how callers react:
 * validation kinds are rejected before any work starts, source and budget
 * kinds end up as the failure reason of a task.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

export function isPipelineError(error: unknown, kind?: PipelineErrorKind): error is PipelineError {
  if (!(error instanceof PipelineError)) return false;
  return kind === undefined || error.kind === kind;
}

/** Kinds that reject a request up front, before a task is created. */
export function isRequestError(error: unknown): error is PipelineError {
  return isPipelineError(error, 'UnsupportedPlatform') || isPipelineError(error, 'ChainValidationFailure');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
