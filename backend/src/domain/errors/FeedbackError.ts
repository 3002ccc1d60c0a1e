export type FeedbackErrorKind =
  | 'AuthError'
  | 'NetworkError'
  | 'RevisionNotFound'
  | 'Timeout'
  | 'AnalysisFailed'
  | 'PersistenceError'
  | 'Overloaded'
  | 'Cancelled'
  | 'Interrupted';

export const FEEDBACK_ERROR_KINDS: readonly FeedbackErrorKind[] = [
  'AuthError',
  'NetworkError',
  'RevisionNotFound',
  'Timeout',
  'AnalysisFailed',
  'PersistenceError',
  'Overloaded',
  'Cancelled',
  'Interrupted',
];

export function isFeedbackErrorKind(value: string): value is FeedbackErrorKind {
  return FEEDBACK_ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Base class of every failure the pipeline records on a job.
 * `kind` is what gets persisted; `retryable` drives the retry policies.
 */
export abstract class FeedbackError extends Error {
  abstract readonly kind: FeedbackErrorKind;
  readonly retryable: boolean;

  protected constructor(message: string, retryable: boolean, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.retryable = retryable;
  }
}

/**
 * Credentials were rejected by the remote. Retrying cannot help.
 */
export class AuthError extends FeedbackError {
  readonly kind = 'AuthError';

  constructor(message: string, cause?: unknown) {
    super(message, false, cause);
    this.name = 'AuthError';
  }
}

export class NetworkError extends FeedbackError {
  readonly kind = 'NetworkError';

  constructor(message: string, cause?: unknown) {
    super(message, true, cause);
    this.name = 'NetworkError';
  }
}

/**
 * The requested revision (or the repository itself) does not exist on the remote.
 */
export class RevisionNotFoundError extends FeedbackError {
  readonly kind = 'RevisionNotFound';

  constructor(message: string, cause?: unknown) {
    super(message, false, cause);
    this.name = 'RevisionNotFoundError';
  }
}

export class TimeoutError extends FeedbackError {
  readonly kind = 'Timeout';

  constructor(message: string) {
    super(message, false);
    this.name = 'TimeoutError';
  }
}

/**
 * An analysis step crashed or produced output that could not be parsed.
 */
export class AnalysisFailedError extends FeedbackError {
  readonly kind = 'AnalysisFailed';

  constructor(message: string, cause?: unknown) {
    super(message, false, cause);
    this.name = 'AnalysisFailedError';
  }
}

export class PersistenceError extends FeedbackError {
  readonly kind = 'PersistenceError';

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.retryable ?? true, options.cause);
    this.name = 'PersistenceError';
  }
}

export class OverloadedError extends FeedbackError {
  readonly kind = 'Overloaded';
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message, false);
    this.name = 'OverloadedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class CancelledError extends FeedbackError {
  readonly kind = 'Cancelled';

  constructor(message = 'Job cancelled') {
    super(message, false);
    this.name = 'CancelledError';
  }
}

/**
 * The process stopped while an attempt was in flight.
 */
export class InterruptedError extends FeedbackError {
  readonly kind = 'Interrupted';

  constructor(message: string) {
    super(message, false);
    this.name = 'InterruptedError';
  }
}

export function isFeedbackError(error: unknown): error is FeedbackError {
  return error instanceof FeedbackError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalises anything thrown by a collaborator into the taxonomy.
 * Unknown values are wrapped by `fallback`.
 */
export function toFeedbackError(
  error: unknown,
  fallback: (message: string, cause: unknown) => FeedbackError,
): FeedbackError {
  if (isFeedbackError(error)) {
    return error;
  }
  return fallback(describeError(error), error);
}
