/**
 * Failure kinds reported in a Result.
 */
export type FailureKind =
  | 'EngineLaunchError'
  | 'SessionNotReadyError'
  | 'NavigationTimeout'
  | 'NavigationError'
  | 'ElementNotFound'
  | 'DetachedPageError'
  | 'ExtractionError'
  | 'SinkWriteError'
  | 'ConfigurationError'
  | 'RunCancelledError'
  | 'ResultAlreadyRecordedError'
  | 'UnexpectedError';

/**
 * Base class for all domain errors.
 *
 * `transient` marks the kinds the retry policy may re-run; `attempts` is
 * stamped by the policy once it gives up.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: FailureKind;
  readonly transient: boolean = false;
  attempts = 1;

  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when the browser engine cannot be started.
 */
export class EngineLaunchError extends DomainError {
  readonly kind = 'EngineLaunchError';

  constructor(
    public readonly engine: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Failed to launch ${engine}: ${reason}`, originalError);
  }
}

/**
 * Error thrown when a page is requested or driven outside a ready session.
 */
export class SessionNotReadyError extends DomainError {
  readonly kind = 'SessionNotReadyError';

  constructor(
    public readonly state: string,
    operation: string
  ) {
    super(`Cannot ${operation}: session is ${state}`);
  }
}

export class NavigationTimeout extends DomainError {
  readonly kind = 'NavigationTimeout';
  override readonly transient = true;

  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
    originalError?: unknown
  ) {
    super(`Navigation to ${url} timed out after ${timeoutMs}ms`, originalError);
  }
}

export class NavigationError extends DomainError {
  readonly kind = 'NavigationError';
  override readonly transient = true;

  constructor(
    public readonly url: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Navigation to ${url} failed: ${reason}`, originalError);
  }
}

export class ElementNotFound extends DomainError {
  readonly kind = 'ElementNotFound';
  override readonly transient = true;

  constructor(
    public readonly selector: string,
    public readonly timeoutMs: number,
    originalError?: unknown
  ) {
    super(`Element '${selector}' not found within ${timeoutMs}ms`, originalError);
  }
}

/**
 * Error thrown when the page, its context or the browser went away mid-operation.
 */
export class DetachedPageError extends DomainError {
  readonly kind = 'DetachedPageError';
  override readonly transient = true;

  constructor(operation: string, originalError?: unknown) {
    super(`Page detached during ${operation}`, originalError);
  }
}

/**
 * Error thrown when required fields cannot be resolved.
 * Carries the fields resolved so far so the caller can decide what to keep.
 */
export class ExtractionError extends DomainError {
  readonly kind = 'ExtractionError';

  constructor(
    public readonly unresolvedFields: string[],
    public readonly partialRecord: Record<string, unknown>
  ) {
    super(`Could not resolve fields: ${unresolvedFields.join(', ')}`);
  }
}

export class SinkWriteError extends DomainError {
  readonly kind = 'SinkWriteError';

  constructor(
    public readonly target: string,
    reason: string,
    originalError?: unknown
  ) {
    super(`Failed to write result to ${target}: ${reason}`, originalError);
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends DomainError {
  readonly kind = 'ConfigurationError';

  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error thrown when the run deadline elapses or the run is cancelled.
 */
export class RunCancelledError extends DomainError {
  readonly kind = 'RunCancelledError';

  constructor(reason: string) {
    super(`Run cancelled: ${reason}`);
  }
}

export class ResultAlreadyRecordedError extends DomainError {
  readonly kind = 'ResultAlreadyRecordedError';

  constructor(operation: string) {
    super(`Cannot ${operation}: the run outcome is already settled`);
  }
}

/**
 * Wraps anything that is not a DomainError so it can be reported with a kind.
 */
export class UnexpectedError extends DomainError {
  readonly kind = 'UnexpectedError';

  constructor(message: string, originalError?: unknown) {
    super(message, originalError);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

export function toDomainError(error: unknown): DomainError {
  if (error instanceof DomainError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UnexpectedError(message, error);
}
