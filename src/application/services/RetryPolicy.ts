import { DomainError, toDomainError } from '../../domain/errors/HarvestErrors';
import { Logger, getLogger } from '../../infrastructure/logging';
import { Deadline, abortReason, rejectOnAbort, sleep } from './Deadline';

/**
 * Exponential backoff settings.
 */
export interface BackoffConfig {
  /** Delay before the second attempt in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Upper bound for a single delay (default: 10000) */
  maxDelayMs: number;
  /** Growth factor between attempts (default: 2) */
  factor: number;
  /** Fraction of each delay that is randomized, 0..1 (default: 0.25) */
  jitter: number;
}

export interface RetryConfig {
  /** Maximum attempts including the first (default: 3) */
  maxAttempts: number;
  backoff: BackoffConfig;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  backoff: {
    baseDelayMs: 500,
    maxDelayMs: 10000,
    factor: 2,
    jitter: 0.25,
  },
};

/**
 * What one attempt receives: its number, its own time budget and a signal
 * that fires when the attempt or the whole run is abandoned.
 */
export interface AttemptContext {
  attempt: number;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface RetryableOperation<T> {
  /** Label for logs */
  name: string;
  /** Per-attempt timeout before it is clamped to the run deadline */
  timeoutMs: number;
  /** Error reported when an attempt overruns its own timeout */
  onTimeout: (timeoutMs: number) => DomainError;
  run: (context: AttemptContext) => Promise<T>;
}

/**
 * Bounded retry for transient failures.
 *
 * Transient domain errors are retried with exponential backoff and jitter;
 * anything else propagates at once. The failure that escapes carries the
 * number of attempts made. No attempt starts, and no backoff sleeps, past
 * the run deadline.
 */
export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly logger: Logger;

  constructor(
    config: Partial<RetryConfig> = {},
    private readonly random: () => number = Math.random
  ) {
    this.config = {
      maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
      backoff: { ...DEFAULT_RETRY_CONFIG.backoff, ...config.backoff },
    };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
    this.logger = getLogger('Retry');
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Delay to wait after the given (1-based) failed attempt.
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, factor, jitter } = this.config.backoff;
    const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attempt - 1));
    const spread = exponential * jitter;
    return Math.round(exponential - spread + this.random() * spread);
  }

  async withRetry<T>(operation: RetryableOperation<T>, deadline: Deadline): Promise<T> {
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        deadline.throwIfExpired();
        return await this.runAttempt(operation, attempt, deadline);
      } catch (caught) {
        const error = toDomainError(caught);
        error.attempts = Math.max(1, attempt);

        if (!error.transient || attempt >= maxAttempts) {
          if (error.transient) {
            this.logger.warn(`${operation.name} failed after ${attempt} attempts`, {
              kind: error.kind,
              error: error.message,
            });
          }
          throw error;
        }

        const delay = this.delayFor(attempt);
        if (delay >= deadline.remaining()) {
          this.logger.warn(`${operation.name}: no time left to retry`, {
            attempt,
            remainingMs: deadline.remaining(),
          });
          throw error;
        }

        this.logger.debug(`${operation.name} attempt ${attempt}/${maxAttempts} failed, retrying`, {
          kind: error.kind,
          delayMs: delay,
        });
        await sleep(delay, deadline.signal);
      }
    }
  }

  /**
   * One attempt raced against its own timeout and the run deadline.
   * When the run deadline is the tighter bound, only the run signal applies.
   */
  private async runAttempt<T>(
    operation: RetryableOperation<T>,
    attempt: number,
    deadline: Deadline
  ): Promise<T> {
    const timeoutMs = deadline.bound(operation.timeoutMs);
    const clampedByRun = timeoutMs < operation.timeoutMs;

    const controller = new AbortController();
    const onRunAbort = (): void => controller.abort(abortReason(deadline.signal));
    deadline.signal.addEventListener('abort', onRunAbort, { once: true });

    const timer = clampedByRun
      ? null
      : setTimeout(() => controller.abort(operation.onTimeout(timeoutMs)), timeoutMs);

    try {
      return await Promise.race([
        operation.run({ attempt, timeoutMs, signal: controller.signal }),
        rejectOnAbort(controller.signal),
      ]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      deadline.signal.removeEventListener('abort', onRunAbort);
    }
  }
}
