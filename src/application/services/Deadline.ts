import { DomainError, RunCancelledError } from '../../domain/errors/HarvestErrors';

/**
 * Turn an aborted signal's reason into a domain error.
 */
export function abortReason(signal: AbortSignal): DomainError {
  const reason: unknown = signal.reason;
  if (reason instanceof DomainError) {
    return reason;
  }
  return new RunCancelledError(reason instanceof Error ? reason.message : 'aborted');
}

/**
 * A promise that rejects once `signal` aborts and never settles otherwise.
 */
export function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener('abort', () => reject(abortReason(signal)), { once: true });
  });
}

/**
 * Suspend for `ms`, waking early with the abort reason if `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run-level wall-clock budget.
 *
 * Aborts its signal with a RunCancelledError when the budget elapses, when
 * `cancel` is called, or when the parent signal aborts. Everything that
 * suspends during a run listens to this signal.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly expiresAt: number;
  private timer: NodeJS.Timeout | null;
  private readonly detachParent: () => void;

  private constructor(
    readonly budgetMs: number,
    parent?: AbortSignal
  ) {
    this.expiresAt = Date.now() + budgetMs;
    const timer = setTimeout(() => {
      this.controller.abort(new RunCancelledError(`run deadline of ${budgetMs}ms elapsed`));
    }, budgetMs);
    timer.unref();
    this.timer = timer;

    if (parent) {
      const onParentAbort = (): void => this.controller.abort(abortReason(parent));
      if (parent.aborted) {
        onParentAbort();
      } else {
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
      this.detachParent = () => parent.removeEventListener('abort', onParentAbort);
    } else {
      this.detachParent = () => undefined;
    }
  }

  static after(budgetMs: number, parent?: AbortSignal): Deadline {
    return new Deadline(budgetMs, parent);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isExpired(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Milliseconds left before the run is cancelled (0 once aborted).
   */
  remaining(): number {
    if (this.isExpired) {
      return 0;
    }
    return Math.max(0, this.expiresAt - Date.now());
  }

  /**
   * Clamp a per-operation timeout to what is left of the run.
   */
  bound(timeoutMs: number): number {
    return Math.min(timeoutMs, this.remaining());
  }

  cancel(reason: string): void {
    if (!this.isExpired) {
      this.controller.abort(new RunCancelledError(reason));
    }
  }

  /**
   * Throw the abort reason if the run is already over.
   */
  throwIfExpired(): void {
    if (this.isExpired) {
      throw abortReason(this.controller.signal);
    }
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detachParent();
  }
}
