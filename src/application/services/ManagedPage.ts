import { PagePort } from '../ports/PagePort';
import { LoadState, canTransitionLoadState } from '../../domain/browser/LoadState';

/**
 * What a page needs from its owning session.
 */
export interface SessionGuard {
  /** Throws SessionNotReadyError unless the session is ready */
  assertReady(operation: string): void;
}

/**
 * A page owned by a BrowserSessionManager.
 *
 * Work against the page goes through `exclusive`, which checks the session
 * is ready and queues callers so only one step touches the page at a time.
 */
export class ManagedPage {
  private state: LoadState = 'idle';
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    private readonly driver: PagePort,
    private readonly session: SessionGuard
  ) {}

  get loadState(): LoadState {
    return this.state;
  }

  get url(): string {
    return this.driver.url();
  }

  get isClosed(): boolean {
    return this.driver.isClosed();
  }

  exclusive<T>(operation: string, work: (driver: PagePort) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => {
      this.session.assertReady(operation);
      return work(this.driver);
    });
    // The queue only orders callers; each caller observes its own failure through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  markLoading(): void {
    this.transition('loading');
  }

  markLoaded(): void {
    this.transition('loaded');
  }

  markFailed(): void {
    this.transition('failed');
  }

  async close(): Promise<void> {
    if (!this.driver.isClosed()) {
      await this.driver.close();
    }
  }

  private transition(next: LoadState): void {
    if (!canTransitionLoadState(this.state, next)) {
      throw new Error(`Invalid load state transition for ${this.id}: ${this.state} -> ${next}`);
    }
    this.state = next;
  }
}
