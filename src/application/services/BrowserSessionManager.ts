import { randomUUID } from 'crypto';
import { BrowserEnginePort, EngineConnection, LaunchOptions } from '../ports/BrowserEnginePort';
import { EngineLaunchError, SessionNotReadyError } from '../../domain/errors/HarvestErrors';
import { SessionLifecycle, SessionState } from '../../domain/session/SessionLifecycle';
import { Logger, getLogger } from '../../infrastructure/logging';
import { abortReason, rejectOnAbort } from './Deadline';
import { ManagedPage, SessionGuard } from './ManagedPage';

/**
 * Owns one browser-engine connection and every page opened in it.
 *
 * The manager is an explicit handle: create one per run, pass it to whatever
 * needs pages, and close it on the way out (see `withSession`).
 */
export class BrowserSessionManager implements SessionGuard {
  readonly id: string;
  private readonly lifecycle = new SessionLifecycle();
  private readonly logger: Logger;
  private readonly pages = new Map<string, ManagedPage>();
  private connection: EngineConnection | null = null;
  private starting: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private pageCounter = 0;

  constructor(private readonly engine: BrowserEnginePort) {
    this.id = randomUUID();
    this.logger = getLogger('Session').withContext({ session: this.id.slice(0, 8) });
  }

  get state(): SessionState {
    return this.lifecycle.state;
  }

  get isReady(): boolean {
    return this.lifecycle.isReady;
  }

  get openPages(): number {
    return this.pages.size;
  }

  /**
   * Launch the engine. Rejects with EngineLaunchError when it cannot start,
   * or with the abort reason when `signal` fires first.
   */
  start(options: LaunchOptions, signal?: AbortSignal): Promise<void> {
    if (this.lifecycle.state !== 'idle') {
      return Promise.reject(new SessionNotReadyError(this.lifecycle.state, 'start'));
    }
    this.lifecycle.transitionTo('starting');
    this.starting = this.launch(options, signal);
    return this.starting;
  }

  private async launch(options: LaunchOptions, signal?: AbortSignal): Promise<void> {
    this.logger.info(`Launching ${options.engine}`, { headless: options.headless });
    const launching = this.engine.launch(options);

    let connection: EngineConnection;
    try {
      connection = signal ? await Promise.race([launching, rejectOnAbort(signal)]) : await launching;
    } catch (error) {
      this.lifecycle.transitionTo('closed');
      if (signal?.aborted) {
        // The launch may still complete; its process must not outlive the run.
        void launching.then(
          late => this.reap(late),
          (lateError: unknown) =>
            this.logger.debug('Launch failed after cancellation', { error: lateError })
        );
        throw abortReason(signal);
      }
      if (error instanceof EngineLaunchError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new EngineLaunchError(options.engine, reason, error);
    }

    this.connection = connection;
    this.lifecycle.transitionTo('ready');
    this.logger.info('Session ready');
  }

  assertReady(operation: string): void {
    if (!this.lifecycle.isReady) {
      throw new SessionNotReadyError(this.lifecycle.state, operation);
    }
  }

  async openPage(): Promise<ManagedPage> {
    this.assertReady('open a page');
    const connection = this.requireConnection();

    const driver = await connection.newPage();
    if (!this.lifecycle.isReady) {
      await driver.close();
      throw new SessionNotReadyError(this.lifecycle.state, 'open a page');
    }

    this.pageCounter++;
    const page = new ManagedPage(`page-${this.pageCounter}`, driver, this);
    this.pages.set(page.id, page);
    this.logger.debug('Opened page', { page: page.id });
    return page;
  }

  /**
   * Release every page and the engine. Safe to call any number of times and
   * from racing callers; all of them share one teardown.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    if (this.lifecycle.state === 'idle') {
      this.lifecycle.transitionTo('closed');
      return;
    }

    if (this.starting) {
      // A failed start already reported its error to the caller of start().
      await this.starting.then(
        () => undefined,
        () => undefined
      );
    }
    if (this.lifecycle.isClosed) {
      return;
    }

    this.lifecycle.transitionTo('closing');
    this.logger.info('Closing session', { pages: this.pages.size });

    for (const page of this.pages.values()) {
      try {
        await page.close();
      } catch (error) {
        this.logger.warn(`Failed to close ${page.id}`, { error });
      }
    }
    this.pages.clear();

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.error('Failed to close engine connection', { error });
      }
    }

    this.lifecycle.transitionTo('closed');
    this.logger.info('Session closed');
  }

  private async reap(connection: EngineConnection): Promise<void> {
    try {
      await connection.close();
      this.logger.debug('Closed engine that finished launching after cancellation');
    } catch (error) {
      this.logger.warn('Failed to close late engine connection', { error });
    }
  }

  private requireConnection(): EngineConnection {
    if (!this.connection) {
      throw new SessionNotReadyError(this.lifecycle.state, 'use the engine');
    }
    return this.connection;
  }
}

/**
 * Scoped acquisition: start the session, run `work`, and close the session
 * on every exit path.
 */
export async function withSession<T>(
  session: BrowserSessionManager,
  options: LaunchOptions,
  work: (session: BrowserSessionManager) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  try {
    await session.start(options, signal);
    return await work(session);
  } finally {
    await session.close();
  }
}
