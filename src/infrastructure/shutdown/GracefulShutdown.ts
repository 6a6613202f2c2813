/**
 * GracefulShutdown
 *
 * Turns SIGINT and SIGTERM into cancellation of the running harvest:
 * - Registered handlers run once, last registered first
 * - The run abort signal fires so the session tears down before exit
 * - The process is never exited from here; the entry point sets the exit code
 */

import { RunCancelledError } from '../../domain/errors/HarvestErrors';
import { Logger, getLogger } from '../logging';

export type ShutdownHandler = (reason: string) => void | Promise<void>;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/**
 * The part of `process` this class listens on.
 */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

const SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export class GracefulShutdown {
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private readonly handlers: ShutdownHandler[] = [];
  private readonly listeners = new Map<ShutdownSignal, () => void>();
  private shuttingDown: Promise<void> | null = null;

  constructor(private readonly source: SignalSource = process) {
    this.logger = getLogger('Shutdown');
  }

  /**
   * Aborted when a termination signal arrives.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  registerHandler(handler: ShutdownHandler): void {
    this.handlers.push(handler);
  }

  register(): this {
    if (this.listeners.size > 0) {
      return this;
    }

    for (const name of SIGNALS) {
      const listener = (): void => {
        this.logger.info(`Received ${name} signal`);
        void this.shutdown(name);
      };
      this.listeners.set(name, listener);
      this.source.on(name, listener);
    }

    this.logger.debug('Signal handlers registered');
    return this;
  }

  /**
   * Remove the signal listeners. Safe to call more than once.
   */
  dispose(): void {
    for (const [name, listener] of this.listeners) {
      this.source.off(name, listener);
    }
    this.listeners.clear();
  }

  /**
   * Abort the run and run the handlers. Later calls return the first call's
   * promise.
   */
  shutdown(reason: string): Promise<void> {
    if (this.shuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return this.shuttingDown;
    }
    this.shuttingDown = this.runHandlers(reason);
    return this.shuttingDown;
  }

  private async runHandlers(reason: string): Promise<void> {
    this.logger.info(`Cancelling run (reason: ${reason})`);
    this.controller.abort(new RunCancelledError(`received ${reason}`));

    const handlersToRun = [...this.handlers].reverse();
    for (let i = 0; i < handlersToRun.length; i++) {
      try {
        await handlersToRun[i](reason);
      } catch (error) {
        this.logger.error(`Shutdown handler ${i + 1} failed`, { error });
      }
    }
  }
}
