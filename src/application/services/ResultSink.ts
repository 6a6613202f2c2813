import { SinkTarget } from '../ports/SinkTarget';
import {
  FailureKind,
  ResultAlreadyRecordedError,
  SinkWriteError,
  toDomainError,
} from '../../domain/errors/HarvestErrors';
import { HarvestRecord, RunResult, toOutput } from '../../domain/result/RunResult';
import { Logger, getLogger } from '../../infrastructure/logging';

/**
 * Holds the single outcome of a run and writes it out once.
 *
 * Exactly one of `record` / `recordFailure` may be called, and `flush` may
 * run once, after it. `flush` is the only place a run writes outside the
 * browser engine.
 */
export class ResultSink {
  private result: RunResult | null = null;
  private flushed = false;
  private readonly logger: Logger;

  constructor(private readonly target: SinkTarget) {
    this.logger = getLogger('Sink');
  }

  get outcome(): RunResult | null {
    return this.result;
  }

  get isFlushed(): boolean {
    return this.flushed;
  }

  record(payload: HarvestRecord): void {
    this.settle({ status: 'success', record: payload }, 'record a result');
  }

  recordFailure(kind: FailureKind, detail: { message: string; attempts?: number }): void {
    this.settle(
      {
        status: 'failure',
        error: { kind, message: detail.message, attempts: detail.attempts ?? 1 },
      },
      'record a failure'
    );
  }

  /**
   * Record any thrown value as a failure, keeping its kind and attempt count.
   */
  recordError(error: unknown): void {
    const domainError = toDomainError(error);
    this.recordFailure(domainError.kind, {
      message: domainError.message,
      attempts: domainError.attempts,
    });
  }

  async flush(): Promise<RunResult> {
    if (this.flushed) {
      throw new ResultAlreadyRecordedError('flush twice');
    }
    const result = this.result;
    if (!result) {
      throw new Error('flush() called before a result was recorded');
    }
    this.flushed = true;

    const content = `${JSON.stringify(toOutput(result), null, 2)}\n`;
    try {
      await this.target.write(content);
    } catch (error) {
      if (error instanceof SinkWriteError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SinkWriteError(this.target.description, reason, error);
    }

    this.logger.info(`Result written to ${this.target.description}`, { status: result.status });
    return result;
  }

  private settle(result: RunResult, operation: string): void {
    if (this.result) {
      throw new ResultAlreadyRecordedError(operation);
    }
    this.result = result;
  }
}
