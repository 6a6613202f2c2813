import { BrowserEnginePort, LaunchOptions } from '../ports/BrowserEnginePort';
import { BrowserSessionManager, withSession } from './BrowserSessionManager';
import { Deadline } from './Deadline';
import { ResultSink } from './ResultSink';
import { StepExecutor } from './StepExecutor';
import { toDomainError } from '../../domain/errors/HarvestErrors';
import { HarvestRecord, RunResult } from '../../domain/result/RunResult';
import { Job } from '../../domain/steps/Step';
import { Logger, getLogger } from '../../infrastructure/logging';

/**
 * Everything one run needs.
 */
export interface RunPlan {
  launch: LaunchOptions;
  jobs: readonly Job[];
  /** Hard wall-clock bound for the whole run */
  runTimeoutMs: number;
}

/**
 * Orchestrates one run: start the session, drive every job on its own page,
 * record exactly one outcome, tear the session down, then flush the sink.
 */
export class HarvestRunner {
  private readonly logger: Logger;

  constructor(
    private readonly engine: BrowserEnginePort,
    private readonly executor: StepExecutor,
    private readonly sink: ResultSink
  ) {
    this.logger = getLogger('Runner');
  }

  /**
   * Resolves with the flushed result. Rejects only when the sink cannot be
   * written (SinkWriteError).
   *
   * @param signal - external cancellation (e.g. a termination signal)
   */
  async run(plan: RunPlan, signal?: AbortSignal): Promise<RunResult> {
    const deadline = Deadline.after(plan.runTimeoutMs, signal);
    const session = new BrowserSessionManager(this.engine);
    const startTime = Date.now();

    try {
      const record = await withSession(
        session,
        plan.launch,
        () => this.runJobs(session, plan.jobs, deadline),
        deadline.signal
      );
      this.sink.record(record);
      this.logger.info('Run succeeded', {
        fields: Object.keys(record).length,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      const failure = toDomainError(error);
      this.logger.error('Run failed', {
        kind: failure.kind,
        error: failure.message,
        attempts: failure.attempts,
      });
      this.sink.recordError(failure);
    } finally {
      deadline.dispose();
    }

    return this.sink.flush();
  }

  /**
   * Jobs run concurrently, one page each. The first failure cancels the rest.
   */
  private async runJobs(
    session: BrowserSessionManager,
    jobs: readonly Job[],
    deadline: Deadline
  ): Promise<HarvestRecord> {
    const records = await Promise.all(
      jobs.map(job =>
        this.runJob(session, job, deadline).catch((error: unknown) => {
          deadline.cancel(`job '${job.name}' failed`);
          throw error;
        })
      )
    );
    return records.reduce<HarvestRecord>((merged, record) => ({ ...merged, ...record }), {});
  }

  private async runJob(
    session: BrowserSessionManager,
    job: Job,
    deadline: Deadline
  ): Promise<HarvestRecord> {
    const logger = this.logger.child(job.name);
    const page = await session.openPage();
    const record: HarvestRecord = {};

    for (const [index, step] of job.steps.entries()) {
      deadline.throwIfExpired();
      logger.debug(`Step ${index + 1}/${job.steps.length}: ${step.type}`, { page: page.id });
      const extracted = await this.executor.execute(page, step, deadline);
      if (extracted) {
        Object.assign(record, extracted);
      }
    }

    return record;
  }
}
