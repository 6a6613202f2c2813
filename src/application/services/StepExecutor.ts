import { Deadline } from './Deadline';
import { ManagedPage } from './ManagedPage';
import { PageNavigator } from './PageNavigator';
import { RetryPolicy } from './RetryPolicy';
import {
  DomainError,
  ElementNotFound,
  NavigationTimeout,
  toDomainError,
} from '../../domain/errors/HarvestErrors';
import { HarvestRecord } from '../../domain/result/RunResult';
import { NavigateStep, Step, describeStep } from '../../domain/steps/Step';
import { Logger, getLogger } from '../../infrastructure/logging';

/**
 * Runs one step against a page under the retry policy.
 * Extract steps yield their record; the others yield nothing.
 */
export class StepExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly navigator: PageNavigator,
    private readonly retry: RetryPolicy,
    private readonly defaultTimeoutMs: number
  ) {
    this.logger = getLogger('Runner').child('Step');
  }

  async execute(page: ManagedPage, step: Step, deadline: Deadline): Promise<HarvestRecord | null> {
    const timeoutMs = step.timeoutMs ?? this.defaultTimeoutMs;
    this.logger.debug(describeStep(step), { page: page.id, timeoutMs });

    switch (step.type) {
      case 'navigate':
        await this.navigateWithFallback(page, step, timeoutMs, deadline);
        return null;

      case 'wait_for': {
        const { selector, state } = step;
        await this.retry.withRetry(
          {
            name: `wait_for ${selector}`,
            timeoutMs,
            onTimeout: ms => new ElementNotFound(selector, ms),
            run: ({ timeoutMs: budget }) => this.navigator.waitFor(page, selector, budget, state),
          },
          deadline
        );
        return null;
      }

      case 'extract': {
        const { schema } = step;
        const fields = schema.map(field => field.name).join(', ');
        const outcome = await this.retry.withRetry(
          {
            name: `extract ${fields}`,
            timeoutMs,
            onTimeout: ms => new ElementNotFound(fields, ms),
            run: () => this.navigator.extract(page, schema),
          },
          deadline
        );
        if (outcome.unresolved.length > 0) {
          this.logger.info('Optional fields left out', { fields: outcome.unresolved });
        }
        return outcome.record;
      }

      case 'submit': {
        const form = step;
        await this.retry.withRetry(
          {
            name: `submit ${form.submitSelector}`,
            timeoutMs,
            onTimeout: ms => new ElementNotFound(form.submitSelector, ms),
            run: ({ timeoutMs: budget }) => this.navigator.submit(page, form, budget),
          },
          deadline
        );
        return null;
      }
    }
  }

  /**
   * Try the primary URL, then each fallback in order. Each candidate gets the
   * full retry policy; the last candidate's failure is the one reported.
   */
  private async navigateWithFallback(
    page: ManagedPage,
    step: NavigateStep,
    timeoutMs: number,
    deadline: Deadline
  ): Promise<string> {
    const candidates = [step.url, ...(step.fallbackUrls ?? [])];
    let lastError: DomainError | null = null;

    for (const url of candidates) {
      try {
        const outcome = await this.retry.withRetry(
          {
            name: `navigate ${url}`,
            timeoutMs,
            onTimeout: ms => new NavigationTimeout(url, ms),
            run: ({ timeoutMs: budget }) =>
              this.navigator.navigate(page, url, budget, {
                waitUntil: step.waitUntil,
                readySelector: step.readySelector,
              }),
          },
          deadline
        );
        if (url !== step.url) {
          this.logger.info(`Connected through fallback ${url}`);
        }
        return outcome.url;
      } catch (error) {
        lastError = toDomainError(error);
        if (!lastError.transient) {
          throw lastError;
        }
        this.logger.warn(`Could not load ${url}`, { kind: lastError.kind, error: lastError.message });
      }
    }

    throw lastError ?? new NavigationTimeout(step.url, timeoutMs);
  }
}
