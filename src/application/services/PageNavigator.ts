import { ManagedPage } from './ManagedPage';
import { FieldExtractor, ExtractionOutcome } from './FieldExtractor';
import { LoadState } from '../../domain/browser/LoadState';
import { ExtractionSchema } from '../../domain/extraction/ExtractionRule';
import { FormField, WaitUntil } from '../../domain/steps/Step';
import { Logger, getLogger } from '../../infrastructure/logging';

export interface NavigateOptions {
  waitUntil?: WaitUntil;
  /** Selector that must be attached before the navigation counts as loaded */
  readySelector?: string;
}

export interface NavigationOutcome {
  requestedUrl: string;
  /** URL after redirects */
  url: string;
  loadState: LoadState;
  durationMs: number;
}

export interface SubmitForm {
  fields: FormField[];
  submitSelector: string;
  waitForSelector?: string;
}

/**
 * Single-attempt page operations. Retrying is the caller's concern.
 */
export class PageNavigator {
  private readonly logger: Logger;

  constructor(private readonly extractor: FieldExtractor = new FieldExtractor()) {
    this.logger = getLogger('Navigator');
  }

  /**
   * Drive the page to `url`. Rejects with NavigationTimeout or NavigationError
   * (or ElementNotFound when the ready selector never shows up).
   */
  navigate(
    page: ManagedPage,
    url: string,
    timeoutMs: number,
    options: NavigateOptions = {}
  ): Promise<NavigationOutcome> {
    return page.exclusive(`navigate to ${url}`, async driver => {
      const startTime = Date.now();
      page.markLoading();

      try {
        await driver.goto(url, {
          timeoutMs,
          waitUntil: options.waitUntil ?? 'domcontentloaded',
        });
        if (options.readySelector) {
          const remaining = Math.max(1, timeoutMs - (Date.now() - startTime));
          await driver.waitForSelector(options.readySelector, {
            timeoutMs: remaining,
            state: 'attached',
          });
        }
      } catch (error) {
        page.markFailed();
        throw error;
      }

      page.markLoaded();
      const durationMs = Date.now() - startTime;
      this.logger.info(`Loaded ${driver.url()}`, { page: page.id, durationMs });

      return {
        requestedUrl: url,
        url: driver.url(),
        loadState: page.loadState,
        durationMs,
      };
    });
  }

  /**
   * Suspend until `selector` resolves. Rejects with ElementNotFound on timeout.
   */
  waitFor(
    page: ManagedPage,
    selector: string,
    timeoutMs: number,
    state: 'attached' | 'visible' = 'attached'
  ): Promise<void> {
    return page.exclusive(`wait for ${selector}`, driver =>
      driver.waitForSelector(selector, { timeoutMs, state })
    );
  }

  extract(page: ManagedPage, schema: ExtractionSchema): Promise<ExtractionOutcome> {
    return page.exclusive('extract', driver => this.extractor.extract(driver, schema, driver.url()));
  }

  /**
   * Fill the form fields in order, click submit, then optionally wait for a
   * selector that signals the submission went through.
   */
  submit(page: ManagedPage, form: SubmitForm, timeoutMs: number): Promise<void> {
    return page.exclusive(`submit ${form.submitSelector}`, async driver => {
      for (const field of form.fields) {
        await driver.fill(field.selector, field.value, { timeoutMs });
      }
      await driver.click(form.submitSelector, { timeoutMs });
      if (form.waitForSelector) {
        await driver.waitForSelector(form.waitForSelector, { timeoutMs, state: 'attached' });
      }
      this.logger.debug('Form submitted', { page: page.id, submit: form.submitSelector });
    });
  }
}
