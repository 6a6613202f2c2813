import { ElementHandle, Page, errors } from 'playwright';
import { ElementPort, GotoOptions, PagePort, WaitOptions } from '../../application/ports/PagePort';
import {
  DetachedPageError,
  DomainError,
  ElementNotFound,
  NavigationError,
  NavigationTimeout,
  UnexpectedError,
} from '../../domain/errors/HarvestErrors';

type Handle = ElementHandle<SVGElement | HTMLElement>;

const DETACHED_PATTERN =
  /Target (page, context or browser )?(has been )?closed|has been closed|detached|Execution context was destroyed/i;

/**
 * Whether a Playwright error means the page, context or browser went away.
 */
export function isDetachedError(error: unknown): boolean {
  return error instanceof Error && DETACHED_PATTERN.test(error.message);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message.split('\n')[0] : String(error);
}

/**
 * Translate a Playwright failure into a domain error. `onTimeout` builds the
 * kind that fits the operation that timed out. Anything that is neither a
 * timeout nor a closed target (a malformed selector, say) is not retried.
 */
export function translateError(
  error: unknown,
  operation: string,
  onTimeout: () => DomainError,
  otherwise: (reason: string) => DomainError = reason =>
    new UnexpectedError(`${operation} failed: ${reason}`, error)
): DomainError {
  if (error instanceof DomainError) {
    return error;
  }
  if (error instanceof errors.TimeoutError) {
    return onTimeout();
  }
  if (isDetachedError(error)) {
    return new DetachedPageError(operation, error);
  }
  return otherwise(messageOf(error));
}

/**
 * Element handle wrapper. A read that times out means the element left the page.
 */
class PlaywrightElement implements ElementPort {
  constructor(private readonly handle: Handle) {}

  async text(): Promise<string> {
    return this.guard('read element text', () => this.handle.innerText());
  }

  async attribute(name: string): Promise<string | null> {
    return this.guard(`read attribute ${name}`, () => this.handle.getAttribute(name));
  }

  async query(selector: string): Promise<ElementPort | null> {
    const found = await this.guard(`query ${selector}`, () => this.handle.$(selector));
    return found ? new PlaywrightElement(found) : null;
  }

  async queryAll(selector: string): Promise<ElementPort[]> {
    const found = await this.guard(`query ${selector}`, () => this.handle.$$(selector));
    return found.map(handle => new PlaywrightElement(handle));
  }

  private async guard<T>(operation: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw translateError(error, operation, () => new DetachedPageError(operation, error));
    }
  }
}

/**
 * Playwright implementation of PagePort.
 */
export class PlaywrightPageAdapter implements PagePort {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async goto(url: string, options: GotoOptions): Promise<void> {
    try {
      await this.page.goto(url, {
        timeout: options.timeoutMs,
        waitUntil: options.waitUntil,
      });
    } catch (error) {
      throw translateError(
        error,
        `navigate to ${url}`,
        () => new NavigationTimeout(url, options.timeoutMs, error),
        reason => new NavigationError(url, reason, error)
      );
    }
  }

  async waitForSelector(selector: string, options: WaitOptions): Promise<void> {
    try {
      await this.page.waitForSelector(selector, {
        timeout: options.timeoutMs,
        state: options.state,
      });
    } catch (error) {
      throw translateError(
        error,
        `wait for ${selector}`,
        () => new ElementNotFound(selector, options.timeoutMs, error)
      );
    }
  }

  async fill(selector: string, value: string, options: { timeoutMs: number }): Promise<void> {
    try {
      await this.page.fill(selector, value, { timeout: options.timeoutMs });
    } catch (error) {
      throw translateError(
        error,
        `fill ${selector}`,
        () => new ElementNotFound(selector, options.timeoutMs, error)
      );
    }
  }

  async click(selector: string, options: { timeoutMs: number }): Promise<void> {
    try {
      await this.page.click(selector, { timeout: options.timeoutMs });
    } catch (error) {
      throw translateError(
        error,
        `click ${selector}`,
        () => new ElementNotFound(selector, options.timeoutMs, error)
      );
    }
  }

  async query(selector: string): Promise<ElementPort | null> {
    try {
      const handle = await this.page.$(selector);
      return handle ? new PlaywrightElement(handle) : null;
    } catch (error) {
      throw translateError(error, `query ${selector}`, () => new ElementNotFound(selector, 0, error));
    }
  }

  async queryAll(selector: string): Promise<ElementPort[]> {
    try {
      const handles = await this.page.$$(selector);
      return handles.map(handle => new PlaywrightElement(handle));
    } catch (error) {
      throw translateError(error, `query ${selector}`, () => new ElementNotFound(selector, 0, error));
    }
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
