import { WaitUntil } from '../../domain/steps/Step';

/**
 * Something selectors can be evaluated against: the page itself or one element.
 */
export interface ElementScope {
  query(selector: string): Promise<ElementPort | null>;
  queryAll(selector: string): Promise<ElementPort[]>;
}

/**
 * Handle to one element in the page.
 */
export interface ElementPort extends ElementScope {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
}

export interface GotoOptions {
  timeoutMs: number;
  waitUntil: WaitUntil;
}

export interface WaitOptions {
  timeoutMs: number;
  state: 'attached' | 'visible';
}

/**
 * Port interface for one browser page.
 * Implementations translate engine failures into domain errors:
 * NavigationTimeout / NavigationError from goto, ElementNotFound from waits,
 * DetachedPageError when the page or browser went away.
 */
export interface PagePort extends ElementScope {
  url(): string;
  goto(url: string, options: GotoOptions): Promise<void>;
  waitForSelector(selector: string, options: WaitOptions): Promise<void>;
  fill(selector: string, value: string, options: { timeoutMs: number }): Promise<void>;
  click(selector: string, options: { timeoutMs: number }): Promise<void>;
  isClosed(): boolean;
  close(): Promise<void>;
}
