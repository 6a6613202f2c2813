import { ExtractionSchema } from '../extraction/ExtractionRule';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigateStep {
  type: 'navigate';
  url: string;
  /** Tried in order when the primary URL keeps failing */
  fallbackUrls?: string[];
  /** Selector that must be present for the navigation to count */
  readySelector?: string;
  waitUntil?: WaitUntil;
  timeoutMs?: number;
}

export interface WaitForStep {
  type: 'wait_for';
  selector: string;
  state?: 'attached' | 'visible';
  timeoutMs?: number;
}

export interface ExtractStep {
  type: 'extract';
  schema: ExtractionSchema;
  timeoutMs?: number;
}

export interface FormField {
  selector: string;
  value: string;
}

export interface SubmitStep {
  type: 'submit';
  fields: FormField[];
  submitSelector: string;
  /** Selector to wait for once the form is submitted */
  waitForSelector?: string;
  timeoutMs?: number;
}

export type Step = NavigateStep | WaitForStep | ExtractStep | SubmitStep;

export type StepType = Step['type'];

/**
 * Freeze a step so retries always replay the same definition.
 */
export function defineStep<T extends Step>(step: T): Readonly<T> {
  return Object.freeze(Object.assign({}, step));
}

/**
 * Short human-readable label used in logs.
 */
export function describeStep(step: Step): string {
  switch (step.type) {
    case 'navigate':
      return `navigate ${step.url}`;
    case 'wait_for':
      return `wait_for ${step.selector}`;
    case 'extract':
      return `extract ${step.schema.map(field => field.name).join(',')}`;
    case 'submit':
      return `submit ${step.submitSelector}`;
  }
}

/**
 * A named sequence of steps driven against one page.
 */
export interface Job {
  name: string;
  steps: readonly Step[];
}
