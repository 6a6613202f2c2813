/**
 * Harvest Constants and Configuration Defaults
 *
 * Centralizes the defaults used when the environment or job file leaves a
 * setting out.
 */

/**
 * Browser engine defaults.
 */
export const ENGINE = {
  /** Default engine */
  DEFAULT_ENGINE: 'firefox',
  /** Default viewport width */
  VIEWPORT_WIDTH: 1280,
  /** Default viewport height */
  VIEWPORT_HEIGHT: 720,
  /** Maximum time for the engine process to start in milliseconds */
  LAUNCH_TIMEOUT: 30000,
} as const;

/**
 * Timing defaults.
 */
export const TIMEOUTS = {
  /** Per-step timeout in milliseconds */
  STEP_TIMEOUT: 30000,
  /** Whole-run deadline in milliseconds */
  RUN_TIMEOUT: 120000,
} as const;

/**
 * Retry configuration.
 */
export const RETRY = {
  /** Attempts per step, including the first */
  MAX_ATTEMPTS: 3,
  /** Delay before the second attempt in milliseconds */
  BASE_DELAY: 500,
  /** Upper bound for one backoff delay in milliseconds */
  MAX_DELAY: 10000,
  /** Backoff multiplier */
  BACKOFF_FACTOR: 2,
  /** Randomized fraction of each delay */
  JITTER: 0.25,
} as const;

/**
 * Fields read when only a target URL is configured.
 */
export const DEFAULT_JOB = {
  NAME: 'default',
  TITLE_SELECTOR: 'title',
  HEADING_SELECTOR: 'h1',
} as const;
