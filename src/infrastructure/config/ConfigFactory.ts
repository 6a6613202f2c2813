import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { HarvestConfig, HarvestConfigSchema } from './ConfigSchema';
import { DEFAULT_JOB } from '../../application/config/HarvestDefaults';
import { RunPlan } from '../../application/services/HarvestRunner';
import { RetryConfig } from '../../application/services/RetryPolicy';
import { ConfigurationError } from '../../domain/errors/HarvestErrors';
import { defineStep } from '../../domain/steps/Step';
import { getLogger } from '../logging';

/**
 * Values given on the command line. They win over the environment and the
 * job file.
 */
export interface ConfigOverrides {
  config?: string;
  url?: string;
  output?: string;
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(file: RawSection, key: string): RawSection {
  const value = file[key];
  return isRecord(value) ? value : {};
}

/** Drop unset entries so they never shadow a lower-precedence value. */
function definedOnly(values: RawSection): RawSection {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Unrecognized values are passed through as strings so validation reports them.
 */
function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}

export class ConfigFactory {
  /**
   * Build the run configuration. Precedence: command line, then environment,
   * then the job file, then defaults. A target URL only builds the default
   * job; jobs from the file replace it.
   */
  static load(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): HarvestConfig {
    const configPath = overrides.config ?? env.HARVEST_CONFIG;
    const file = configPath ? ConfigFactory.readFile(configPath) : {};
    const targetUrl = overrides.url ?? env.TARGET_URL;

    let jobs = file.jobs;
    if (jobs !== undefined && targetUrl) {
      getLogger('Config').warn(
        `Ignoring target URL ${targetUrl}: the job file defines its own jobs`
      );
    }
    if (jobs === undefined) {
      if (!targetUrl) {
        throw new ConfigurationError(
          'No jobs to run: pass --url, set TARGET_URL, or point HARVEST_CONFIG at a job file'
        );
      }
      jobs = [ConfigFactory.defaultJob(targetUrl, parseList(env.FALLBACK_URLS))];
    }

    const rawConfig = {
      browser: {
        ...sectionOf(file, 'browser'),
        ...definedOnly({
          engine: env.ENGINE,
          headless: parseBoolean(env.HEADLESS),
          width: parseNumber(env.VIEWPORT_WIDTH),
          height: parseNumber(env.VIEWPORT_HEIGHT),
          userAgent: env.USER_AGENT || undefined,
        }),
      },
      timeouts: {
        ...sectionOf(file, 'timeouts'),
        ...definedOnly({
          stepMs: parseNumber(env.TIMEOUT_MS),
          runMs: parseNumber(env.RUN_TIMEOUT_MS),
        }),
      },
      retry: {
        ...sectionOf(file, 'retry'),
        ...definedOnly({
          maxAttempts: parseNumber(env.MAX_ATTEMPTS),
          baseDelayMs: parseNumber(env.RETRY_BASE_DELAY_MS),
        }),
      },
      output: {
        ...sectionOf(file, 'output'),
        ...definedOnly({ path: overrides.output ?? (env.OUTPUT_PATH || undefined) }),
      },
      logging: {
        ...sectionOf(file, 'logging'),
        ...definedOnly({
          level: env.LOG_LEVEL || undefined,
          json: parseBoolean(env.LOG_JSON),
        }),
      },
      jobs,
    };

    const result = HarvestConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
    }

    return result.data;
  }

  /**
   * Navigate to the target and pull its title (required) and main heading.
   */
  static defaultJob(url: string, fallbackUrls?: string[]): RawSection {
    return {
      name: DEFAULT_JOB.NAME,
      steps: [
        definedOnly({ type: 'navigate', url, fallbackUrls }),
        {
          type: 'extract',
          schema: [
            {
              name: 'title',
              rule: { kind: 'text', selector: DEFAULT_JOB.TITLE_SELECTOR },
              required: true,
            },
            {
              name: 'heading',
              rule: { kind: 'text', selector: DEFAULT_JOB.HEADING_SELECTOR },
            },
          ],
        },
      ],
    };
  }

  static toRetryConfig(config: HarvestConfig): RetryConfig {
    const { maxAttempts, ...backoff } = config.retry;
    return { maxAttempts, backoff };
  }

  static toRunPlan(config: HarvestConfig): RunPlan {
    return {
      launch: {
        engine: config.browser.engine,
        headless: config.browser.headless,
        args: config.browser.launchArgs,
        viewport: { width: config.browser.width, height: config.browser.height },
        userAgent: config.browser.userAgent,
        stealth: config.browser.stealth,
      },
      jobs: config.jobs.map(job => ({
        name: job.name,
        steps: job.steps.map(step => defineStep(step)),
      })),
      runTimeoutMs: config.timeouts.runMs,
    };
  }

  private static readFile(configPath: string): RawSection {
    const absolute = path.resolve(configPath);
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(absolute, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot read job file ${absolute}: ${reason}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Job file ${absolute} must contain a JSON object`);
    }
    return parsed;
  }
}
