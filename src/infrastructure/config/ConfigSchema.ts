import { z } from 'zod';
import { ENGINE, RETRY, TIMEOUTS } from '../../application/config/HarvestDefaults';
import {
  ExtractionRule,
  FieldSpec,
  defineSchema,
} from '../../domain/extraction/ExtractionRule';

const SUPPORTED_FLAGS = /^[imsu]*$/;

/** Longest delay a Node timer honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const selectorSchema = z.string().min(1);
const flagsSchema = z
  .string()
  .regex(SUPPORTED_FLAGS, 'Only the i, m, s and u flags are supported')
  .optional();
const millisSchema = z.number().int().max(MAX_TIMER_MS);

/**
 * Compile pattern and flags together: `u` rejects escapes the plain syntax accepts.
 */
function checkPattern(
  value: { pattern: string; flags?: string },
  ctx: z.RefinementCtx,
  path: (string | number)[]
): void {
  if (value.flags !== undefined && !SUPPORTED_FLAGS.test(value.flags)) {
    return;
  }
  try {
    new RegExp(value.pattern, value.flags);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path,
      message: error instanceof Error ? error.message : 'Invalid regular expression',
    });
  }
}

// ── Extraction rules ────────────────────────────────────────

export const FieldSpecSchema: z.ZodType<FieldSpec> = z.object({
  name: z.string().min(1),
  rule: z.lazy(() => ExtractionRuleSchema),
  required: z.boolean().optional(),
});

const TextRuleSchema = z.object({
  kind: z.literal('text'),
  selector: selectorSchema,
});

const AttributeRuleSchema = z.object({
  kind: z.literal('attribute'),
  selector: selectorSchema,
  attribute: z.string().min(1),
  resolveUrl: z.boolean().optional(),
});

const ComputedRuleSchema = z
  .object({
    kind: z.literal('computed'),
    selector: selectorSchema,
    transform: z.discriminatedUnion('type', [
      z.object({ type: z.literal('count') }),
      z.object({ type: z.literal('number') }),
      z.object({
        type: z.literal('match'),
        pattern: z.string(),
        flags: flagsSchema,
        group: z.number().int().nonnegative().optional(),
      }),
    ]),
  })
  .superRefine((rule, ctx) => {
    if (rule.transform.type === 'match') {
      checkPattern(rule.transform, ctx, ['transform', 'pattern']);
    }
  });

const ListRuleSchema = z.object({
  kind: z.literal('list'),
  itemSelector: selectorSchema,
  fields: z.array(FieldSpecSchema).min(1),
  limit: z.number().int().positive().optional(),
  uniqueBy: z.string().min(1).optional(),
  where: z
    .array(
      z
        .object({
          field: z.string().min(1),
          pattern: z.string(),
          flags: flagsSchema,
          negate: z.boolean().optional(),
        })
        .superRefine((filter, ctx) => checkPattern(filter, ctx, ['pattern']))
    )
    .optional(),
});

export const ExtractionRuleSchema: z.ZodType<ExtractionRule> = z.union([
  TextRuleSchema,
  AttributeRuleSchema,
  ComputedRuleSchema,
  ListRuleSchema,
]);

/**
 * A schema written as a list or as a name-keyed mapping, normalized to an
 * ordered, frozen list.
 */
export const ExtractionSchemaSchema = z
  .union([
    z.array(FieldSpecSchema).min(1),
    z.record(
      z.string(),
      z.object({ rule: ExtractionRuleSchema, required: z.boolean().optional() })
    ),
  ])
  .transform((input, ctx) => {
    try {
      return defineSchema(input);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  });

// ── Steps ───────────────────────────────────────────────────

const timeoutSchema = millisSchema.positive().optional();

export const StepSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('navigate'),
    url: z.string().url(),
    fallbackUrls: z.array(z.string().url()).optional(),
    readySelector: selectorSchema.optional(),
    waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle']).optional(),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    type: z.literal('wait_for'),
    selector: selectorSchema,
    state: z.enum(['attached', 'visible']).optional(),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    type: z.literal('extract'),
    schema: ExtractionSchemaSchema,
    timeoutMs: timeoutSchema,
  }),
  z.object({
    type: z.literal('submit'),
    fields: z.array(z.object({ selector: selectorSchema, value: z.string() })),
    submitSelector: selectorSchema,
    waitForSelector: selectorSchema.optional(),
    timeoutMs: timeoutSchema,
  }),
]);

export const JobSchema = z.object({
  name: z.string().min(1),
  steps: z.array(StepSchema).min(1),
});

// ── Run configuration ───────────────────────────────────────

export const BrowserSchema = z.object({
  engine: z.enum(['firefox', 'chromium', 'webkit']).default(ENGINE.DEFAULT_ENGINE),
  headless: z.boolean().default(true),
  width: z.number().int().positive().default(ENGINE.VIEWPORT_WIDTH),
  height: z.number().int().positive().default(ENGINE.VIEWPORT_HEIGHT),
  userAgent: z.string().min(1).optional(),
  launchArgs: z.array(z.string()).default([]),
  stealth: z.boolean().default(true),
  executablePath: z.string().min(1).optional(),
  launchTimeoutMs: millisSchema.positive().default(ENGINE.LAUNCH_TIMEOUT),
});

export const TimeoutsSchema = z.object({
  stepMs: millisSchema.positive().default(TIMEOUTS.STEP_TIMEOUT),
  runMs: millisSchema.positive().default(TIMEOUTS.RUN_TIMEOUT),
});

export const RetrySchema = z.object({
  maxAttempts: z.number().int().positive().default(RETRY.MAX_ATTEMPTS),
  baseDelayMs: millisSchema.nonnegative().default(RETRY.BASE_DELAY),
  maxDelayMs: millisSchema.nonnegative().default(RETRY.MAX_DELAY),
  factor: z.number().min(1).default(RETRY.BACKOFF_FACTOR),
  jitter: z.number().min(0).max(1).default(RETRY.JITTER),
});

export const OutputSchema = z.object({
  /** File path, or '-' for standard output */
  path: z.string().min(1).default('-'),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: z.boolean().default(false),
  colors: z.boolean().default(true),
});

export const HarvestConfigSchema = z
  .object({
    browser: BrowserSchema.default({}),
    timeouts: TimeoutsSchema.default({}),
    retry: RetrySchema.default({}),
    output: OutputSchema.default({}),
    logging: LoggingSchema.default({}),
    jobs: z.array(JobSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const jobNames = new Set<string>();
    const fieldOwners = new Map<string, string>();

    config.jobs.forEach((job, jobIndex) => {
      if (jobNames.has(job.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jobs', jobIndex, 'name'],
          message: `Duplicate job name '${job.name}'`,
        });
      }
      jobNames.add(job.name);

      for (const step of job.steps) {
        // A schema that failed its own validation is reported there
        if (step.type !== 'extract' || !Array.isArray(step.schema)) continue;
        for (const field of step.schema) {
          const owner = fieldOwners.get(field.name);
          if (owner !== undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['jobs', jobIndex, 'steps'],
              message: `Field '${field.name}' is already extracted by job '${owner}'`,
            });
          }
          fieldOwners.set(field.name, job.name);
        }
      }
    });
  });

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
