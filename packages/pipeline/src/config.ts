import { z } from 'zod';
import { PipelineConfigError } from './errors';
import { parseProxyString } from './proxy-pool';

const millis = z.number().int().nonnegative();
const count = z.number().int().min(1);

export const pipelineConfigSchema = z
  .object({
    // Rate governor
    minDelayMs: millis.default(1000),
    maxDelayMs: millis.default(3000),

    // Retries
    maxAttempts: count.default(3),
    retryBaseDelayMs: millis.default(1000),
    retryMaxDelayMs: millis.default(60_000),
    hardFailureThreshold: count.default(3),

    // Pagination caps
    maxPages: count.default(10),
    maxRecords: count.optional(),
    maxConsecutivePageFailures: count.default(3),

    // Proxies
    proxyList: z.array(z.string()).default([]),
    cooldownBaseMs: millis.default(30_000),
    cooldownCapMs: millis.default(600_000),

    // Transport
    requestTimeoutMs: z.number().int().positive().default(30_000),
    rotateUserAgent: z.boolean().default(true),

    // Targets crawled at once
    concurrency: count.default(1),
  })
  .strict()
  .superRefine((config, ctx) => {
    const ordered = [
      ['minDelayMs', 'maxDelayMs'],
      ['cooldownBaseMs', 'cooldownCapMs'],
      ['retryBaseDelayMs', 'retryMaxDelayMs'],
    ] as const;
    for (const [low, high] of ordered) {
      if (config[low] > config[high]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [low], message: `must not exceed ${high}` });
      }
    }

    config.proxyList.forEach((entry, index) => {
      if (parseProxyString(entry) === null) {
        // Entries carry credentials; report the position only
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['proxyList', index], message: 'unrecognized proxy format' });
      }
    });
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Apply defaults and validate. Throws PipelineConfigError listing every issue.
 */
export function validatePipelineConfig(input: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input ?? {});

  if (!result.success) {
    throw new PipelineConfigError(formatIssues(result.error));
  }

  return result.data;
}

const envInteger = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)
  .optional();

const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')
  .optional();

export const pipelineEnvSchema = z.object({
  TRAWL_MIN_DELAY_MS: envInteger,
  TRAWL_MAX_DELAY_MS: envInteger,
  TRAWL_MAX_ATTEMPTS: envInteger,
  TRAWL_MAX_PAGES: envInteger,
  TRAWL_MAX_RECORDS: envInteger,
  TRAWL_PROXY_LIST: z.string().optional(),
  TRAWL_REQUEST_TIMEOUT_MS: envInteger,
  TRAWL_COOLDOWN_BASE_MS: envInteger,
  TRAWL_COOLDOWN_CAP_MS: envInteger,
  TRAWL_RETRY_BASE_DELAY_MS: envInteger,
  TRAWL_RETRY_MAX_DELAY_MS: envInteger,
  TRAWL_HARD_FAILURE_THRESHOLD: envInteger,
  TRAWL_CONCURRENCY: envInteger,
  TRAWL_MAX_CONSECUTIVE_PAGE_FAILURES: envInteger,
  TRAWL_ROTATE_USER_AGENT: envBoolean,
});

export function splitProxyList(value: string): string[] {
  return value
    .split(/[\n,]/)
    .map(entry => entry.trim())
    .filter(entry => entry !== '');
}

/**
 * Build a config from TRAWL_* environment variables (string values).
 * Unset variables take the defaults.
 */
export function pipelineConfigFromEnv(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const result = pipelineEnvSchema.safeParse(env);

  if (!result.success) {
    throw new PipelineConfigError(formatIssues(result.error));
  }

  const vars = result.data;
  return validatePipelineConfig({
    minDelayMs: vars.TRAWL_MIN_DELAY_MS,
    maxDelayMs: vars.TRAWL_MAX_DELAY_MS,
    maxAttempts: vars.TRAWL_MAX_ATTEMPTS,
    maxPages: vars.TRAWL_MAX_PAGES,
    maxRecords: vars.TRAWL_MAX_RECORDS,
    proxyList: vars.TRAWL_PROXY_LIST === undefined ? undefined : splitProxyList(vars.TRAWL_PROXY_LIST),
    requestTimeoutMs: vars.TRAWL_REQUEST_TIMEOUT_MS,
    cooldownBaseMs: vars.TRAWL_COOLDOWN_BASE_MS,
    cooldownCapMs: vars.TRAWL_COOLDOWN_CAP_MS,
    retryBaseDelayMs: vars.TRAWL_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: vars.TRAWL_RETRY_MAX_DELAY_MS,
    hardFailureThreshold: vars.TRAWL_HARD_FAILURE_THRESHOLD,
    concurrency: vars.TRAWL_CONCURRENCY,
    maxConsecutivePageFailures: vars.TRAWL_MAX_CONSECUTIVE_PAGE_FAILURES,
    rotateUserAgent: vars.TRAWL_ROTATE_USER_AGENT,
  });
}
