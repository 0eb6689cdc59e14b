import { z } from 'zod';
import { buildBackoffSchedule } from '../anti-blocking/retry-strategy.js';
import { DEFAULT_BROWSER_HEADERS } from '../web-engine/browser-headers.js';
import { FetcherConfigError } from '../utils/errors.js';

const DEFAULT_MIN_INTERVAL_MS = 5000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BACKOFF_BASE_MS = 5000;
const DEFAULT_TIMEOUT_MS = 30_000;

const backoffStrategySchema = z.enum(['linear', 'exponential']);

const fetcherConfigSchema = z
  .object({
    minIntervalMs: z.number().finite().nonnegative().default(DEFAULT_MIN_INTERVAL_MS),
    maxRetries: z.number().int().min(1).default(DEFAULT_MAX_RETRIES),
    backoffScheduleMs: z.array(z.number().finite().nonnegative()).optional(),
    backoff: z
      .object({
        strategy: backoffStrategySchema.default('linear'),
        baseMs: z.number().finite().nonnegative().default(DEFAULT_BACKOFF_BASE_MS),
      })
      .default({}),
    headers: z.record(z.string(), z.string()).default({}),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  })
  .transform((config) => ({
    minIntervalMs: config.minIntervalMs,
    maxRetries: config.maxRetries,
    backoffScheduleMs:
      config.backoffScheduleMs ??
      buildBackoffSchedule({
        strategy: config.backoff.strategy,
        baseMs: config.backoff.baseMs,
        steps: config.maxRetries - 1,
      }),
    headers: { ...DEFAULT_BROWSER_HEADERS, ...config.headers },
    timeoutMs: config.timeoutMs,
  }))
  .superRefine((config, ctx) => {
    const required = config.maxRetries - 1;
    if (config.backoffScheduleMs.length < required) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backoffScheduleMs'],
        message: `needs at least ${required} waits for ${config.maxRetries} attempts, got ${config.backoffScheduleMs.length}`,
      });
    }
  });

type FetcherConfigInput = z.input<typeof fetcherConfigSchema>;
type FetcherConfig = z.output<typeof fetcherConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Fill defaults and validate. Throws FetcherConfigError on bad input.
 */
export function resolveFetcherConfig(
  input: FetcherConfigInput = {},
): FetcherConfig {
  const parsed = fetcherConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new FetcherConfigError(formatIssues(parsed.error));
  }

  return parsed.data;
}

const optionalEnvString = (value: unknown) => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const envNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    const raw = optionalEnvString(value);
    return raw === undefined ? undefined : Number(raw);
  }, schema);

const envSchema = z.object({
  SCRAPER_RATE_LIMIT: envNumber(
    z.number().finite().nonnegative().default(DEFAULT_MIN_INTERVAL_MS / 1000),
  ),
  SCRAPER_MAX_RETRIES: envNumber(
    z.number().int().min(1).default(DEFAULT_MAX_RETRIES),
  ),
  SCRAPER_BACKOFF_STRATEGY: z.preprocess(
    (value) => optionalEnvString(value)?.toLowerCase(),
    backoffStrategySchema.default('linear'),
  ),
  SCRAPER_BACKOFF_BASE_SECONDS: envNumber(
    z.number().finite().nonnegative().default(DEFAULT_BACKOFF_BASE_MS / 1000),
  ),
  SCRAPER_TIMEOUT_SECONDS: envNumber(
    z.number().finite().positive().default(DEFAULT_TIMEOUT_MS / 1000),
  ),
});

/**
 * Build the fetcher configuration from environment variables so the pacing
 * can be raised on shared or cloud IP ranges without code changes.
 *
 * - `SCRAPER_RATE_LIMIT`: seconds between requests (default 5)
 * - `SCRAPER_MAX_RETRIES`: attempts per page (default 3)
 * - `SCRAPER_BACKOFF_STRATEGY`: `linear` or `exponential` (default linear)
 * - `SCRAPER_BACKOFF_BASE_SECONDS`: first backoff wait (default 5)
 * - `SCRAPER_TIMEOUT_SECONDS`: per-request timeout (default 30)
 */
export function loadFetcherConfig(
  env: NodeJS.ProcessEnv = process.env,
): FetcherConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new FetcherConfigError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  return resolveFetcherConfig({
    minIntervalMs: Math.round(values.SCRAPER_RATE_LIMIT * 1000),
    maxRetries: values.SCRAPER_MAX_RETRIES,
    backoff: {
      strategy: values.SCRAPER_BACKOFF_STRATEGY,
      baseMs: Math.round(values.SCRAPER_BACKOFF_BASE_SECONDS * 1000),
    },
    timeoutMs: Math.round(values.SCRAPER_TIMEOUT_SECONDS * 1000),
  });
}

export type { FetcherConfig, FetcherConfigInput };
