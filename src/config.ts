/**
 * Environment-driven defaults for the fetcher and fetch policy
 */
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { createFetchPolicy, DEFAULT_FETCH_POLICY } from './rules/fetch-policy.js';
import type { FetchPolicy } from './rules/types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  WEBSIFT_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_FETCH_POLICY.delayMs),
  WEBSIFT_MAX_RETRIES: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_FETCH_POLICY.maxRetries),
  WEBSIFT_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_FETCH_POLICY.maxConcurrency),
  WEBSIFT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  WEBSIFT_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  WEBSIFT_RESPECT_ROBOTS: booleanFlag.default('true'),
});

export interface WebsiftConfig {
  policy: FetchPolicy;
  timeoutMs: number;
  userAgent: string;
  respectRobots: boolean;
}

/**
 * Read configuration from environment variables. Empty variables count as
 * unset. Throws ConfigError when a value is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WebsiftConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = key === 'WEBSIFT_RESPECT_ROBOTS' ? value.toLowerCase() : value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw ConfigError.fromZod('Invalid environment configuration', parsed.error);
  }

  const data = parsed.data;
  return {
    policy: createFetchPolicy({
      delayMs: data.WEBSIFT_DELAY_MS,
      maxRetries: data.WEBSIFT_MAX_RETRIES,
      maxConcurrency: data.WEBSIFT_CONCURRENCY,
    }),
    timeoutMs: data.WEBSIFT_TIMEOUT_MS,
    userAgent: data.WEBSIFT_USER_AGENT,
    respectRobots: data.WEBSIFT_RESPECT_ROBOTS,
  };
}
