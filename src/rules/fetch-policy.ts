/**
 * Fetch policy validation
 */
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { FetchPolicy } from './types.js';

export const DEFAULT_FETCH_POLICY: FetchPolicy = Object.freeze({
  delayMs: 1000,
  maxRetries: 2,
  maxConcurrency: 4,
});

export const FetchPolicySchema = z.object({
  delayMs: z.number().int().nonnegative(),
  maxRetries: z.number().int().nonnegative(),
  maxConcurrency: z.number().int().positive(),
});

export type FetchPolicyInput = Partial<FetchPolicy>;

/**
 * Build a frozen policy, filling missing fields from `defaults`.
 */
export function createFetchPolicy(
  input: FetchPolicyInput = {},
  defaults: FetchPolicy = DEFAULT_FETCH_POLICY
): FetchPolicy {
  const merged = {
    delayMs: input.delayMs ?? defaults.delayMs,
    maxRetries: input.maxRetries ?? defaults.maxRetries,
    maxConcurrency: input.maxConcurrency ?? defaults.maxConcurrency,
  };
  return assertValidPolicy(merged);
}

/**
 * Validate a policy passed in as plain data. Throws ConfigError (for
 * example when maxConcurrency <= 0) and returns a frozen copy otherwise.
 */
export function assertValidPolicy(policy: FetchPolicy): FetchPolicy {
  const parsed = FetchPolicySchema.safeParse(policy);
  if (!parsed.success) {
    throw ConfigError.fromZod('Invalid fetch policy', parsed.error);
  }
  return Object.freeze(parsed.data);
}
