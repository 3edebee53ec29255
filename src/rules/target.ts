/**
 * Target construction: one URL plus the rules used to extract it
 */
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { getDefaultSelectors } from './defaults.js';
import { createSelectorRule, type SelectorRuleInput } from './selector-rule.js';
import { SCRAPE_TYPES, type ScrapeType, type SelectorRule, type Target } from './types.js';

const TargetSchema = z.object({
  url: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'URL must start with http:// or https://'),
  scrapeType: z.enum(SCRAPE_TYPES).default('generic'),
  depth: z.number().int().nonnegative().default(0),
});

export interface TargetInput {
  url: string;
  scrapeType?: ScrapeType;
  /** Custom rules; when empty or omitted, the scrape type's defaults apply */
  selectors?: ReadonlyArray<SelectorRuleInput | SelectorRule>;
  depth?: number;
}

/**
 * Create an immutable target. Throws ConfigError for a non-http(s) URL,
 * an invalid selector, or a field name used twice.
 */
export function createTarget(input: TargetInput): Target {
  const parsed = TargetSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigError.fromZod('Invalid target', parsed.error);
  }

  const { url, scrapeType, depth } = parsed.data;
  const selectors =
    input.selectors && input.selectors.length > 0
      ? Object.freeze(input.selectors.map((rule) => createSelectorRule(rule)))
      : getDefaultSelectors(scrapeType);

  assertUniqueFieldNames(selectors);

  return Object.freeze({ url, scrapeType, selectors, depth });
}

/** Derive a target for a discovered URL, keeping the parent's type and rules. */
export function deriveTarget(parent: Target, url: string, depth: number = parent.depth + 1): Target {
  return createTarget({
    url,
    scrapeType: parent.scrapeType,
    selectors: parent.selectors,
    depth,
  });
}

function assertUniqueFieldNames(selectors: readonly SelectorRule[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const rule of selectors) {
    if (seen.has(rule.fieldName)) duplicates.push(rule.fieldName);
    seen.add(rule.fieldName);
  }
  if (duplicates.length > 0) {
    throw new ConfigError(
      'Invalid target',
      duplicates.map((name) => `selectors: duplicate field name "${name}"`)
    );
  }
}
