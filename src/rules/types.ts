/**
 * Shared types for targets, selector rules and fetch policies
 */

export const SCRAPE_TYPES = ['news', 'product', 'social', 'generic'] as const;

export type ScrapeType = (typeof SCRAPE_TYPES)[number];

/** How a matched element is turned into a field value. */
export type Transform =
  | { kind: 'text' }
  | { kind: 'attribute'; name: string }
  | { kind: 'number' }
  | { kind: 'url'; name: string };

export interface SelectorRule {
  readonly fieldName: string;
  /** CSS selector, validated when the rule is created */
  readonly path: string;
  readonly multiple: boolean;
  /** Defaults to text when omitted */
  readonly transform?: Transform;
  /** A required single-valued field with no match fails the whole record */
  readonly required?: boolean;
}

export interface Target {
  readonly url: string;
  readonly scrapeType: ScrapeType;
  readonly selectors: readonly SelectorRule[];
  /** 0 for seeds and search results, parent depth + 1 for followed links */
  readonly depth: number;
}

export interface FetchPolicy {
  /** Minimum spacing between requests to the same host, and the base retry backoff */
  readonly delayMs: number;
  readonly maxRetries: number;
  readonly maxConcurrency: number;
}
