/**
 * Types for the crawl module
 */
import type { ExtractedRecord, ExtractErrorKind } from '../extract/types.js';
import type { FetchErrorCause, FetchErrorKind, FetchOutcome } from '../fetch/types.js';
import type { SelectorRuleInput } from '../rules/selector-rule.js';
import type { FetchPolicy, ScrapeType, SelectorRule } from '../rules/types.js';

export type TargetState = 'pending' | 'fetching' | 'extracting' | 'done' | 'failed';

export type FailureKind = FetchErrorKind | ExtractErrorKind;

export interface FailureEntry {
  url: string;
  errorKind: FailureKind;
  attempts: number;
  message: string;
  statusCode?: number;
  cause?: FetchErrorCause;
}

export type CrawlStatus = 'completed' | 'cancelled' | 'stalled';

export interface CrawlStats {
  targetsQueued: number;
  targetsDone: number;
  targetsFailed: number;
  duplicatesSkipped: number;
  durationMs: number;
}

/** Records in completion order plus the failure log. Frozen when the run ends. */
export interface CrawlResult {
  records: readonly ExtractedRecord[];
  failures: readonly FailureEntry[];
  status: CrawlStatus;
  stats: CrawlStats;
}

export type CrawlEvent =
  | { type: 'state'; url: string; depth: number; from: TargetState | null; to: TargetState }
  | { type: 'record'; record: ExtractedRecord }
  | { type: 'failure'; failure: FailureEntry }
  | { type: 'search'; keyword: string; searchUrl: string; targetsAdded: number }
  | { type: 'summary'; status: CrawlStatus; stats: CrawlStats };

/** Anything that can fetch a document under a policy; the Fetcher class by default. */
export interface DocumentFetcher {
  fetch(url: string, policy: FetchPolicy, signal?: AbortSignal): Promise<FetchOutcome>;
}

export interface LinkFilterOptions {
  include?: string[];
  exclude?: string[];
}

export interface SearchOptions extends LinkFilterOptions {
  keywords: string[];
  /** Search page URL with a `{query}` placeholder, e.g. https://duckduckgo.com/html/?q={query} */
  searchUrl: string;
  /** Selector for result links (default: a[href]) */
  linkSelector?: string;
  /** Targets taken per keyword (default: 10) */
  maxResults?: number;
  scrapeType?: ScrapeType;
  selectors?: ReadonlyArray<SelectorRuleInput | SelectorRule>;
  /** Keep links pointing back to the search engine's own host (default: false) */
  allowSearchHost?: boolean;
}

export interface FollowOptions extends LinkFilterOptions {
  maxDepth: number;
  /** Selector for links to follow (default: a[href]) */
  selector?: string;
  /** Only follow links on the page's own origin (default: true) */
  sameOrigin?: boolean;
}

export interface CrawlOptions {
  /** Stops dequeuing immediately; in-flight fetches get `cancelGraceMs` to finish */
  signal?: AbortSignal;
  cancelGraceMs?: number;
  /** Called synchronously for every lifecycle event */
  onEvent?: (event: CrawlEvent) => void;
  fetcher?: DocumentFetcher;
  /** Maximum number of targets dequeued */
  maxPages?: number;
  /** Cap on values kept for each multiple field */
  maxItems?: number;
  /** Count these keywords on every page */
  keywords?: string[];
  search?: SearchOptions;
  follow?: FollowOptions;
}
