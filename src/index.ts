/**
 * websift - selector-driven scraping with polite fetching, keyword search
 * expansion and a bounded crawl coordinator.
 *
 * @module websift
 */
export {
  crawl,
  run,
  collectResult,
  UrlFrontier,
  normalizeUrl,
  discoverLinks,
  createUrlFilter,
  linkRule,
  buildSearchUrl,
} from './crawl/index.js';
export { extract, detectNonMarkup } from './extract/index.js';
export { Fetcher, backoffDelay, isTransientStatus, httpRequest, systemClock } from './fetch/index.js';
export { toCsv, toJson, toJsonLines, serializeRecords } from './export/index.js';
export { createSelectorRule, parseRuleShorthand, isValidSelector } from './rules/selector-rule.js';
export { createTarget, deriveTarget } from './rules/target.js';
export { createFetchPolicy, assertValidPolicy, DEFAULT_FETCH_POLICY } from './rules/fetch-policy.js';
export { getDefaultSelectors } from './rules/defaults.js';
export { SCRAPE_TYPES } from './rules/types.js';
export { loadConfig } from './config.js';
export { ConfigError, CoordinatorError, isConfigError } from './errors.js';
export type { SelectorRuleInput } from './rules/selector-rule.js';
export type { TargetInput } from './rules/target.js';
export type { FetchPolicy, ScrapeType, SelectorRule, Target, Transform } from './rules/types.js';
export type { WebsiftConfig } from './config.js';
export type {
  CrawlEvent,
  CrawlOptions,
  CrawlResult,
  CrawlStats,
  CrawlStatus,
  DocumentFetcher,
  FailureEntry,
  FailureKind,
  FollowOptions,
  SearchOptions,
  TargetState,
} from './crawl/index.js';
export type { ExtractedRecord, ExtractError, ExtractOptions, ExtractOutcome, FieldValue } from './extract/index.js';
export type {
  Clock,
  FetcherOptions,
  FetchedDocument,
  FetchError,
  FetchOutcome,
  HttpResponse,
  RequestFn,
} from './fetch/index.js';
export type { SerializedRecord } from './export/index.js';
