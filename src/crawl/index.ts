/**
 * Crawl module barrel exports
 */
export { crawl, run, collectResult } from './coordinator.js';
export { UrlFrontier, normalizeUrl } from './url-frontier.js';
export { discoverLinks, createUrlFilter, linkRule, DEFAULT_LINK_SELECTOR } from './link-discovery.js';
export { buildSearchUrl, QUERY_PLACEHOLDER } from './keyword-search.js';
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
} from './types.js';
