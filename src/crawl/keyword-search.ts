/**
 * Keyword search expansion: one fetch + extract pass over a search results
 * page per keyword, producing the URLs to crawl.
 */
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { createTarget } from '../rules/target.js';
import type { FetchPolicy, SelectorRule, Target } from '../rules/types.js';
import { createUrlFilter, discoverLinks, linkRule } from './link-discovery.js';
import type { DocumentFetcher, FailureEntry, SearchOptions } from './types.js';

export const QUERY_PLACEHOLDER = '{query}';
const DEFAULT_MAX_RESULTS = 10;

export interface PreparedSearch {
  keywords: string[];
  template: string;
  /** Carries the scrape type and rules every result target inherits */
  prototype: Target;
  resultRule: SelectorRule;
  maxResults: number;
  accept: (url: string) => boolean;
}

export type SearchPageResult =
  | { success: true; keyword: string; searchUrl: string; links: string[] }
  | { success: false; keyword: string; searchUrl: string; failure: FailureEntry };

export function buildSearchUrl(template: string, keyword: string): string {
  return template.split(QUERY_PLACEHOLDER).join(encodeURIComponent(keyword.trim()));
}

/**
 * Validate search options up front. Throws ConfigError for a template
 * without a `{query}` placeholder, an invalid selector, or no keywords.
 */
export function prepareSearch(options: SearchOptions): PreparedSearch {
  const keywords = options.keywords.map((k) => k.trim()).filter(Boolean);
  if (keywords.length === 0) {
    throw new ConfigError('Invalid search options', ['keywords: at least one keyword is required']);
  }
  if (!options.searchUrl.includes(QUERY_PLACEHOLDER)) {
    throw new ConfigError('Invalid search options', [
      `searchUrl: must contain the ${QUERY_PLACEHOLDER} placeholder`,
    ]);
  }
  if (options.maxResults !== undefined && (!Number.isInteger(options.maxResults) || options.maxResults <= 0)) {
    throw new ConfigError('Invalid search options', ['maxResults: must be a positive integer']);
  }

  const prototype = createTarget({
    url: buildSearchUrl(options.searchUrl, keywords[0]),
    scrapeType: options.scrapeType,
    selectors: options.selectors,
  });
  const searchHost = new URL(prototype.url).host;

  return {
    keywords,
    template: options.searchUrl,
    prototype,
    resultRule: linkRule(options.linkSelector),
    maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
    accept: createUrlFilter({
      include: options.include,
      exclude: options.exclude,
      excludeHosts: options.allowSearchHost ? [] : [searchHost],
    }),
  };
}

/**
 * Fetch the results page for one keyword and pull out candidate links.
 */
export async function searchKeyword(
  search: PreparedSearch,
  keyword: string,
  fetcher: DocumentFetcher,
  policy: FetchPolicy,
  signal?: AbortSignal
): Promise<SearchPageResult> {
  const searchUrl = buildSearchUrl(search.template, keyword);
  const outcome = await fetcher.fetch(searchUrl, policy, signal);

  if (!outcome.success) {
    logger.warn({ keyword, searchUrl, error: outcome.error.message }, 'Search page fetch failed');
    return {
      success: false,
      keyword,
      searchUrl,
      failure: {
        url: searchUrl,
        errorKind: outcome.error.kind,
        attempts: outcome.attempts,
        message: outcome.error.message,
        ...(outcome.error.statusCode !== undefined ? { statusCode: outcome.error.statusCode } : {}),
        ...(outcome.error.cause ? { cause: outcome.error.cause } : {}),
      },
    };
  }

  const links = discoverLinks(outcome.document, search.resultRule).filter(search.accept);
  logger.debug({ keyword, searchUrl, links: links.length }, 'Search results extracted');
  return { success: true, keyword, searchUrl, links };
}
