import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { buildSearchUrl, prepareSearch, searchKeyword } from '../crawl/keyword-search.js';
import { createUrlFilter, discoverLinks, linkRule } from '../crawl/link-discovery.js';
import { ConfigError } from '../errors.js';
import { createFetchPolicy } from '../rules/fetch-policy.js';
import { FakeFetcher, makeDocument } from './test-helpers.js';

describe('discoverLinks', () => {
  it('returns unique absolute links in document order', () => {
    const doc = makeDocument(
      'https://example.com/blog/',
      '<a href="post-1">1</a><a href="/about">About</a><a href="post-1#comments">again</a><a href="tel:123">call</a>'
    );

    expect(discoverLinks(doc)).toEqual([
      'https://example.com/blog/post-1',
      'https://example.com/about',
    ]);
  });

  it('honours a custom selector', () => {
    const doc = makeDocument(
      'https://example.com/',
      '<nav><a href="/nav">nav</a></nav><main><a href="/main">main</a></main>'
    );

    expect(discoverLinks(doc, linkRule('main a'))).toEqual(['https://example.com/main']);
  });

  it('returns nothing for a document that is not markup', () => {
    expect(discoverLinks(makeDocument('https://example.com/', '', 'text/html'))).toEqual([]);
  });

  it('rejects an invalid selector', () => {
    expect(() => linkRule('!!!')).toThrow(ConfigError);
  });
});

describe('createUrlFilter', () => {
  it('accepts everything by default', () => {
    expect(createUrlFilter()('https://example.com/anything')).toBe(true);
  });

  it('matches include and exclude globs against the path', () => {
    const accept = createUrlFilter({ include: ['/blog/**'], exclude: ['/**/*.pdf'] });

    expect(accept('https://example.com/blog/post')).toBe(true);
    expect(accept('https://example.com/about')).toBe(false);
    expect(accept('https://example.com/blog/files/report.pdf')).toBe(false);
  });

  it('restricts origin and excluded hosts', () => {
    const sameOrigin = createUrlFilter({ origin: 'https://example.com' });
    const noSearch = createUrlFilter({ excludeHosts: ['search.test'] });

    expect(sameOrigin('https://example.com/x')).toBe(true);
    expect(sameOrigin('http://example.com/x')).toBe(false);
    expect(noSearch('https://search.test/?q=x')).toBe(false);
    expect(noSearch('https://example.com/')).toBe(true);
  });

  it('rejects unparsable URLs', () => {
    expect(createUrlFilter()('::nope')).toBe(false);
  });
});

describe('keyword search', () => {
  const TEMPLATE = 'https://search.test/html?q={query}';

  it('encodes the keyword into the template', () => {
    expect(buildSearchUrl(TEMPLATE, ' rust lang ')).toBe('https://search.test/html?q=rust%20lang');
    expect(buildSearchUrl(TEMPLATE, 'c++ & go')).toBe('https://search.test/html?q=c%2B%2B%20%26%20go');
  });

  it.each([
    [{ keywords: [' '], searchUrl: TEMPLATE }],
    [{ keywords: ['rust'], searchUrl: 'https://search.test/html?q=' }],
    [{ keywords: ['rust'], searchUrl: TEMPLATE, maxResults: 0 }],
    [{ keywords: ['rust'], searchUrl: TEMPLATE, linkSelector: '!!!' }],
    [{ keywords: ['rust'], searchUrl: 'ftp://search.test/{query}' }],
  ])('rejects invalid options %o', (options) => {
    expect(() => prepareSearch(options)).toThrow(ConfigError);
  });

  it('builds a prototype target from the search scrape type and selectors', () => {
    const search = prepareSearch({
      keywords: ['rust', ' '],
      searchUrl: TEMPLATE,
      scrapeType: 'news',
      selectors: [{ fieldName: 'title', path: 'h1' }],
    });

    expect(search.keywords).toEqual(['rust']);
    expect(search.maxResults).toBe(10);
    expect(search.prototype.scrapeType).toBe('news');
    expect(search.prototype.selectors.map((rule) => rule.fieldName)).toEqual(['title']);
  });

  it('returns result links without the search host', async () => {
    const search = prepareSearch({ keywords: ['rust'], searchUrl: TEMPLATE });
    const fetcher = new FakeFetcher({
      'https://search.test/html?q=rust':
        '<a href="https://a.test/1">1</a><a href="/settings">settings</a><a href="https://b.test/2">2</a>',
    });

    const result = await searchKeyword(search, 'rust', fetcher, createFetchPolicy({ delayMs: 0 }));

    expect(result).toEqual({
      success: true,
      keyword: 'rust',
      searchUrl: 'https://search.test/html?q=rust',
      links: ['https://a.test/1', 'https://b.test/2'],
    });
  });

  it('keeps the search host when allowed', async () => {
    const search = prepareSearch({ keywords: ['rust'], searchUrl: TEMPLATE, allowSearchHost: true });
    const fetcher = new FakeFetcher({
      'https://search.test/html?q=rust': '<a href="/result/1">1</a>',
    });

    const result = await searchKeyword(search, 'rust', fetcher, createFetchPolicy({ delayMs: 0 }));

    expect(result.success && result.links).toEqual(['https://search.test/result/1']);
  });

  it('turns a failed search fetch into a failure entry', async () => {
    const search = prepareSearch({ keywords: ['rust'], searchUrl: TEMPLATE });

    const result = await searchKeyword(search, 'rust', new FakeFetcher({}), createFetchPolicy());

    expect(result).toEqual({
      success: false,
      keyword: 'rust',
      searchUrl: 'https://search.test/html?q=rust',
      failure: {
        url: 'https://search.test/html?q=rust',
        errorKind: 'permanent_failure',
        attempts: 1,
        message: 'HTTP 404',
        statusCode: 404,
        cause: 'http_status',
      },
    });
  });
});
