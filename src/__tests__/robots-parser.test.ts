import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { fetchRobotsTxt, isAllowedByRobots, parseRobotsTxt } from '../fetch/robots-parser.js';

describe('parseRobotsTxt', () => {
  it('keeps only the wildcard group', () => {
    const rules = parseRobotsTxt(
      [
        'User-agent: Googlebot',
        'Disallow: /google-only',
        '',
        'User-agent: *',
        'Disallow: /private # members area',
        'Allow: /private/open',
        '',
        'User-agent: Bingbot',
        'Disallow: /bing-only',
      ].join('\n')
    );

    expect(rules).toEqual({ allowPaths: ['/private/open'], disallowPaths: ['/private'] });
  });

  it('treats consecutive user-agent lines as one group', () => {
    const rules = parseRobotsTxt('User-agent: Googlebot\nUser-agent: *\nDisallow: /shared\n');

    expect(rules.disallowPaths).toEqual(['/shared']);
  });

  it('ignores empty Disallow lines', () => {
    expect(parseRobotsTxt('User-agent: *\nDisallow:\n').disallowPaths).toEqual([]);
  });
});

describe('isAllowedByRobots', () => {
  const rules = { allowPaths: ['/private/open'], disallowPaths: ['/private', '/tmp'] };

  it.each([
    ['/', true],
    ['/private', false],
    ['/private/secret', false],
    ['/private/open/page', true],
    ['/tmp?x=1', false],
    ['/public', true],
  ])('%s -> %s', (path, expected) => {
    expect(isAllowedByRobots(path, rules)).toBe(expected);
  });

  it('lets Allow win a tie', () => {
    expect(isAllowedByRobots('/a', { allowPaths: ['/a'], disallowPaths: ['/a'] })).toBe(true);
  });
});

describe('fetchRobotsTxt', () => {
  it('requests /robots.txt on the origin', async () => {
    const fetchFn = vi.fn(async () => ({ ok: true, text: 'User-agent: *\nDisallow: /x' }));

    const rules = await fetchRobotsTxt('https://example.com', fetchFn);

    expect(fetchFn).toHaveBeenCalledWith('https://example.com/robots.txt');
    expect(rules).toEqual({ allowPaths: [], disallowPaths: ['/x'] });
  });

  it('returns null for a missing or failing robots.txt', async () => {
    expect(await fetchRobotsTxt('https://example.com', async () => ({ ok: false, text: '' }))).toBeNull();
    expect(await fetchRobotsTxt('https://example.com', async () => null)).toBeNull();
    expect(
      await fetchRobotsTxt('https://example.com', async () => {
        throw new Error('boom');
      })
    ).toBeNull();
  });
});
