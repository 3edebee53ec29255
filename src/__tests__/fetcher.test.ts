import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { backoffDelay, Fetcher, isTransientStatus } from '../fetch/fetcher.js';
import { createFetchPolicy } from '../rules/fetch-policy.js';
import { FakeClock, makeErrorResponse, makeResponse, ScriptedTransport } from './test-helpers.js';

const PAGE = 'https://example.com/page';

function setup(options: { respectRobots?: boolean } = {}) {
  const clock = new FakeClock();
  const transport = new ScriptedTransport(clock);
  const fetcher = new Fetcher({
    request: transport.request,
    clock,
    userAgent: 'test-agent',
    timeoutMs: 5000,
    ...options,
  });
  return { clock, transport, fetcher };
}

describe('backoffDelay', () => {
  it('does not wait before the first attempt', () => {
    expect(backoffDelay(1, 100)).toBe(0);
  });

  it('doubles the delay for each retry', () => {
    expect(backoffDelay(2, 100)).toBe(100);
    expect(backoffDelay(3, 100)).toBe(200);
    expect(backoffDelay(4, 100)).toBe(400);
  });

  it('caps the wait', () => {
    expect(backoffDelay(10, 1000)).toBe(30_000);
    expect(backoffDelay(5, 1000, 2500)).toBe(2500);
  });
});

describe('isTransientStatus', () => {
  it.each([
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [403, false],
    [404, false],
  ])('status %i -> %s', (status, expected) => {
    expect(isTransientStatus(status)).toBe(expected);
  });
});

describe('Fetcher', () => {
  it('returns a frozen document on success', async () => {
    const { clock, transport, fetcher } = setup();
    transport.on(PAGE, {
      ...makeResponse('<h1>Hello</h1>'),
      finalUrl: 'https://example.com/page/final',
    });

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0 }));

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.attempts).toBe(1);
    expect(outcome.document).toEqual({
      url: PAGE,
      finalUrl: 'https://example.com/page/final',
      statusCode: 200,
      contentType: 'text/html; charset=utf-8',
      rawContent: '<h1>Hello</h1>',
      fetchedAt: clock.now(),
    });
    expect(Object.isFrozen(outcome.document)).toBe(true);
  });

  it('sends the configured user agent and timeout', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, makeResponse('<p>ok</p>'));

    await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0 }));

    expect(transport.calls[0].options.headers).toEqual({ 'User-Agent': 'test-agent' });
    expect(transport.calls[0].options.timeoutMs).toBe(5000);
  });

  it('gives up after maxRetries + 1 attempts on repeated 500s', async () => {
    const { clock, transport, fetcher } = setup();
    transport.on(PAGE, makeResponse('oops', 500));

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 100, maxRetries: 2 }));

    expect(outcome).toEqual({
      success: false,
      attempts: 3,
      error: {
        kind: 'permanent_failure',
        cause: 'http_status',
        statusCode: 500,
        message: 'Gave up after 3 attempts: HTTP 500',
      },
    });
    expect(transport.calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(transport.calls.map((call) => call.at)).toEqual([0, 100, 300]);
  });

  it('fails immediately on a 404', async () => {
    const { transport, fetcher } = setup();

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0, maxRetries: 3 }));

    expect(outcome).toEqual({
      success: false,
      attempts: 1,
      error: { kind: 'permanent_failure', cause: 'http_status', statusCode: 404, message: 'HTTP 404' },
    });
    expect(transport.calls).toHaveLength(1);
  });

  it('retries a 429 and succeeds', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, makeResponse('slow down', 429), makeResponse('<p>ok</p>'));

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 10, maxRetries: 2 }));

    expect(outcome.success).toBe(true);
    expect(outcome.attempts).toBe(2);
  });

  it('retries timeouts', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, makeErrorResponse('timeout', 'Request timeout after 5000ms'), makeResponse('<p>ok</p>'));

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0, maxRetries: 1 }));

    expect(outcome.success).toBe(true);
    expect(outcome.attempts).toBe(2);
  });

  it('reports the last network error once retries run out', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, makeErrorResponse('network_error', 'connect ECONNREFUSED'));

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0, maxRetries: 1 }));

    expect(outcome).toEqual({
      success: false,
      attempts: 2,
      error: {
        kind: 'permanent_failure',
        cause: 'network',
        message: 'Gave up after 2 attempts: connect ECONNREFUSED',
      },
    });
  });

  it('never retries when maxRetries is 0', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, makeResponse('oops', 503));

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0, maxRetries: 0 }));

    expect(outcome.attempts).toBe(1);
    expect(transport.calls).toHaveLength(1);
  });

  it('rejects oversized responses without retrying', async () => {
    const { transport, fetcher } = setup();
    transport.on(PAGE, {
      success: false,
      statusCode: 200,
      headers: {},
      error: 'response_too_large',
      errorMessage: 'Response exceeds 10485760 bytes',
    });

    const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0, maxRetries: 2 }));

    expect(outcome).toEqual({
      success: false,
      attempts: 1,
      error: {
        kind: 'permanent_failure',
        cause: 'response_too_large',
        statusCode: 200,
        message: 'Response exceeds 10485760 bytes',
      },
    });
  });

  it.each(['ftp://example.com/file', 'javascript:alert(1)', 'not a url'])(
    'fails %s without any request',
    async (url) => {
      const { transport, fetcher } = setup();

      const outcome = await fetcher.fetch(url, createFetchPolicy());

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.attempts).toBe(0);
      expect(outcome.error.kind).toBe('permanent_failure');
      expect(outcome.error.cause).toBe('invalid_url');
      expect(transport.calls).toHaveLength(0);
    }
  );

  describe('politeness', () => {
    it('spaces requests to one host by delayMs', async () => {
      const { transport, fetcher } = setup();
      const policy = createFetchPolicy({ delayMs: 500, maxConcurrency: 3 });
      for (const path of ['a', 'b', 'c']) {
        transport.on(`https://example.com/${path}`, makeResponse('<p>ok</p>'));
      }

      await Promise.all(
        ['a', 'b', 'c'].map((path) => fetcher.fetch(`https://example.com/${path}`, policy))
      );

      expect(transport.calls.map((call) => call.at)).toEqual([0, 500, 1000]);
    });

    it('does not hold back other hosts', async () => {
      const { clock, transport, fetcher } = setup();
      const policy = createFetchPolicy({ delayMs: 500 });
      transport.on('https://a.test/', makeResponse('<p>a</p>'));
      transport.on('https://b.test/', makeResponse('<p>b</p>'));

      await Promise.all([
        fetcher.fetch('https://a.test/', policy),
        fetcher.fetch('https://b.test/', policy),
      ]);

      expect(transport.calls.map((call) => call.at)).toEqual([0, 0]);
      expect(clock.sleeps).toEqual([]);
    });
  });

  describe('cancellation', () => {
    it('does not send a request once the signal has aborted', async () => {
      const { transport, fetcher } = setup();
      const controller = new AbortController();
      controller.abort();

      const outcome = await fetcher.fetch(PAGE, createFetchPolicy(), controller.signal);

      expect(outcome).toEqual({
        success: false,
        attempts: 0,
        error: { kind: 'aborted', message: 'Fetch aborted' },
      });
      expect(transport.calls).toHaveLength(0);
    });

    it('stops retrying when aborted between attempts', async () => {
      const { transport, fetcher } = setup();
      const controller = new AbortController();
      transport.on(PAGE, () => {
        controller.abort();
        return makeResponse('oops', 500);
      });

      const outcome = await fetcher.fetch(
        PAGE,
        createFetchPolicy({ delayMs: 100, maxRetries: 3 }),
        controller.signal
      );

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('aborted');
      expect(outcome.attempts).toBe(1);
      expect(transport.calls).toHaveLength(1);
    });

    it('maps an aborted transport response to aborted', async () => {
      const { transport, fetcher } = setup();
      transport.on(PAGE, makeErrorResponse('aborted'));

      const outcome = await fetcher.fetch(PAGE, createFetchPolicy({ maxRetries: 2 }));

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('aborted');
      expect(outcome.attempts).toBe(1);
    });
  });

  describe('robots.txt', () => {
    const ROBOTS = 'https://example.com/robots.txt';

    it('blocks disallowed paths and reads robots.txt once per origin', async () => {
      const { transport, fetcher } = setup({ respectRobots: true });
      transport.on(ROBOTS, makeResponse('User-agent: *\nDisallow: /private\n', 200, 'text/plain'));
      transport.on('https://example.com/public', makeResponse('<p>ok</p>'));
      const policy = createFetchPolicy({ delayMs: 0 });

      const blocked = await fetcher.fetch('https://example.com/private/page', policy);
      const allowed = await fetcher.fetch('https://example.com/public', policy);

      expect(blocked).toEqual({
        success: false,
        attempts: 0,
        error: { kind: 'permanent_failure', cause: 'blocked_by_robots', message: 'Blocked by robots.txt' },
      });
      expect(allowed.success).toBe(true);
      expect(transport.callsTo(ROBOTS)).toHaveLength(1);
      expect(transport.callsTo('https://example.com/private/page')).toHaveLength(0);
    });

    it('allows everything when robots.txt is missing', async () => {
      const { transport, fetcher } = setup({ respectRobots: true });
      transport.on('https://example.com/private', makeResponse('<p>ok</p>'));

      const outcome = await fetcher.fetch('https://example.com/private', createFetchPolicy({ delayMs: 0 }));

      expect(outcome.success).toBe(true);
      expect(transport.callsTo(ROBOTS)).toHaveLength(1);
    });

    it('counts the robots.txt probe toward host spacing', async () => {
      const { transport, fetcher } = setup({ respectRobots: true });
      transport.on('https://example.com/page', makeResponse('<p>ok</p>'));

      await fetcher.fetch('https://example.com/page', createFetchPolicy({ delayMs: 250 }));

      expect(transport.calls.map((call) => [call.url, call.at])).toEqual([
        [ROBOTS, 0],
        ['https://example.com/page', 250],
      ]);
    });

    it('loads robots.txt again after a cancelled load', async () => {
      const { transport, fetcher } = setup({ respectRobots: true });
      const controller = new AbortController();
      transport.on(ROBOTS, () => {
        controller.abort();
        return makeResponse('User-agent: *\nDisallow: /private\n', 200, 'text/plain');
      });
      const policy = createFetchPolicy({ delayMs: 0 });

      const cancelled = await fetcher.fetch('https://example.com/page', policy, controller.signal);
      const later = await fetcher.fetch('https://example.com/private/page', policy);

      expect(cancelled).toEqual({
        success: false,
        attempts: 0,
        error: { kind: 'aborted', message: 'Fetch aborted' },
      });
      expect(later.success).toBe(false);
      if (later.success) return;
      expect(later.error.cause).toBe('blocked_by_robots');
      expect(transport.callsTo(ROBOTS)).toHaveLength(2);
      expect(transport.callsTo('https://example.com/private/page')).toHaveLength(0);
    });

    it('skips robots.txt unless enabled', async () => {
      const { transport, fetcher } = setup();
      transport.on(PAGE, makeResponse('<p>ok</p>'));

      await fetcher.fetch(PAGE, createFetchPolicy({ delayMs: 0 }));

      expect(transport.callsTo(ROBOTS)).toHaveLength(0);
    });
  });
});
