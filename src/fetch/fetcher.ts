/**
 * Polite fetcher: per-host spacing, capped exponential backoff on transient
 * failures, optional robots.txt compliance.
 */
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config.js';
import { logger } from '../logger.js';
import type { FetchPolicy } from '../rules/types.js';
import { systemClock, type Clock } from './clock.js';
import { HostThrottle } from './host-throttle.js';
import { httpRequest } from './http-client.js';
import { fetchRobotsTxt, isAllowedByRobots, type RobotsRules } from './robots-parser.js';
import type {
  AttemptFailure,
  FetchedDocument,
  FetchError,
  FetchOutcome,
  HttpResponse,
  RequestFn,
} from './types.js';

/** Upper bound for a single backoff wait */
export const MAX_BACKOFF_MS = 30_000;

export interface FetcherOptions {
  request?: RequestFn;
  clock?: Clock;
  timeoutMs?: number;
  userAgent?: string;
  /** Check /robots.txt once per origin and refuse disallowed URLs (default: false) */
  respectRobots?: boolean;
  maxBackoffMs?: number;
}

/** Wait before attempt `attempt` (1-based): 0, then delay, 2*delay, 4*delay... capped. */
export function backoffDelay(attempt: number, delayMs: number, maxBackoffMs = MAX_BACKOFF_MS): number {
  if (attempt <= 1) return 0;
  return Math.min(delayMs * 2 ** (attempt - 2), maxBackoffMs);
}

/** 5xx and 429 are worth retrying; other 4xx are not. */
export function isTransientStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

/** `interrupted` loads were cut short by an abort and are never cached. */
type RobotsLoad = { interrupted: true } | { interrupted: false; rules: RobotsRules | null };

interface AttemptError {
  cause: AttemptFailure;
  statusCode?: number;
  message: string;
}

export class Fetcher {
  private readonly request: RequestFn;
  private readonly clock: Clock;
  private readonly throttle: HostThrottle;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly respectRobots: boolean;
  private readonly maxBackoffMs: number;
  private readonly robotsCache = new Map<string, Promise<RobotsLoad>>();

  constructor(options: FetcherOptions = {}) {
    this.request = options.request ?? httpRequest;
    this.clock = options.clock ?? systemClock;
    this.throttle = new HostThrottle(this.clock);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.respectRobots = options.respectRobots ?? false;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
  }

  /**
   * Fetch a document. Makes at most `policy.maxRetries + 1` attempts and
   * never throws.
   */
  async fetch(url: string, policy: FetchPolicy, signal?: AbortSignal): Promise<FetchOutcome> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return this.fail(0, { kind: 'permanent_failure', cause: 'invalid_url', message: `Invalid URL: ${url}` });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      logger.warn({ url, scheme: parsed.protocol }, 'Blocked unsupported URL scheme');
      return this.fail(0, {
        kind: 'permanent_failure',
        cause: 'invalid_url',
        message: `Unsupported URL scheme: ${parsed.protocol}`,
      });
    }

    if (this.respectRobots && !(await this.isAllowed(parsed, policy, signal))) {
      if (signal?.aborted) return this.aborted(0);
      logger.info({ url }, 'Blocked by robots.txt');
      return this.fail(0, {
        kind: 'permanent_failure',
        cause: 'blocked_by_robots',
        message: 'Blocked by robots.txt',
      });
    }

    const maxAttempts = policy.maxRetries + 1;
    let lastError: AttemptError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const backoff = backoffDelay(attempt, policy.delayMs, this.maxBackoffMs);
      if (backoff > 0) {
        logger.info({ url, attempt, delay: backoff, cause: lastError?.cause }, 'Retrying after transient failure');
        await this.clock.sleep(backoff, signal);
      }
      if (signal?.aborted) return this.aborted(attempt - 1);

      const response = await this.throttledRequest(parsed, policy, signal);
      if (!response) return this.aborted(attempt - 1);

      if (response.error === 'aborted') return this.aborted(attempt);
      if (response.error === 'response_too_large') {
        return this.fail(attempt, {
          kind: 'permanent_failure',
          cause: 'response_too_large',
          statusCode: response.statusCode,
          message: response.errorMessage ?? 'Response too large',
        });
      }
      if (response.error === 'timeout' || response.error === 'network_error') {
        lastError = {
          cause: response.error === 'timeout' ? 'timeout' : 'network',
          message: response.errorMessage ?? response.error,
        };
        continue;
      }

      if (response.success) {
        return { success: true, document: this.toDocument(url, response), attempts: attempt };
      }

      if (isTransientStatus(response.statusCode)) {
        lastError = {
          cause: 'http_status',
          statusCode: response.statusCode,
          message: `HTTP ${response.statusCode}`,
        };
        continue;
      }

      logger.debug({ url, statusCode: response.statusCode }, 'Permanent HTTP failure');
      return this.fail(attempt, {
        kind: 'permanent_failure',
        cause: 'http_status',
        statusCode: response.statusCode,
        message: `HTTP ${response.statusCode}`,
      });
    }

    return this.fail(maxAttempts, {
      kind: 'permanent_failure',
      cause: lastError?.cause,
      ...(lastError?.statusCode !== undefined ? { statusCode: lastError.statusCode } : {}),
      message: `Gave up after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
    });
  }

  private async throttledRequest(
    url: URL,
    policy: FetchPolicy,
    signal?: AbortSignal
  ): Promise<HttpResponse | null> {
    const acquired = await this.throttle.acquire(url.host, policy.delayMs, signal);
    if (!acquired) return null;
    return this.request(url.href, {
      headers: { 'User-Agent': this.userAgent },
      timeoutMs: this.timeoutMs,
      signal,
    });
  }

  private async loadRobots(origin: string, policy: FetchPolicy, signal?: AbortSignal): Promise<RobotsLoad> {
    let interrupted = false;
    const rules = await fetchRobotsTxt(origin, async (robotsUrl) => {
      const response = await this.throttledRequest(new URL(robotsUrl), policy, signal);
      if (signal?.aborted) {
        interrupted = true;
        return null;
      }
      if (!response) return null;
      return { ok: response.success, text: response.body ?? '' };
    });
    return interrupted ? { interrupted: true } : { interrupted: false, rules };
  }

  private async isAllowed(url: URL, policy: FetchPolicy, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      let pending = this.robotsCache.get(url.origin);
      if (!pending) {
        pending = this.loadRobots(url.origin, policy, signal);
        this.robotsCache.set(url.origin, pending);
      }

      const load = await pending;
      if (load.interrupted) {
        // Cut short by the loading caller's abort; load again for this caller
        if (this.robotsCache.get(url.origin) === pending) this.robotsCache.delete(url.origin);
        if (signal?.aborted) return false;
        continue;
      }
      if (signal?.aborted) return false;
      return load.rules ? isAllowedByRobots(url.pathname + url.search, load.rules) : true;
    }
  }

  private toDocument(url: string, response: HttpResponse): FetchedDocument {
    return Object.freeze({
      url,
      finalUrl: response.finalUrl ?? url,
      statusCode: response.statusCode,
      contentType: response.headers['content-type'] ?? null,
      rawContent: response.body ?? '',
      fetchedAt: this.clock.now(),
    });
  }

  private fail(attempts: number, error: FetchError): FetchOutcome {
    return { success: false, error, attempts };
  }

  private aborted(attempts: number): FetchOutcome {
    return { success: false, error: { kind: 'aborted', message: 'Fetch aborted' }, attempts };
  }
}
