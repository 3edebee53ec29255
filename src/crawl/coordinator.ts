/**
 * Crawl coordinator: drives targets through fetch and extraction with a
 * bounded number of workers, dedups by normalized URL and aggregates the
 * outcome.
 *
 * Per-target lifecycle:
 *   pending -> fetching -> extracting -> done
 *   pending -> fetching -> failed          (fetch failure or cancellation)
 *   pending -> fetching -> extracting -> failed   (unparsable document)
 */
import { ConfigError, CoordinatorError } from '../errors.js';
import { extract } from '../extract/extractor.js';
import type { ExtractedRecord } from '../extract/types.js';
import { Fetcher } from '../fetch/fetcher.js';
import { logger } from '../logger.js';
import { assertValidPolicy } from '../rules/fetch-policy.js';
import { createTarget, deriveTarget } from '../rules/target.js';
import type { FetchPolicy, SelectorRule, Target } from '../rules/types.js';
import { buildSearchUrl, prepareSearch, searchKeyword, type PreparedSearch } from './keyword-search.js';
import { createUrlFilter, discoverLinks, linkRule } from './link-discovery.js';
import type {
  CrawlEvent,
  CrawlOptions,
  CrawlResult,
  CrawlStats,
  CrawlStatus,
  FailureEntry,
  FollowOptions,
  TargetState,
} from './types.js';
import { UrlFrontier } from './url-frontier.js';

const DEFAULT_CANCEL_GRACE_MS = 5000;

interface PreparedFollow {
  maxDepth: number;
  rule: SelectorRule;
  sameOrigin: boolean;
  accept: (url: string) => boolean;
}

function prepareFollow(options: FollowOptions): PreparedFollow {
  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 0) {
    throw new ConfigError('Invalid follow options', ['maxDepth: must be a non-negative integer']);
  }
  return {
    maxDepth: options.maxDepth,
    rule: linkRule(options.selector),
    sameOrigin: options.sameOrigin ?? true,
    accept: createUrlFilter({ include: options.include, exclude: options.exclude }),
  };
}

function assertPositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigError('Invalid crawl options', [`${name}: must be a positive integer`]);
  }
}

/**
 * Crawl `targets` and yield lifecycle events as they happen, ending with a
 * `summary` event.
 *
 * Configuration is validated synchronously: an invalid policy, target or
 * option throws ConfigError here, before the generator exists.
 */
export function crawl(
  targets: Iterable<Target>,
  policy: FetchPolicy,
  options: CrawlOptions = {}
): AsyncGenerator<CrawlEvent> {
  const validPolicy = assertValidPolicy(policy);
  const seeds = Array.from(targets, (target) => createTarget(target));
  assertPositiveInteger('maxPages', options.maxPages);
  assertPositiveInteger('maxItems', options.maxItems);
  const search = options.search ? prepareSearch(options.search) : null;
  const follow = options.follow ? prepareFollow(options.follow) : null;

  return runCrawl(seeds, validPolicy, search, follow, options);
}

/**
 * Crawl `targets` and resolve with the aggregated result once every target
 * is done or failed (or the run was cancelled).
 */
export function run(
  targets: Iterable<Target>,
  policy: FetchPolicy,
  options: CrawlOptions = {}
): Promise<CrawlResult> {
  return collectResult(crawl(targets, policy, options));
}

/** Fold an event stream into a frozen CrawlResult. */
export async function collectResult(events: AsyncIterable<CrawlEvent>): Promise<CrawlResult> {
  const records: ExtractedRecord[] = [];
  const failures: FailureEntry[] = [];
  let status: CrawlStatus = 'completed';
  let stats: CrawlStats = {
    targetsQueued: 0,
    targetsDone: 0,
    targetsFailed: 0,
    duplicatesSkipped: 0,
    durationMs: 0,
  };

  for await (const event of events) {
    if (event.type === 'record') records.push(event.record);
    else if (event.type === 'failure') failures.push(event.failure);
    else if (event.type === 'summary') {
      status = event.status;
      stats = event.stats;
    }
  }

  return Object.freeze({
    records: Object.freeze(records),
    failures: Object.freeze(failures),
    status,
    stats: Object.freeze(stats),
  });
}

async function* runCrawl(
  seeds: Target[],
  policy: FetchPolicy,
  search: PreparedSearch | null,
  follow: PreparedFollow | null,
  options: CrawlOptions
): AsyncGenerator<CrawlEvent> {
  const startedAt = Date.now();
  const fetcher = options.fetcher ?? new Fetcher();
  const frontier = new UrlFrontier({ maxPages: options.maxPages });
  const buffer: CrawlEvent[] = [];
  const inflight = new Map<number, Promise<number>>();
  const inflightAbort = new AbortController();
  let graceTimer: NodeJS.Timeout | undefined;
  let targetsDone = 0;
  let targetsFailed = 0;

  const isCancelled = (): boolean => options.signal?.aborted === true;

  const onCancel = (): void => {
    const graceMs = options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
    logger.info({ inFlight: inflight.size, graceMs }, 'Crawl cancelled, no new targets will start');
    if (graceMs <= 0) inflightAbort.abort();
    else graceTimer = setTimeout(() => inflightAbort.abort(), graceMs);
  };

  function emit(event: CrawlEvent): void {
    if (event.type === 'state') {
      logger.debug({ url: event.url, from: event.from, to: event.to }, 'Target state changed');
    }
    options.onEvent?.(event);
    buffer.push(event);
  }

  function* drain(): Generator<CrawlEvent> {
    for (let event = buffer.shift(); event; event = buffer.shift()) {
      yield event;
    }
  }

  function transition(target: Target, from: TargetState | null, to: TargetState): void {
    emit({ type: 'state', url: target.url, depth: target.depth, from, to });
  }

  function enqueue(target: Target): boolean {
    if (!frontier.add(target)) {
      logger.debug({ url: target.url }, 'Skipping already seen URL');
      return false;
    }
    transition(target, null, 'pending');
    return true;
  }

  function fail(target: Target, from: TargetState, failure: FailureEntry): void {
    targetsFailed++;
    transition(target, from, 'failed');
    logger.info({ url: failure.url, errorKind: failure.errorKind, attempts: failure.attempts }, failure.message);
    emit({ type: 'failure', failure });
  }

  /** `baseUrl` is the URL the page was served from, after redirects. */
  function followLinks(target: Target, baseUrl: string, links: string[]): void {
    if (!follow) return;
    const origin = new URL(baseUrl).origin;
    for (const link of links) {
      if (follow.sameOrigin && new URL(link).origin !== origin) continue;
      if (!follow.accept(link)) continue;
      enqueue(deriveTarget(target, link));
    }
  }

  async function processTarget(target: Target): Promise<void> {
    transition(target, 'pending', 'fetching');
    const outcome = await fetcher.fetch(target.url, policy, inflightAbort.signal);

    if (!outcome.success) {
      fail(target, 'fetching', {
        url: target.url,
        errorKind: outcome.error.kind,
        attempts: outcome.attempts,
        message: outcome.error.message,
        ...(outcome.error.statusCode !== undefined ? { statusCode: outcome.error.statusCode } : {}),
        ...(outcome.error.cause ? { cause: outcome.error.cause } : {}),
      });
      return;
    }

    transition(target, 'fetching', 'extracting');
    const extracted = extract(outcome.document, target.selectors, {
      scrapeType: target.scrapeType,
      maxItems: options.maxItems,
      keywords: options.keywords,
    });

    if (!extracted.success) {
      fail(target, 'extracting', {
        url: target.url,
        errorKind: extracted.error.kind,
        attempts: outcome.attempts,
        message: extracted.error.message,
      });
      return;
    }

    targetsDone++;
    emit({ type: 'record', record: extracted.record });
    transition(target, 'extracting', 'done');

    if (follow && target.depth < follow.maxDepth && !isCancelled()) {
      followLinks(target, outcome.document.finalUrl, discoverLinks(outcome.document, follow.rule));
    }
  }

  let nextId = 0;
  function startWorkers(): void {
    while (inflight.size < policy.maxConcurrency && !isCancelled() && frontier.hasMore()) {
      const target = frontier.next();
      if (!target) break;
      const id = nextId++;
      inflight.set(
        id,
        processTarget(target).then(() => id)
      );
    }
  }

  if (options.signal?.aborted) onCancel();
  else options.signal?.addEventListener('abort', onCancel, { once: true });

  try {
    for (const seed of seeds) enqueue(seed);
    yield* drain();

    if (search) {
      for (const keyword of search.keywords) {
        if (isCancelled()) break;
        frontier.markSeen(buildSearchUrl(search.template, keyword));

        const page = await searchKeyword(search, keyword, fetcher, policy, inflightAbort.signal);
        let added = 0;
        if (page.success) {
          for (const link of page.links) {
            if (added >= search.maxResults) break;
            if (enqueue(deriveTarget(search.prototype, link, 0))) added++;
          }
        } else {
          emit({ type: 'failure', failure: page.failure });
        }

        logger.info({ keyword, searchUrl: page.searchUrl, added }, 'Expanded keyword search');
        emit({ type: 'search', keyword, searchUrl: page.searchUrl, targetsAdded: added });
        yield* drain();
      }
    }

    // Sliding window: each completed target immediately frees a slot
    startWorkers();
    yield* drain();

    while (inflight.size > 0) {
      const settledId = await Promise.race(inflight.values());
      inflight.delete(settledId);
      yield* drain();

      startWorkers();
      yield* drain();
    }

    let status: CrawlStatus = isCancelled() ? 'cancelled' : 'completed';
    if (status === 'completed' && frontier.hasMore()) {
      const error = new CoordinatorError(frontier.pendingCount);
      logger.error({ err: error, pending: error.pending }, error.message);
      status = 'stalled';
    }

    const stats: CrawlStats = {
      targetsQueued: frontier.queuedCount,
      targetsDone,
      targetsFailed,
      duplicatesSkipped: frontier.duplicateCount,
      durationMs: Date.now() - startedAt,
    };
    logger.info({ status, ...stats }, 'Crawl finished');
    emit({ type: 'summary', status, stats });
    yield* drain();
  } finally {
    clearTimeout(graceTimer);
    options.signal?.removeEventListener('abort', onCancel);
    // Consumer stopped early: don't leave fetches running
    if (inflight.size > 0) inflightAbort.abort();
  }
}
