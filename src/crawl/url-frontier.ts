/**
 * FIFO target frontier with URL normalization and dedup
 */
import type { Target } from '../rules/types.js';

export interface FrontierOptions {
  maxPages?: number;
}

/**
 * Normalize a URL for deduplication: lowercased scheme and host, default
 * port dropped, no trailing slash (except root), query parameters sorted,
 * fragment removed.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';

    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.slice(0, -1);
    }

    parsed.searchParams.sort();
    return parsed.href;
  } catch {
    return url;
  }
}

/**
 * Every URL that has been queued (or explicitly marked) stays in the seen
 * set for the whole run, so it is never enqueued twice.
 */
export class UrlFrontier {
  private queue: Target[] = [];
  private seen = new Set<string>();
  private maxPages: number;
  private dequeued = 0;
  private duplicates = 0;

  constructor(options: FrontierOptions = {}) {
    this.maxPages = options.maxPages ?? Infinity;
  }

  /** Queue a target unless its normalized URL was already seen; every rejection counts as a duplicate. */
  add(target: Target): boolean {
    const key = normalizeUrl(target.url);
    if (this.seen.has(key)) {
      this.duplicates++;
      return false;
    }
    this.seen.add(key);
    this.queue.push(target);
    return true;
  }

  /** Record a URL as visited without queueing it (search pages, for instance). */
  markSeen(url: string): void {
    this.seen.add(normalizeUrl(url));
  }

  has(url: string): boolean {
    return this.seen.has(normalizeUrl(url));
  }

  /** Get the next target, or null if the frontier is empty or the page limit is reached. */
  next(): Target | null {
    if (this.dequeued >= this.maxPages) return null;
    const entry = this.queue.shift() ?? null;
    if (entry) this.dequeued++;
    return entry;
  }

  hasMore(): boolean {
    return this.queue.length > 0 && this.dequeued < this.maxPages;
  }

  get processedCount(): number {
    return this.dequeued;
  }

  /** Targets queued so far, including those already dequeued. */
  get queuedCount(): number {
    return this.dequeued + this.queue.length;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  get pendingCount(): number {
    return this.queue.length;
  }
}
