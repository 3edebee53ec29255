/**
 * Per-host request spacing.
 *
 * Each host has its own promise chain, so callers for one host queue up
 * behind each other while other hosts proceed independently.
 */
import type { Clock } from './clock.js';

export class HostThrottle {
  private lastRequestAt = new Map<string, number>();
  private chains = new Map<string, Promise<void>>();

  constructor(private readonly clock: Clock) {}

  /**
   * Wait until at least `delayMs` has passed since the previous request to
   * `host` started, then record this request's start time.
   * Returns false (without recording) if `signal` aborts while waiting.
   */
  async acquire(host: string, delayMs: number, signal?: AbortSignal): Promise<boolean> {
    const previous = this.chains.get(host) ?? Promise.resolve();
    let release!: () => void;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = previous.then(() => turn);
    this.chains.set(host, chain);

    try {
      await previous;
      if (signal?.aborted) return false;

      const last = this.lastRequestAt.get(host);
      if (last !== undefined) {
        // Timers may fire slightly early, so re-check until the gap is met
        for (let wait = last + delayMs - this.clock.now(); wait > 0; wait = last + delayMs - this.clock.now()) {
          await this.clock.sleep(wait, signal);
          if (signal?.aborted) return false;
        }
      }

      this.lastRequestAt.set(host, this.clock.now());
      return true;
    } finally {
      release();
      if (this.chains.get(host) === chain) this.chains.delete(host);
    }
  }

  /** Start time of the most recent request to `host`, if any. */
  lastRequest(host: string): number | undefined {
    return this.lastRequestAt.get(host);
  }
}
