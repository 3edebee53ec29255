/**
 * Public API exports for the fetch module
 */
export { Fetcher, backoffDelay, isTransientStatus, MAX_BACKOFF_MS } from './fetcher.js';
export type { FetcherOptions } from './fetcher.js';
export { httpRequest } from './http-client.js';
export { HostThrottle } from './host-throttle.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { parseRobotsTxt, isAllowedByRobots } from './robots-parser.js';
export type {
  FetchedDocument,
  FetchError,
  FetchErrorKind,
  FetchOutcome,
  HttpResponse,
  RequestFn,
  RequestOptions,
} from './types.js';
