/**
 * Shared types for the fetch module
 */

/** A fetched page. Created once per successful attempt and never mutated. */
export interface FetchedDocument {
  readonly url: string;
  /** URL after redirects */
  readonly finalUrl: string;
  readonly statusCode: number;
  readonly contentType: string | null;
  readonly rawContent: string;
  readonly fetchedAt: number;
}

/** Why a single attempt failed; timeouts, network errors, 5xx and 429 are retried. */
export type AttemptFailure = 'timeout' | 'network' | 'http_status';

export type FetchErrorKind = 'permanent_failure' | 'aborted';

export type FetchErrorCause =
  | AttemptFailure
  | 'invalid_url'
  | 'blocked_by_robots'
  | 'response_too_large';

export interface FetchError {
  kind: FetchErrorKind;
  /** What the last attempt ran into, when there was one */
  cause?: FetchErrorCause;
  statusCode?: number;
  message: string;
}

export type FetchOutcome =
  | { success: true; document: FetchedDocument; attempts: number }
  | { success: false; error: FetchError; attempts: number };

export type HttpClientError = 'timeout' | 'network_error' | 'aborted' | 'response_too_large';

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  body?: string;
  headers: Record<string, string>;
  finalUrl?: string;
  error?: HttpClientError;
  errorMessage?: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Transport seam used by the Fetcher. */
export type RequestFn = (url: string, options: RequestOptions) => Promise<HttpResponse>;
