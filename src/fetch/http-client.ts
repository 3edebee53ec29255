/**
 * Default HTTP transport built on undici's fetch.
 * Never throws: failures come back as `{ success: false, error }`.
 */
import { fetch, type Dispatcher, type Response } from 'undici';
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config.js';
import { logger } from '../logger.js';
import type { HttpClientError, HttpResponse, RequestOptions } from './types.js';

const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

export interface HttpRequestOptions extends RequestOptions {
  /** Alternative undici dispatcher (proxy agent, MockAgent in tests) */
  dispatcher?: Dispatcher;
}

function tooLarge(statusCode: number, headers: Record<string, string>): HttpResponse {
  return {
    success: false,
    statusCode,
    headers,
    error: 'response_too_large',
    errorMessage: `Response exceeds ${MAX_RESPONSE_SIZE} bytes`,
  };
}

/**
 * Read the body as UTF-8, counting bytes as they arrive. Returns null and
 * cancels the stream once the limit is passed.
 */
async function readBodyCapped(response: Response, limit: number): Promise<string | null> {
  if (!response.body) return '';
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  for (let chunk = await reader.read(); !chunk.done; chunk = await reader.read()) {
    const bytes: Uint8Array = chunk.value;
    size += bytes.byteLength;
    if (size > limit) {
      await reader.cancel();
      return null;
    }
    chunks.push(bytes);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * GET a URL, following redirects, with a per-request timeout.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const signal = options.signal
    ? AbortSignal.any([options.signal, timeoutSignal])
    : timeoutSignal;

  const headers: Record<string, string> = {
    'User-Agent': DEFAULT_USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Cache-Control': 'no-cache',
    ...options.headers,
  };

  logger.debug({ url, timeoutMs }, 'Making HTTP request');

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal,
      ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    });

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    // Check Content-Length before downloading the body
    const contentLength = parseInt(responseHeaders['content-length'] ?? '', 10);
    if (!isNaN(contentLength) && contentLength > MAX_RESPONSE_SIZE) {
      logger.warn({ url, contentLength, limit: MAX_RESPONSE_SIZE }, 'Content-Length exceeds size limit');
      await response.body?.cancel();
      return tooLarge(response.status, responseHeaders);
    }

    const body = await readBodyCapped(response, MAX_RESPONSE_SIZE);
    if (body === null) {
      logger.warn({ url, limit: MAX_RESPONSE_SIZE }, 'Response exceeds size limit');
      return tooLarge(response.status, responseHeaders);
    }

    logger.debug(
      { url, statusCode: response.status, bodyLength: body.length },
      'HTTP request complete'
    );

    return {
      success: response.ok,
      statusCode: response.status,
      body,
      headers: responseHeaders,
      finalUrl: response.url || url,
    };
  } catch (error) {
    let kind: HttpClientError = 'network_error';
    if (options.signal?.aborted) kind = 'aborted';
    else if (timeoutSignal.aborted) kind = 'timeout';

    logger.warn({ url, kind, error: String(error) }, 'HTTP request failed');
    return {
      success: false,
      statusCode: 0,
      headers: {},
      error: kind,
      errorMessage: kind === 'timeout' ? `Request timeout after ${timeoutMs}ms` : String(error),
    };
  }
}
