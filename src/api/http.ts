/**
 * Shared JSON-over-HTTP helper for market-data providers and broker clients.
 *
 * Every call is bounded by a timeout and tied to the caller's AbortSignal.
 * Responses are parsed through a zod schema. Retries with exponential backoff
 * are opt-in (`maxAttempts`), since order submission must never be replayed
 * and the provider chain moves on instead of retrying.
 */

import type { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/concurrency.js';
import { HttpError, MalformedPayloadError, RequestCancelledError, isAbortError } from '../utils/errors.js';

const log = createLogger('HTTP-OUT');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Total attempts including the first. Defaults to 1 (no retry). */
  maxAttempts?: number;
  fetchImpl?: FetchLike;
}

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_TIMEOUT_MS = 10000;

/** Seconds or HTTP-date, as sent in `Retry-After`. Returns milliseconds. */
export function parseRetryAfter(header: string | null, now = Date.now()): number {
  if (!header) return 0;
  const seconds = parseInt(header, 10);
  if (!isNaN(seconds) && seconds > 0) return seconds * 1000;
  const date = Date.parse(header);
  if (!isNaN(date)) {
    const delayMs = date - now;
    return delayMs > 0 ? delayMs : 0;
  }
  return 0;
}

/** Strips the query string, which carries API keys for some providers. */
export function redactUrl(url: string): string {
  return url.split('?')[0];
}

async function readApiMessage(response: Response): Promise<string> {
  const fallback = response.statusText || `HTTP ${response.status}`;
  let data: unknown;
  try {
    data = await response.json();
  } catch {
    return fallback;
  }
  if (typeof data !== 'object' || data === null) return fallback;

  for (const key of ['message', 'error', 'Error Message', 'description']) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'object' && value !== null) {
      const nested: unknown = Reflect.get(value, 'message');
      if (typeof nested === 'string' && nested.length > 0) return nested;
    }
  }
  return fallback;
}

/**
 * Fetches a URL once per attempt with a timeout linked to `signal`.
 * Caller cancellation surfaces as RequestCancelledError, a timeout as HTTP 408.
 */
async function fetchWithTimeout(url: string, init: RequestInit, options: RequestOptions): Promise<Response> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  if (options.signal?.aborted) {
    clearTimeout(timeout);
    throw new RequestCancelledError();
  }
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (options.signal?.aborted) throw new RequestCancelledError();
    if (isAbortError(error)) throw new HttpError(408, 'Request timeout');
    throw error;
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions = {}
): Promise<T> {
  const method = options.method ?? 'GET';
  const maxAttempts = Math.max(1, options.maxAttempts ?? 1);
  const endpoint = redactUrl(url);
  let lastError: unknown = null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const start = Date.now();
    const init: RequestInit = { method, headers: options.headers };
    if (options.body !== undefined) init.body = options.body;

    if (attempt > 0) log.debug('Retry', { method, endpoint, attempt });

    try {
      const response = await fetchWithTimeout(url, init, options);
      const durationMs = Date.now() - start;

      if (!response.ok) {
        const apiMessage = await readApiMessage(response);
        const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
        log.warn('API error', { method, endpoint, status: response.status, durationMs, msg: apiMessage });
        throw new HttpError(response.status, apiMessage, retryAfterMs);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new MalformedPayloadError(`Non-JSON response from ${endpoint}`, { cause: error });
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown shape';
        throw new MalformedPayloadError(`Unexpected payload from ${endpoint} (${where})`);
      }

      log.debug('OK', { method, endpoint, durationMs });
      return parsed.data;
    } catch (error) {
      lastError = error;
      if (error instanceof RequestCancelledError) throw error;
      if (attempt >= maxAttempts - 1) throw error;

      if (error instanceof HttpError && RETRYABLE_STATUS_CODES.has(error.statusCode)) {
        await sleep(Math.max(RETRY_BASE_DELAY_MS * 2 ** attempt, error.retryAfterMs));
        continue;
      }
      if (error instanceof TypeError) {
        log.warn('Network error', { endpoint, msg: error.message });
        await sleep(RETRY_BASE_DELAY_MS * 2 ** attempt);
        continue;
      }
      throw error;
    }
  }

  throw lastError ?? new HttpError(500, 'Unknown error after retries');
}
