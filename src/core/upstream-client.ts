import { createHash } from 'crypto';
import { setTimeout } from 'timers/promises';
import { JsonDocument, QueryParams, UpstreamErrorKind } from '../types';
import { TtlCache } from './cache';
import { UpstreamError } from './errors';
import { Logger, defaultLogger } from './logger';

export interface UpstreamRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

/**
 * The parts of a fetch Response the client reads
 */
export interface UpstreamResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

/**
 * The subset of `fetch` the client relies on
 */
export type FetchLike = (url: string, init: UpstreamRequestInit) => Promise<UpstreamResponse>;

export type FetchResult =
  | { ok: true; payload: JsonDocument; cached: boolean }
  | { ok: false; error: UpstreamError };

export interface UpstreamClientOptions {
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  cacheTtlMs: number;
  cache: TtlCache;
  logger?: Logger;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type AttemptOutcome =
  | { type: 'success'; payload: JsonDocument }
  | { type: 'transient'; reason: string; status?: number; aborted?: boolean }
  | { type: 'client-error'; status: number; detail: string }
  | { type: 'malformed'; reason: string };

/**
 * Deterministic cache key for a request. Query parameters are sorted by
 * name first so their order never changes the key.
 */
export function computeCacheKey(method: string, url: string, params: QueryParams = {}): string {
  const sorted = Object.keys(params)
    .sort()
    .map((name) => [name, String(params[name])]);
  const payload = JSON.stringify({ method: method.toUpperCase(), url, params: sorted });
  return createHash('sha256').update(payload).digest('hex');
}

function isJsonDocument(value: unknown): value is JsonDocument {
  return typeof value === 'object' && value !== null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP GET client for the upstream REST service.
 *
 * Consults the cache first; on a miss, retries transient failures (network
 * errors, aborted attempts, 5xx) up to `retries` total attempts within one
 * overall deadline. 4xx responses and unparsable bodies are final.
 *
 * Concurrent misses on the same key are not de-duplicated: both go to the
 * network and the later one overwrites the cache entry. The request is a
 * read-only GET so the duplicate is harmless.
 */
export class UpstreamClient {
  private baseUrl: string;
  private timeoutMs: number;
  private retries: number;
  private backoffMs: number;
  private cacheTtlMs: number;
  private cache: TtlCache;
  private logger: Logger;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.retries = Math.max(1, Math.floor(options.retries));
    this.backoffMs = options.backoffMs;
    this.cacheTtlMs = options.cacheTtlMs;
    this.cache = options.cache;
    this.logger = options.logger || defaultLogger;
    this.fetchImpl = options.fetchImpl || ((url, init) => fetch(url, init));
    this.sleep = options.sleep || ((ms) => setTimeout(ms));
    this.now = options.now || Date.now;
  }

  /**
   * Build the full upstream URL, query parameters in name order
   */
  resolveUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const name of Object.keys(params).sort()) {
      url.searchParams.set(name, String(params[name]));
    }
    return url.toString();
  }

  async fetch(path: string, params: QueryParams = {}): Promise<FetchResult> {
    const url = this.resolveUrl(path, params);
    const key = computeCacheKey('GET', url, params);

    const hit = this.cache.get(key);
    if (hit !== undefined) {
      this.logger.debug('upstream cache hit', { event: 'cache_hit', url });
      return { ok: true, payload: hit, cached: true };
    }

    const deadline = this.now() + this.timeoutMs;
    let lastReason = 'no attempt was made';
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return this.timedOut(url, attempt - 1);
      }

      const outcome = await this.attempt(url, remaining);

      switch (outcome.type) {
        case 'success':
          // An attempt that finished after the deadline is abandoned
          if (this.now() >= deadline) {
            return this.timedOut(url, attempt);
          }
          this.cache.put(key, outcome.payload, this.cacheTtlMs);
          return { ok: true, payload: outcome.payload, cached: false };

        case 'client-error':
          this.logger.warn('upstream client error', { event: 'upstream_error', url, status: outcome.status });
          return {
            ok: false,
            error: new UpstreamError(
              UpstreamErrorKind.ClientError,
              `Upstream rejected the request with ${outcome.status}${outcome.detail ? `: ${outcome.detail}` : ''}`,
              { url, attempts: attempt, status: outcome.status }
            ),
          };

        case 'malformed':
          this.logger.warn('upstream returned malformed body', { event: 'upstream_error', url });
          return {
            ok: false,
            error: new UpstreamError(UpstreamErrorKind.Malformed, outcome.reason, {
              url,
              attempts: attempt,
            }),
          };

        case 'transient':
          // The attempt budget is the remaining deadline, so an abort ends the fetch
          if (outcome.aborted) {
            return this.timedOut(url, attempt);
          }
          lastReason = outcome.reason;
          lastStatus = outcome.status;
          this.logger.warn('upstream attempt failed', {
            event: 'upstream_retry',
            url,
            attempt,
            of: this.retries,
            reason: outcome.reason,
          });
          break;
      }

      if (attempt < this.retries) {
        const wait = this.backoffMs * attempt;
        if (this.now() + wait >= deadline) {
          return this.timedOut(url, attempt);
        }
        await this.sleep(wait);
      }
    }

    return {
      ok: false,
      error: new UpstreamError(
        UpstreamErrorKind.Unavailable,
        `Upstream unavailable after ${this.retries} attempt(s): ${lastReason}`,
        { url, attempts: this.retries, status: lastStatus }
      ),
    };
  }

  private async attempt(url: string, budgetMs: number): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = global.setTimeout(() => controller.abort(), budgetMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      if (response.status >= 500) {
        return { type: 'transient', reason: `HTTP ${response.status}`, status: response.status };
      }
      if (response.status >= 400) {
        const detail = await response.text().catch(() => '');
        return { type: 'client-error', status: response.status, detail: detail.slice(0, 200) };
      }
      if (!response.ok) {
        return { type: 'transient', reason: `unexpected HTTP ${response.status}`, status: response.status };
      }

      const body = await response.text();
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        return { type: 'malformed', reason: `Upstream body is not valid JSON: ${describeError(error)}` };
      }
      if (!isJsonDocument(parsed)) {
        return { type: 'malformed', reason: 'Upstream JSON must be an object or an array' };
      }
      return { type: 'success', payload: parsed };
    } catch (error) {
      if (controller.signal.aborted) {
        return { type: 'transient', reason: `attempt timed out after ${budgetMs}ms`, aborted: true };
      }
      return { type: 'transient', reason: `network error: ${describeError(error)}` };
    } finally {
      clearTimeout(timer);
    }
  }

  private timedOut(url: string, attempts: number): FetchResult {
    this.logger.warn('upstream deadline exceeded', { event: 'upstream_timeout', url, attempts });
    return {
      ok: false,
      error: new UpstreamError(
        UpstreamErrorKind.Unavailable,
        `Upstream did not answer within ${this.timeoutMs}ms`,
        { url, attempts, timedOut: true }
      ),
    };
  }
}
