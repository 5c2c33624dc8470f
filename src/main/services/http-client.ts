import { Agent, fetch } from 'undici';
import type { RequestInit, Response } from 'undici';
import type { HeaderMap } from '../../shared/types/fetch-outcome.js';
import { errorMessage } from '../errors.js';
import log from '../logger.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface HttpClientOptions {
  /** Sent with every request, under the per-call headers. */
  headers: HeaderMap;
  retries: number;
  backoffMs: number;
  maxBackoffMs: number;
  timeoutMs: number;
  poolSize: number;
}

export const DEFAULT_HTTP_OPTIONS: HttpClientOptions = {
  headers: {},
  retries: 5,
  backoffMs: 1000,
  maxBackoffMs: 120_000,
  timeoutMs: 30_000,
  poolSize: 50
};

export interface HttpClientDeps {
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
}

export interface Transport {
  get(url: string, extraHeaders?: HeaderMap): Promise<Response>;
  close(): Promise<void>;
}

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay requested by a `Retry-After` header, either delta-seconds or an
 * HTTP date. Returns undefined when absent or unparseable.
 */
export const parseRetryAfter = (value: string | null, now: number = Date.now()): number | undefined => {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
};

/**
 * GET client shared by every worker of a run. Connection errors and the
 * statuses in RETRY_STATUSES are retried up to `retries` times with
 * doubling backoff; once that budget is spent a retriable response is
 * handed back as is and a connection error is rethrown.
 */
export class HttpClient implements Transport {
  private readonly options: HttpClientOptions;
  private readonly dispatcher: Agent;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(options: Partial<HttpClientOptions> = {}, deps: HttpClientDeps = {}) {
    this.options = { ...DEFAULT_HTTP_OPTIONS, ...options, headers: Object.freeze({ ...options.headers }) };
    this.dispatcher = new Agent({ connections: this.options.poolSize });
    this.fetchFn = deps.fetchFn ?? fetch;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  backoffDelay(retry: number): number {
    return Math.min(this.options.backoffMs * 2 ** retry, this.options.maxBackoffMs);
  }

  async get(url: string, extraHeaders: HeaderMap = {}): Promise<Response> {
    const headers = { ...this.options.headers, ...extraHeaders };

    for (let retry = 0; ; retry += 1) {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers,
          dispatcher: this.dispatcher,
          redirect: 'follow',
          signal: AbortSignal.timeout(this.options.timeoutMs)
        });
      } catch (error) {
        if (retry >= this.options.retries) {
          throw error;
        }
        const delay = this.backoffDelay(retry);
        log.debug('Transport error for %s (%s); retry %d in %dms', url, errorMessage(error), retry + 1, delay);
        await this.sleep(delay);
        continue;
      }

      if (!RETRY_STATUSES.has(response.status) || retry >= this.options.retries) {
        return response;
      }

      const delay = Math.min(
        parseRetryAfter(response.headers.get('retry-after'), this.now()) ?? this.backoffDelay(retry),
        this.options.maxBackoffMs
      );
      log.debug('HTTP %d for %s; retry %d in %dms', response.status, url, retry + 1, delay);
      await response.body?.cancel();
      await this.sleep(delay);
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
