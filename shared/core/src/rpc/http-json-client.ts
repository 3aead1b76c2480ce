/**
 * JSON-over-HTTP client for third-party REST upstreams (mempool.space,
 * CoinGecko, alternative.me).
 *
 * Shares the node client's backoff contract but not its rate limiter: these
 * APIs enforce their own quotas. Failures of any kind become NetworkError.
 */

import { GatewayError, networkError } from '@btc-gateway/types';
import { linkAbortSignals, sleep as defaultSleep } from '../async';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { BackoffConfig, ExponentialBackoff } from '../resilience/exponential-backoff';
import { FailureCategory, classifyHttpStatus, describeTransportError } from '../resilience/failure-classification';
import type { FetchLike, SleepFn } from './bitcoin-rpc-client';

export type QueryValue = string | number | boolean | undefined;

export interface HttpJsonClientOptions {
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  backoff?: ExponentialBackoff | BackoffConfig;
  fetch?: FetchLike;
  sleep?: SleepFn;
  logger?: ILogger;
  /** Extra headers on every request */
  headers?: Record<string, string>;
}

export interface GetJsonOptions {
  query?: Record<string, QueryValue>;
  signal?: AbortSignal;
}

type AttemptOutcome =
  | { kind: 'success'; body: unknown }
  | { kind: 'transient'; reason: string }
  | { kind: 'terminal'; error: GatewayError };

/**
 * Append query parameters, skipping undefined values.
 */
export function buildUrl(url: string, query: Record<string, QueryValue> = {}): string {
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      parsed.searchParams.set(key, String(value));
    }
  }
  return parsed.toString();
}

export class HttpJsonClient {
  private readonly timeoutMs: number;
  private readonly backoff: ExponentialBackoff;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly logger: ILogger;
  private readonly headers: Record<string, string>;

  constructor(options: HttpJsonClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.backoff =
      options.backoff instanceof ExponentialBackoff ? options.backoff : new ExponentialBackoff(options.backoff);
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('http-json');
    this.headers = { Accept: 'application/json', ...options.headers };
  }

  /**
   * GET `url` and return the decoded JSON body.
   *
   * @throws GatewayError of kind NetworkError
   */
  async getJson(url: string, options: GetJsonOptions = {}): Promise<unknown> {
    const target = buildUrl(url, options.query);
    const { maxAttempts } = this.backoff;
    let lastFailure = 'no attempt made';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (attempt > 0) {
        const delay = this.backoff.delay(attempt - 1);
        this.logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
          url: target,
          attempt,
          maxAttempts,
          error: lastFailure,
        });
        try {
          await this.sleep(delay, options.signal);
        } catch (error) {
          throw networkError(`Request to ${target} cancelled`, { cause: error });
        }
      }

      const outcome = await this.attempt(target, options.signal);
      switch (outcome.kind) {
        case 'success':
          return outcome.body;
        case 'terminal':
          throw outcome.error;
        case 'transient':
          lastFailure = outcome.reason;
          break;
      }
    }

    throw networkError(`Request to ${target} failed after ${maxAttempts} attempts: ${lastFailure}`, {
      data: { url: target, attempts: maxAttempts, lastError: lastFailure },
    });
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    if (signal?.aborted) {
      throw networkError(`Request to ${url} cancelled`, { cause: signal.reason });
    }

    const linked = linkAbortSignals(this.timeoutMs, signal);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.headers, signal: linked.signal });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw networkError(`Request to ${url} cancelled`, { cause: error });
      }
      return { kind: 'transient', reason: describeTransportError(error) };
    } finally {
      linked.dispose();
    }

    if (!response.ok) {
      const reason = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
      if (classifyHttpStatus(response.status) === FailureCategory.TRANSIENT) {
        return { kind: 'transient', reason };
      }
      return {
        kind: 'terminal',
        error: networkError(`Upstream API error: ${reason}`, { data: { url, status: response.status } }),
      };
    }

    try {
      return { kind: 'success', body: JSON.parse(text) };
    } catch (error) {
      return {
        kind: 'terminal',
        error: networkError('Invalid JSON response from upstream API', { data: { url }, cause: error }),
      };
    }
  }
}
