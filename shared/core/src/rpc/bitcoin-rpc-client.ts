/**
 * Bitcoin Core JSON-RPC client.
 *
 * One logical call = one rate-limit admission + up to `maxAttempts` HTTP
 * attempts. Every failure leaves as a GatewayError:
 *
 * | Outcome                                        | Class     | Error           |
 * |------------------------------------------------|-----------|-----------------|
 * | rate limiter rejects                           | -         | RateLimitError  |
 * | transport failure / per-attempt timeout        | transient | BitcoinRPCError |
 * | HTTP error status without a JSON-RPC error body| transient | BitcoinRPCError |
 * | JSON-RPC error body (any status)               | terminal  | BitcoinRPCError |
 * | 2xx body that is not a JSON-RPC response       | terminal  | BitcoinRPCError |
 *
 * Transient failures are retried after `backoff.delay(retryIndex)`. The
 * rate limiter is consulted once per logical call, never per retry.
 *
 * All calls share Node's global fetch dispatcher, whose keep-alive pool
 * serves concurrent calls independently.
 */

import { z } from 'zod';
import {
  GatewayError,
  NODE_JSONRPC_VERSION,
  NodeRpcError,
  NodeRpcRequest,
  rateLimitError,
  rpcError,
} from '@btc-gateway/types';
import type { BitcoinNodeConfig, RpcClientConfig } from '@btc-gateway/config';
import { linkAbortSignals, sleep as defaultSleep } from '../async';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { BackoffConfig, ExponentialBackoff } from '../resilience/exponential-backoff';
import { describeTransportError } from '../resilience/failure-classification';
import { GLOBAL_CLIENT_KEY, SlidingWindowRateLimiter } from './sliding-window-rate-limiter';
import {
  Block,
  BlockHeader,
  BlockHeaderSchema,
  BlockSchema,
  BlockchainInfo,
  BlockchainInfoSchema,
  MempoolInfo,
  MempoolInfoSchema,
  MiningInfo,
  MiningInfoSchema,
  NetworkInfo,
  NetworkInfoSchema,
  RawTransaction,
  RawTransactionSchema,
  SmartFeeEstimate,
  SmartFeeEstimateSchema,
  ValidateAddressResult,
  ValidateAddressSchema,
} from './node-schemas';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BitcoinRpcClientOptions {
  rpcUrl: string;
  rpcUser: string;
  rpcPassword: string;
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  backoff?: ExponentialBackoff | BackoffConfig;
  rateLimiter?: SlidingWindowRateLimiter;
  fetch?: FetchLike;
  sleep?: SleepFn;
  logger?: ILogger;
}

export interface CallOptions {
  /** Rate-limit key (default: 'global') */
  clientKey?: string;
  /** Aborting abandons the in-flight attempt and any pending retry */
  signal?: AbortSignal;
}

export interface BitcoinRpcClientStats {
  calls: number;
  attempts: number;
  retries: number;
  rateLimited: number;
  failures: number;
}

type AttemptOutcome =
  | { kind: 'success'; result: unknown }
  | { kind: 'transient'; reason: string }
  | { kind: 'terminal'; error: GatewayError };

type ParsedBody = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): ParsedBody {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A JSON-RPC error body: `{ error: { code: number, message: string } }`
 * with a non-null error member.
 */
function readNodeError(body: unknown): NodeRpcError | undefined {
  if (!isRecord(body) || !isRecord(body.error)) {
    return undefined;
  }
  const { code, message } = body.error;
  if (typeof code !== 'number' || typeof message !== 'string') {
    return undefined;
  }
  return { code, message };
}

export class BitcoinRpcClient {
  private readonly rpcUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly backoff: ExponentialBackoff;
  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly logger: ILogger;
  private requestCounter = 0;
  private stats: BitcoinRpcClientStats = {
    calls: 0,
    attempts: 0,
    retries: 0,
    rateLimited: 0,
    failures: 0,
  };

  constructor(options: BitcoinRpcClientOptions) {
    this.rpcUrl = options.rpcUrl;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.backoff =
      options.backoff instanceof ExponentialBackoff ? options.backoff : new ExponentialBackoff(options.backoff);
    this.logger = options.logger ?? createLogger('bitcoin-rpc');
    this.rateLimiter = options.rateLimiter ?? new SlidingWindowRateLimiter({ logger: this.logger });
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;

    const credentials = Buffer.from(`${options.rpcUser}:${options.rpcPassword}`).toString('base64');
    this.headers = {
      'Content-Type': 'application/json',
      Authorization: `Basic ${credentials}`,
    };
  }

  /**
   * Build a client from validated gateway configuration.
   */
  static fromConfig(
    node: BitcoinNodeConfig,
    rpc: RpcClientConfig,
    overrides: Partial<BitcoinRpcClientOptions> = {}
  ): BitcoinRpcClient {
    return new BitcoinRpcClient({
      rpcUrl: node.rpcUrl,
      rpcUser: node.rpcUser,
      rpcPassword: node.rpcPassword,
      timeoutMs: rpc.timeoutMs,
      backoff: { baseMs: rpc.backoffBaseMs, maxAttempts: rpc.maxAttempts },
      rateLimiter:
        overrides.rateLimiter ??
        new SlidingWindowRateLimiter({
          maxRequests: rpc.rateLimit.maxRequests,
          windowMs: rpc.rateLimit.windowMs,
          logger: overrides.logger,
        }),
      ...overrides,
    });
  }

  /**
   * Call a node RPC method and return its raw `result` (which may be null).
   *
   * @throws GatewayError of kind RateLimitError or BitcoinRPCError
   */
  async call(method: string, params: readonly unknown[] = [], options: CallOptions = {}): Promise<unknown> {
    const clientKey = options.clientKey ?? GLOBAL_CLIENT_KEY;
    this.stats.calls++;

    if (options.signal?.aborted) {
      throw this.cancelled(method, options.signal.reason);
    }

    if (!this.rateLimiter.tryAdmit(clientKey)) {
      this.stats.rateLimited++;
      throw rateLimitError(
        `Rate limit exceeded: at most ${this.rateLimiter.maxRequests} requests per ${this.rateLimiter.windowMs}ms`,
        { clientKey, limit: this.rateLimiter.maxRequests, windowMs: this.rateLimiter.windowMs }
      );
    }

    const request: NodeRpcRequest = {
      jsonrpc: NODE_JSONRPC_VERSION,
      id: `btc-gateway-${++this.requestCounter}`,
      method,
      params,
    };
    const body = JSON.stringify(request);
    const { maxAttempts } = this.backoff;
    let lastFailure = 'no attempt made';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (attempt > 0) {
        const delay = this.backoff.delay(attempt - 1);
        this.logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
          method,
          attempt,
          maxAttempts,
          error: lastFailure,
        });
        try {
          await this.sleep(delay, options.signal);
        } catch (error) {
          throw this.cancelled(method, error);
        }
        this.stats.retries++;
      }

      if (options.signal?.aborted) {
        throw this.cancelled(method, options.signal.reason);
      }

      this.stats.attempts++;
      const outcome = await this.attempt(method, body, options.signal);

      switch (outcome.kind) {
        case 'success':
          return outcome.result;
        case 'terminal':
          this.stats.failures++;
          throw outcome.error;
        case 'transient':
          lastFailure = outcome.reason;
          this.logger.debug('Transient node failure', { method, attempt: attempt + 1, error: outcome.reason });
          break;
      }
    }

    this.stats.failures++;
    this.logger.error('Bitcoin RPC attempts exhausted', { method, attempts: maxAttempts, error: lastFailure });
    throw rpcError(`Bitcoin RPC call ${method} failed after ${maxAttempts} attempts: ${lastFailure}`, {
      data: { method, attempts: maxAttempts, lastError: lastFailure },
    });
  }

  /**
   * Call a node RPC method and validate the result shape.
   */
  async request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: string,
    params: readonly unknown[] = [],
    options: CallOptions = {}
  ): Promise<T> {
    const result = await this.call(method, params, options);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      this.stats.failures++;
      throw rpcError(`Unexpected result shape from node for ${method}`, {
        data: { method, issues: parsed.error.issues.map((issue) => issue.path.join('.') || '(root)') },
      });
    }
    return parsed.data;
  }

  getStats(): Readonly<BitcoinRpcClientStats> {
    return { ...this.stats };
  }

  // ===========================================================================
  // Node RPC wrappers
  // ===========================================================================

  getBlockchainInfo(options?: CallOptions): Promise<BlockchainInfo> {
    return this.request(BlockchainInfoSchema, 'getblockchaininfo', [], options);
  }

  getNetworkInfo(options?: CallOptions): Promise<NetworkInfo> {
    return this.request(NetworkInfoSchema, 'getnetworkinfo', [], options);
  }

  getMempoolInfo(options?: CallOptions): Promise<MempoolInfo> {
    return this.request(MempoolInfoSchema, 'getmempoolinfo', [], options);
  }

  getMiningInfo(options?: CallOptions): Promise<MiningInfo> {
    return this.request(MiningInfoSchema, 'getmininginfo', [], options);
  }

  getBlockCount(options?: CallOptions): Promise<number> {
    return this.request(z.number().int(), 'getblockcount', [], options);
  }

  getBlockHash(height: number, options?: CallOptions): Promise<string> {
    return this.request(z.string(), 'getblockhash', [height], options);
  }

  /** Verbosity 1 lists txids, verbosity 2 embeds decoded transactions. */
  getBlock(blockHash: string, verbosity: 1 | 2 = 1, options?: CallOptions): Promise<Block> {
    return this.request(BlockSchema, 'getblock', [blockHash, verbosity], options);
  }

  getBlockHeader(blockHash: string, options?: CallOptions): Promise<BlockHeader> {
    return this.request(BlockHeaderSchema, 'getblockheader', [blockHash, true], options);
  }

  getRawTransaction(txid: string, options?: CallOptions): Promise<RawTransaction> {
    return this.request(RawTransactionSchema, 'getrawtransaction', [txid, true], options);
  }

  validateAddress(address: string, options?: CallOptions): Promise<ValidateAddressResult> {
    return this.request(ValidateAddressSchema, 'validateaddress', [address], options);
  }

  estimateSmartFee(confTarget: number, options?: CallOptions): Promise<SmartFeeEstimate> {
    return this.request(SmartFeeEstimateSchema, 'estimatesmartfee', [confTarget], options);
  }

  // ===========================================================================
  // Attempt
  // ===========================================================================

  private async attempt(method: string, body: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    const linked = linkAbortSignals(this.timeoutMs, signal);
    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;

    try {
      const response = await this.fetchImpl(this.rpcUrl, {
        method: 'POST',
        headers: this.headers,
        body,
        signal: linked.signal,
      });
      status = response.status;
      statusText = response.statusText;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw this.cancelled(method, error);
      }
      return { kind: 'transient', reason: describeTransportError(error) };
    } finally {
      linked.dispose();
    }

    const parsed = parseJson(text);
    const nodeError = parsed.ok ? readNodeError(parsed.value) : undefined;

    if (nodeError) {
      return {
        kind: 'terminal',
        error: rpcError(`Bitcoin RPC error: ${nodeError.message}`, {
          data: { method, rpcError: nodeError },
        }),
      };
    }

    if (!ok) {
      return { kind: 'transient', reason: `HTTP ${status}${statusText ? ` ${statusText}` : ''}` };
    }

    if (!parsed.ok || !isRecord(parsed.value) || !('result' in parsed.value)) {
      return {
        kind: 'terminal',
        error: rpcError('Invalid JSON response from node', { data: { method, status } }),
      };
    }

    return { kind: 'success', result: parsed.value.result };
  }

  private cancelled(method: string, cause: unknown): GatewayError {
    this.stats.failures++;
    this.logger.debug('Bitcoin RPC call cancelled', { method });
    return rpcError(`Bitcoin RPC call ${method} cancelled`, { data: { method }, cause });
  }
}
