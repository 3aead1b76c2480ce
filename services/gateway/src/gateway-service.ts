/**
 * Gateway Service
 *
 * Wires configuration into the node and REST clients, the method registry,
 * the dispatcher and the express app, and owns the HTTP server.
 */

import type { Server } from 'http';
import type { Express } from 'express';
import type { GatewayConfig } from '@btc-gateway/config';
import {
  BitcoinRpcClient,
  HttpJsonClient,
  closeServer,
  createLogger,
  getErrorMessage,
} from '@btc-gateway/core';
import type { FetchLike, ILogger, SleepFn } from '@btc-gateway/core';
import { createGatewayApp } from './api';
import { RequestDispatcher } from './dispatcher/request-dispatcher';
import type { MethodRegistry } from './dispatcher/method-registry';
import { buildMethodRegistry } from './handlers';

export interface GatewayServiceOptions {
  config: GatewayConfig;
  logger?: ILogger;
  /** Shared by the node and REST clients; defaults to global fetch */
  fetch?: FetchLike;
  sleep?: SleepFn;
}

export class GatewayService {
  readonly config: GatewayConfig;
  readonly rpc: BitcoinRpcClient;
  readonly rest: HttpJsonClient;
  readonly registry: MethodRegistry;
  readonly dispatcher: RequestDispatcher;
  readonly app: Express;
  private readonly logger: ILogger;
  private server: Server | null = null;

  constructor(options: GatewayServiceOptions) {
    const { config, fetch, sleep } = options;
    this.config = config;
    this.logger = options.logger ?? createLogger('gateway');

    this.rpc = BitcoinRpcClient.fromConfig(config.bitcoin, config.rpc, {
      fetch,
      sleep,
      logger: this.logger.child({ component: 'bitcoin-rpc' }),
    });
    this.rest = new HttpJsonClient({
      timeoutMs: config.apis.timeoutMs,
      backoff: { baseMs: config.rpc.backoffBaseMs, maxAttempts: config.rpc.maxAttempts },
      fetch,
      sleep,
      logger: this.logger.child({ component: 'http-json' }),
    });

    this.registry = buildMethodRegistry();
    this.dispatcher = new RequestDispatcher({
      registry: this.registry,
      services: { rpc: this.rpc, rest: this.rest, config, logger: this.logger },
      logger: this.logger.child({ component: 'dispatcher' }),
    });
    this.app = createGatewayApp({
      dispatcher: this.dispatcher,
      rpc: this.rpc,
      config,
      logger: this.logger,
      listMethods: () => this.registry.list(),
    });
  }

  getIsRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Listen on the configured host and port (or `port`, 0 for any free port).
   *
   * @returns The bound port
   */
  async start(port: number = this.config.server.port): Promise<number> {
    if (this.server) {
      throw new Error('Gateway service is already running');
    }

    const { host } = this.config.server;
    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(port, host);
      listening.once('listening', () => {
        listening.off('error', reject);
        resolve(listening);
      });
      listening.once('error', reject);
    });

    server.on('error', (error: Error) => {
      this.logger.error('HTTP server error', { error: getErrorMessage(error) });
    });
    this.server = server;

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    this.logger.info(`Bitcoin RPC gateway listening on http://${host}:${boundPort}`, {
      network: this.config.bitcoin.network,
      methods: this.registry.size,
    });
    return boundPort;
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }
    this.logger.info('Stopping gateway service');
    const server = this.server;
    this.server = null;
    await closeServer(server);
    this.logger.info('Gateway service stopped');
  }
}
