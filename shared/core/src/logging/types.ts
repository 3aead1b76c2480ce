/**
 * Logger Type Definitions
 *
 * ILogger decouples gateway code from the logging library. Components take
 * an ILogger in their constructor: production passes a Pino-backed logger,
 * tests pass RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogMeta = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class BitcoinRpcClient {
 *   constructor(options: { logger?: ILogger }) {}
 * }
 *
 * new BitcoinRpcClient({ logger: createLogger('bitcoin-rpc') });
 * new BitcoinRpcClient({ logger: new RecordingLogger() });
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose bindings are merged into every entry.
   *
   * @example
   * ```typescript
   * const requestLogger = logger.child({ requestId: 7 });
   * requestLogger.info('Dispatching'); // { requestId: 7, msg: 'Dispatching' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Logger name (shows up as `service` on every entry) */
  name: string;
  /** Minimum level; defaults to LOG_LEVEL or 'info' */
  level?: LogLevel;
  /** Force pretty output on or off; defaults to NODE_ENV=development */
  pretty?: boolean;
  /** Bindings applied through a child logger */
  bindings?: LogMeta;
}
