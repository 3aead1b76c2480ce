/**
 * Pino Logger Implementation
 *
 * - One cached logger per name
 * - JSON output in production, pino-pretty in development
 * - Node credentials and auth headers redacted before they reach a sink
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import { isLogLevel } from './types';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

export const REDACTED_PATHS = [
  'password', '*.password',
  'rpcPassword', '*.rpcPassword',
  'authorization', '*.authorization',
  'headers.authorization', '*.headers.authorization',
  'apiKey', '*.apiKey',
];

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts Pino's `(meta, msg)` argument order to ILogger's `(msg, meta)`.
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    this.write('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.write('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.write('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.write('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.write('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.write('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  private write(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino[level](meta, msg);
    } else {
      this.pino[level](msg);
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Build the Pino options for a logger. Exported for tests that need to
 * write to an in-memory destination.
 */
export function buildPinoOptions(config: LoggerConfig): LoggerOptions {
  const envLevel = process.env.LOG_LEVEL;
  const level: LogLevel = config.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = config.pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name: config.name,
    level,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: config.name,
      pid: process.pid,
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return options;
}

/**
 * Create (or fetch the cached) Pino logger.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('bitcoin-rpc');
 * const debugLogger = createPinoLogger({ name: 'dispatcher', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalizedConfig: LoggerConfig = typeof config === 'string' ? { name: config } : config;
  const { name, bindings } = normalizedConfig;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const logger = new PinoLoggerWrapper(pino(buildPinoOptions(normalizedConfig)));
  loggerCache.set(name, logger);

  // Children are never cached
  return bindings ? logger.child(bindings) : logger;
}

/**
 * Wrap an existing Pino instance (e.g. one writing to a test stream).
 */
export function wrapPino(instance: PinoLoggerType): ILogger {
  return new PinoLoggerWrapper(instance);
}

/**
 * Preferred entry point for component code.
 */
export function createLogger(name: string): ILogger {
  return createPinoLogger(name);
}
