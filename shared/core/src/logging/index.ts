/**
 * Logging Module
 *
 * Production code uses createLogger(); tests use RecordingLogger or NullLogger.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';
export { isLogLevel, LOG_LEVELS } from './types';

export {
  buildPinoOptions,
  createLogger,
  createPinoLogger,
  REDACTED_PATHS,
  resetLoggerCache,
  wrapPino,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
