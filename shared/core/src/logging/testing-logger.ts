/**
 * Testing Logger Implementations
 *
 * RecordingLogger captures entries for assertions; NullLogger discards them.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const dispatcher = new RequestDispatcher({ registry, services, logger });
 *
 * await dispatcher.handle('{');
 * expect(logger.hasLogMatching('debug', 'Parse error')).toBe(true);
 * ```
 */

import type { ILogger, LogLevel, LogMeta } from './types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  timestamp: number;
  /** Child logger bindings (if from a child logger) */
  bindings?: LogMeta;
}

// =============================================================================
// RecordingLogger
// =============================================================================

export class RecordingLogger implements ILogger {
  private logs: LogEntry[] = [];
  private readonly bindings: LogMeta;

  constructor(bindings?: LogMeta) {
    this.bindings = bindings ?? {};
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.record('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.record('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.record('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.record('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.record('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.record('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    const child = new RecordingLogger({ ...this.bindings, ...bindings });
    // Share the array so the parent sees the child's entries
    child.logs = this.logs;
    return child;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return true;
  }

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.logs.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      timestamp: Date.now(),
      bindings: Object.keys(this.bindings).length > 0 ? { ...this.bindings } : undefined,
    });
  }

  getAllLogs(): ReadonlyArray<LogEntry> {
    return [...this.logs];
  }

  getLogs(level: LogLevel): ReadonlyArray<LogEntry> {
    return this.logs.filter((log) => log.level === level);
  }

  getErrors(): ReadonlyArray<LogEntry> {
    return this.getLogs('error');
  }

  getWarnings(): ReadonlyArray<LogEntry> {
    return this.getLogs('warn');
  }

  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some((log) =>
      typeof pattern === 'string' ? log.msg.includes(pattern) : pattern.test(log.msg)
    );
  }

  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some((log) => {
      const recorded = log.meta;
      if (!recorded) return false;
      return Object.entries(meta).every(([key, value]) => recorded[key] === value);
    });
  }

  getLastLog(): LogEntry | undefined {
    return this.logs[this.logs.length - 1];
  }

  clear(): void {
    this.logs.length = 0;
  }

  get count(): number {
    return this.logs.length;
  }
}

// =============================================================================
// NullLogger
// =============================================================================

export class NullLogger implements ILogger {
  fatal(_msg: string, _meta?: LogMeta): void { /* noop */ }
  error(_msg: string, _meta?: LogMeta): void { /* noop */ }
  warn(_msg: string, _meta?: LogMeta): void { /* noop */ }
  info(_msg: string, _meta?: LogMeta): void { /* noop */ }
  debug(_msg: string, _meta?: LogMeta): void { /* noop */ }
  trace(_msg: string, _meta?: LogMeta): void { /* noop */ }

  child(_bindings: LogMeta): ILogger {
    return this;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}
