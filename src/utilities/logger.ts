/**
 * Structured Logger with Multiple Sinks
 *
 * Leveled, context-carrying logging for the timeline pipeline. Components
 * take an injected logger (tests pass one backed by a MemorySink) and
 * default to a component logger derived from the global instance.
 *
 * Sinks:
 * - console: Human-readable lines on stderr (stdout belongs to transcripts)
 * - memory: Ring buffer for programmatic access
 * - file: JSON lines appended to a debug log
 *
 * Usage:
 *   import { createComponentLogger } from '../utilities/logger.js';
 *   const log = createComponentLogger('TimelineController');
 *   log.debug('Round started', { round: 2 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

/** Environment variable that turns on debug-level file logging. */
export const DEBUG_ENV = 'AGENT_TIMELINE_DEBUG';

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink: one readable line per entry, written to stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    process.stderr.write(`${prefix} ${entry.message}${dataStr}\n`);
  }
}

/** Memory sink: ring buffer for tests and programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = [...this.buffer];

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink: append JSON lines to a log file */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch {
        // sink failures are ignored
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Warn level on stderr until `configureLogger()`
 * is called at start-up.
 */
export let logger = new StructuredLogger({ level: 'warn' });

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * True when the debug environment variable is set to a truthy value.
 */
export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = (env[DEBUG_ENV] ?? '').toLowerCase();
  return value === '1' || value === 'true' || value === 'yes' || value === 'on';
}

/**
 * Create a logger for a specific component (adds component name to context).
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
