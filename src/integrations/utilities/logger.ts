/**
 * Structured Logger with Trace IDs and Multiple Sinks
 *
 * Single logging entry point for the service. Run-scoped code binds the
 * run id as the trace id, so every line of one analysis can be grepped
 * together.
 *
 * Sinks:
 * - console: pretty lines for development, JSON lines for log shippers
 * - memory: ring buffer, used by tests and the health endpoint
 * - file: append JSON lines to a log file
 *
 * Usage:
 *   const log = createComponentLogger('Orchestrator');
 *   log.withTrace(runId).info('Run planned', { agents: 3 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
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

export type ConsoleFormat = 'pretty' | 'json';

/** Console sink. Errors and warnings go to stderr. */
export class ConsoleSink implements LogSink {
  constructor(private readonly format: ConsoleFormat = 'pretty') {}

  write(entry: LogEntry): void {
    const line = this.format === 'json' ? JSON.stringify(entry) : formatPretty(entry);

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(line);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
    }
  }
}

function formatPretty(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
  const dataStr = entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
  return `${prefix}${traceStr} ${entry.message}${dataStr}`;
}

/** File sink - append JSON lines to a log file */
export class FileSink implements LogSink {
  private initialized = false;

  constructor(private readonly filePath: string) {}

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

interface SharedOutput {
  level: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  // Children share this object, so setLevel() and addSink() on any logger
  // reach every logger derived from the same root.
  private output: SharedOutput;
  private defaultContext: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}) {
    this.output = { level: config.level ?? 'info', sinks: config.sinks ?? [new ConsoleSink()] };
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with a bound trace ID */
  withTrace(traceId: string): StructuredLogger {
    const child = this.child(this.defaultContext);
    child.traceId = traceId;
    return child;
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = this.child({ ...this.defaultContext, ...context });
    child.traceId = this.traceId;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.output.level = level;
  }

  get level(): LogLevel {
    return this.output.level;
  }

  /** Add a sink at runtime (e.g., file sink once config is loaded) */
  addSink(sink: LogSink): void {
    this.output.sinks.push(sink);
  }

  /** Swap every sink at once */
  setSinks(sinks: LogSink[]): void {
    this.output.sinks = [...sinks];
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

  private child(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({ defaultContext: context, sinks: [] });
    child.output = this.output;
    return child;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (level === 'silent' || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.output.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.output.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // A broken sink must not take the request down with it.
        process.stderr.write(`[logger] sink write failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Root logger. Defaults to a console sink at 'info' level.
 */
export const logger = new StructuredLogger();

/**
 * Reconfigure the root logger in place. Component loggers created at
 * import time pick up the new level and sinks.
 */
export function configureLogger(config: Omit<LoggerConfig, 'defaultContext'>): StructuredLogger {
  if (config.level) logger.setLevel(config.level);
  if (config.sinks) logger.setSinks(config.sinks);
  return logger;
}

/**
 * Create a logger for a specific component (adds component name to context).
 *
 * Example:
 *   const log = createComponentLogger('CacheStore');
 *   log.info('Swept expired entries', { removed: 12 });
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
