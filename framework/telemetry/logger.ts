/**
 * Structured Logging
 *
 * Leveled log entries with bound context. Entries go to a pluggable output;
 * the default writes one line per entry to stdout, or stderr for warnings
 * and errors.
 */

import { Environment } from '../runtime/environment.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogContext = Record<string, unknown>;

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: SerializedError;
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: LogContext;
  /** Replaces the console writer, e.g. to capture entries */
  output?: LogOutput;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value);
}

export class Logger {
  private level: LogLevel;
  private readonly bound: LogContext;
  private readonly output: LogOutput;
  private readonly format: LogFormat;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.bound = { ...options.context };
    this.output = options.output ?? consoleOutput(this.format);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.write('error', message, context, error);
  }

  /**
   * Logger with extra bound context, sharing level, format and output
   */
  child(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.bound, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.bound, ...context },
    };
    if (error) {
      entry.error = serializeError(error);
    }

    this.output(entry);
  }
}

function serializeError(error: Error): SerializedError {
  return { name: error.name, message: error.message, stack: error.stack };
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
} as const;

/**
 * One human-readable line, plus the stack when an error is attached
 */
export function formatPretty(entry: LogEntry): string {
  const level = `${ANSI[entry.level]}${entry.level.toUpperCase().padEnd(5)}${ANSI.reset}`;
  let line = `${ANSI.dim}${entry.timestamp}${ANSI.reset} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${ANSI.dim}${JSON.stringify(entry.context)}${ANSI.reset}`;
  }
  if (entry.error?.stack) {
    line += `\n${ANSI.dim}${entry.error.stack}${ANSI.reset}`;
  }

  return line;
}

function consoleOutput(format: LogFormat): LogOutput {
  return (entry) => {
    const line = format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
    const stream = SEVERITY[entry.level] >= SEVERITY.warn ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  };
}

export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
}

export function createRequestLogger(base: Logger, request: RequestLogContext): Logger {
  return base.child({ ...request });
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger; production logs JSON at info, otherwise pretty at debug
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = Environment.mode() === 'production';
    const level = Environment.get('LOG_LEVEL');
    defaultLogger = new Logger({
      level: isLogLevel(level) ? level : production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
