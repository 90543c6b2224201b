/**
 * Structured logging for gcl
 *
 * Pretty, coloured lines on a terminal and JSON lines with LOG_FORMAT=json.
 * Everything goes to stderr so command output on stdout stays clean.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  component?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  component?: string;
  [key: string]: unknown;
}

/**
 * Where formatted lines end up; swapped out in tests
 */
export type LogSink = (line: string) => void;

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
  silent: 5,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.LOG_LEVEL;

const settings: { minLevel: number; json: boolean; sink: LogSink } = {
  minLevel: LOG_LEVELS[isLogLevel(envLevel) ? envLevel : 'warn'],
  json: process.env.LOG_FORMAT === 'json',
  sink: line => process.stderr.write(`${line}\n`),
};

/**
 * Change the minimum level at runtime (e.g. for --verbose)
 */
export function setLogLevel(level: LogLevel): void {
  settings.minLevel = LOG_LEVELS[level];
}

export function setLogFormat(format: 'json' | 'pretty'): void {
  settings.json = format === 'json';
}

export function setLogSink(sink: LogSink): void {
  settings.sink = sink;
}

const useColor = !process.env.NO_COLOR && (Boolean(process.env.FORCE_COLOR) || Boolean(process.stderr.isTTY));

const ansi = {
  reset: useColor ? '\x1b[0m' : '',
  dim: useColor ? '\x1b[2m' : '',
  cyan: useColor ? '\x1b[36m' : '',
  yellow: useColor ? '\x1b[33m' : '',
  red: useColor ? '\x1b[31m' : '',
  magenta: useColor ? '\x1b[35m' : '',
  blue: useColor ? '\x1b[34m' : '',
};

const levelColors: Record<LogEntry['level'], string> = {
  debug: ansi.dim,
  info: ansi.cyan,
  warn: ansi.yellow,
  error: ansi.red,
  fatal: ansi.magenta,
};

// =============================================================================
// Formatters
// =============================================================================

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

export function formatPretty(entry: LogEntry): string {
  const { level, message, timestamp, component, duration, ...rest } = entry;

  const time = timestamp.slice(11, 23);
  let output = `${ansi.dim}${time}${ansi.reset} ${levelColors[level]}${level.toUpperCase().padEnd(5)}${ansi.reset}`;

  if (component) {
    output += ` ${ansi.blue}[${component}]${ansi.reset}`;
  }

  output += ` ${message}`;

  if (duration !== undefined) {
    output += ` ${ansi.dim}(${duration}ms)${ansi.reset}`;
  }

  const extras = Object.entries(rest).filter(([, v]) => v !== undefined);
  if (extras.length > 0) {
    const extraStr = extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    output += ` ${ansi.dim}${extraStr}${ansi.reset}`;
  }

  return output;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  constructor(private context: LoggerContext = {}) {}

  /**
   * Create a child logger with additional context
   */
  child(context: LoggerContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private log(level: LogEntry['level'], message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < settings.minLevel) return;

    const entry: LogEntry = {
      ...this.context,
      ...meta,
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    settings.sink(settings.json ? formatJson(entry) : formatPretty(entry));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log('fatal', message, meta);
  }

  /**
   * Start a timer; calling the returned function logs the elapsed time at debug
   */
  time(label: string, meta?: Record<string, unknown>): () => void {
    const start = Date.now();
    return () => {
      this.debug(label, { ...meta, duration: Date.now() - start });
    };
  }
}

export const logger = new Logger();
