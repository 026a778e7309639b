import { isLogFormat, isLogLevel } from './types';
import type { LogEntry, LogFormat, LogLevel, Logger, SerializedError } from './types';

// ANSI colors for terminal output
const COLORS = {
  debug: '\x1b[34m', // Blue
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Entry fields printed in the line prefix rather than as key=value pairs.
const PREFIX_FIELDS = new Set(['ts', 'level', 'msg', 'component', 'error']);

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
  /** ANSI colors in pretty output. Defaults to on for a TTY unless NO_COLOR is set. */
  color?: boolean;
}

type LogListener = (entry: LogEntry) => void;

function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) return { message: String(error) };

  let message = error.message;
  if (error.cause !== undefined) {
    message += ` (cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)})`;
  }
  return { name: error.name, message, stack: error.stack };
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /[\s="]/.test(value) ? JSON.stringify(value) : value;
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * One human-readable line per entry: `HH:MM:SS.mmm LEVEL [Component] msg key=value ...`,
 * followed by an error line when the entry carries one.
 */
export function formatPretty(entry: LogEntry, color = false): string[] {
  const paint = (code: string, text: string) => (color ? `${code}${text}${COLORS.reset}` : text);

  const time = new Date(entry.ts).toISOString().slice(11, 23);
  const fields = Object.entries(entry)
    .filter(([key]) => !PREFIX_FIELDS.has(key))
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  let line = `${paint(COLORS.dim, time)} ${paint(COLORS[entry.level], entry.level.toUpperCase().padEnd(5))} [${entry.component}] ${entry.msg}`;
  if (fields.length > 0) {
    line += ` ${paint(COLORS.dim, fields.join(' '))}`;
  }

  const lines = [line];
  if (entry.error) {
    lines.push(paint(COLORS[entry.level], `${entry.error.name ?? 'Error'}: ${entry.error.message}`));
  }
  return lines;
}

function defaultColor(): boolean {
  return process.stdout.isTTY === true && process.env.NO_COLOR === undefined;
}

export class ConsoleLogger implements Logger {
  private static listeners: LogListener[] = [];

  private readonly context: Record<string, unknown>;
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly color: boolean;

  /** Receives every emitted entry, whatever logger produced it. Returns an unsubscribe function. */
  public static addListener(listener: LogListener) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  constructor(options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
    this.context = { component: options.component ?? 'App', ...context };
    this.level = options.level ?? 'info';
    this.format = options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
    this.color = options.color ?? defaultColor();
  }

  debug(msg: string, meta?: object) {
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: object) {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: object) {
    this.output('warn', msg, meta);
  }

  error(msg: string, error?: unknown, meta?: object) {
    this.output('error', msg, meta, error);
  }

  child(meta: object): Logger {
    return new ConsoleLogger(
      { level: this.level, format: this.format, color: this.color },
      { ...this.context, ...meta },
    );
  }

  private output(level: LogLevel, msg: string, meta: object = {}, error?: unknown) {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.level]) return;

    const component = this.context.component;
    const entry: LogEntry = {
      ...this.context,
      ...meta,
      ts: Date.now(),
      level,
      msg,
      component: typeof component === 'string' ? component : 'App',
    };
    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      for (const line of formatPretty(entry, this.color)) console.log(line);
    }

    ConsoleLogger.listeners.forEach(l => {
      try {
        l(entry);
      } catch (e) {
        console.error('Error in log listener:', e);
      }
    });
  }
}

export function createLogger(options: LoggerOptions = {}): ConsoleLogger {
  const envLevel = process.env.LOG_LEVEL;
  const envFormat = process.env.LOG_FORMAT;
  return new ConsoleLogger({
    level: options.level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
    format: options.format ?? (isLogFormat(envFormat) ? envFormat : undefined),
    component: options.component,
    color: options.color,
  });
}

// Default for code paths that are not handed a logger
export const rootLogger = createLogger({ component: 'Root' });
