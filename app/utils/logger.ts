export const LOG_LEVEL_NAMES = ['debug', 'verbose', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

/** Anything with a `write` method; `isTTY` decides whether colours are used. */
export interface LogSink {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  verbose: '\x1b[94m', // Light blue
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

/**
 * Levelled diagnostic logger.
 *
 * Writes to stderr by default: stdout is reserved for the plugin protocol
 * (metadata JSON and status lines read by the host).
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;
  private timestamps: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || 'warn';
    this.prefix = options.prefix || '';
    this.timestamps = options.timestamps ?? true;
    this.sink = options.sink ?? process.stderr;
  }

  private format(level: LogLevel, ...args: unknown[]): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);

    if (this.prefix) {
      parts.push(this.prefix);
    }

    const message = args
      .map((arg) => {
        if (arg instanceof Error) {
          return arg.stack || arg.message;
        }
        if (typeof arg === 'object') {
          return JSON.stringify(arg, null, 2);
        }
        return String(arg);
      })
      .join(' ');

    parts.push(message);

    return parts.join(' ');
  }

  private log(level: LogLevel, ...args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }

    const formatted = this.format(level, ...args);

    if (this.sink.isTTY) {
      this.sink.write(`${LOG_COLORS[level]}${formatted}${RESET}\n`);
    } else {
      this.sink.write(`${formatted}\n`);
    }
  }

  debug(...args: unknown[]): void {
    this.log('debug', ...args);
  }

  verbose(...args: unknown[]): void {
    this.log('verbose', ...args);
  }

  info(...args: unknown[]): void {
    this.log('info', ...args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', ...args);
  }

  error(...args: unknown[]): void {
    this.log('error', ...args);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Create a child logger with a new prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}${prefix}` : prefix,
      timestamps: this.timestamps,
      sink: this.sink,
    });
  }
}

// Default logger instance
export const logger = new Logger();
