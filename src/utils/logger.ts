import chalk from 'chalk';
import { config } from '../../config/env';

/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: string;
  data?: Record<string, unknown>;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context prefix for all logs */
  context?: string;
  /** Enable timestamps */
  timestamps?: boolean;
  /** Enable colored output */
  colors?: boolean;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Logger whose level applies while this one has none of its own */
  parent?: Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Structured logger for the simulator
 */
export class Logger {
  private level?: LogLevel;
  private context?: string;
  private timestamps: boolean;
  private colors: boolean;
  private handler?: (entry: LogEntry) => void;
  private parent?: Logger;

  constructor(options: LoggerOptions = {}) {
    this.parent = options.parent;
    this.level = options.level ?? (this.parent ? undefined : 'info');
    this.context = options.context;
    this.timestamps = options.timestamps ?? true;
    this.colors = options.colors ?? true;
    this.handler = options.handler;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    return new Logger({
      parent: this,
      context: childContext,
      timestamps: this.timestamps,
      colors: this.colors,
      handler: this.handler,
    });
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

  /**
   * Log an error object
   */
  logError(error: Error, message?: string): void {
    this.error(message ?? error.message, {
      name: error.name,
      message: error.message,
      stack: error.stack,
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      data,
    };

    if (this.handler) {
      this.handler(entry);
    } else {
      this.defaultHandler(entry);
    }
  }

  /**
   * Default console output handler
   */
  private defaultHandler(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(this.colors ? chalk.gray(ts) : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(this.colors ? LEVEL_COLORS[entry.level](levelStr) : levelStr);

    if (entry.context) {
      const ctx = `[${entry.context}]`;
      parts.push(this.colors ? chalk.gray(ctx) : ctx);
    }

    parts.push(entry.message);

    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }

    const output = parts.join(' ');

    // eslint-disable-next-line no-console
    console.error(output);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }
}

/**
 * Create a JSON logger for structured logging
 */
export function createJsonLogger(options: Omit<LoggerOptions, 'handler'> = {}): Logger {
  return new Logger({
    ...options,
    colors: false,
    handler: (entry) => {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: entry.level,
          context: entry.context,
          message: entry.message,
          ...entry.data,
        })
      );
    },
  });
}

let rootLogger: Logger | null = null;

/**
 * Get or create the root logger
 */
export function getGlobalLogger(options?: LoggerOptions): Logger {
  if (!rootLogger) {
    rootLogger = new Logger({ level: config.logging.level, ...options });
  }
  return rootLogger;
}

/**
 * Reset the root logger
 */
export function resetGlobalLogger(): void {
  rootLogger = null;
}

/**
 * Create a module-scoped logger under the root logger
 */
export function createLogger(context: string): Logger {
  return getGlobalLogger().child(context);
}
