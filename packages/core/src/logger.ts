/**
 * Logger utilities for the Lazarus monitor
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Receives formatted lines; defaults to the console */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  colorize?: boolean;
  writer?: LogWriter;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  error?: Error;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: COLORS.dim,
  [LogLevel.INFO]: COLORS.blue,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.SILENT]: COLORS.reset,
};

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * Parse log level from string
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

// Shared by every logger that was not given an explicit level
let defaultLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/**
 * Change the level of all loggers created without an explicit level
 */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export class Logger {
  private level: LogLevel | undefined;
  private prefix: string;
  private colorize: boolean;
  private writer: LogWriter;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level;
    this.prefix = options.prefix ?? '';
    this.colorize = options.colorize ?? process.stdout.isTTY === true;
    this.writer = options.writer ?? consoleWriter;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= (this.level ?? defaultLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelName = LEVEL_NAMES[entry.level];
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    let message = `${timestamp} ${prefix}${levelName}: ${entry.message}`;

    if (entry.context) {
      message += ` ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      message += `\n${entry.error.stack ?? entry.error.message}`;
    }

    if (this.colorize) {
      return `${LEVEL_COLORS[entry.level]}${message}${COLORS.reset}`;
    }

    return message;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    this.writer(level, this.formatMessage(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Create a child logger with a nested prefix
   */
  child(prefix: string): Logger {
    const options: LoggerOptions = {
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      colorize: this.colorize,
      writer: this.writer,
    };
    if (this.level !== undefined) {
      options.level = this.level;
    }
    return new Logger(options);
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger();

/**
 * Create a logger with a specific prefix
 */
export function createLogger(prefix: string, options?: Omit<LoggerOptions, 'prefix'>): Logger {
  return new Logger({ ...options, prefix });
}
