/**
 * Logger for the avatar export pipeline
 *
 * Supports log levels, timing operations and state transitions. Every record
 * is forwarded to attached sinks so a batch run can persist its own log file.
 */

import { BasePipelineError } from '../errors';

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  color?: boolean;
  console?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  asset?: string | undefined;
  filePath?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

/**
 * A single emitted record
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  time: Date;
  context?: LoggerContext;
}

/**
 * Receives every record that passes the level filter
 */
export interface LogSink {
  write(record: LogRecord): void;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLogTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * `[YYYY-MM-DD HH:MM:SS] [LEVEL] message`
 */
export function formatLogLine(record: LogRecord): string {
  return `[${formatLogTimestamp(record.time)}] [${getLevelPrefix(record.level)}] ${record.message}`;
}

function getLevelPrefix(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG:
      return 'DEBUG';
    case LogLevel.INFO:
      return 'INFO';
    case LogLevel.WARN:
      return 'WARN';
    case LogLevel.ERROR:
      return 'ERROR';
    default:
      return 'LOG';
  }
}

/**
 * Collects formatted lines for the batch log file
 */
export class LogBuffer implements LogSink {
  private readonly lines: string[] = [];

  write(record: LogRecord): void {
    this.lines.push(formatLogLine(record));
  }

  getLines(): string[] {
    return [...this.lines];
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

/**
 * Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();
  private sinks: LogSink[] = [];

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      color: options.color ?? true,
      console: options.console ?? true,
      prefix: options.prefix || 'AvatarPipeline'
    };
  }

  /**
   * Attach a sink; returns a function that detaches it
   */
  addSink(sink: LogSink): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter(s => s !== sink);
    };
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    if (!this.options.color) return '';
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m';
      case LogLevel.INFO:
        return '\x1b[36m';
      case LogLevel.WARN:
        return '\x1b[33m';
      case LogLevel.ERROR:
        return '\x1b[31m';
      default:
        return '\x1b[90m';
    }
  }

  private getResetColor(): string {
    return this.options.color ? '\x1b[0m' : '';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const record: LogRecord = { level, message, time: new Date(), context };
    for (const sink of this.sinks) {
      sink.write(record);
    }

    if (!this.options.console) return;

    const color = this.getColor(level);
    const reset = this.getResetColor();
    const timeStr = this.options.timestamp ? ` @ ${formatLogTimestamp(record.time)}` : '';
    const logMessage = `${color}${this.options.prefix} [${getLevelPrefix(level)}]${timeStr} ${message}${reset}`;

    const write = level === LogLevel.ERROR ? console.error : console.log;
    if (context && this.options.level === LogLevel.DEBUG) {
      write(logMessage, context);
    } else {
      write(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      const duration = Date.now() - startTime;
      this.startTimes.delete(operation);
      const suffix = this.options.duration ? ` (${duration} ms)` : '';
      this.debug(`Completed operation: ${operation}${suffix}`, {
        operation,
        duration,
        ...context
      });
    }
  }

  /**
   * Run an operation with timing
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log a state machine transition
   */
  logTransition(subject: string, from: string, to: string, context?: LoggerContext): void {
    this.info(`${subject}: ${from} -> ${to}`, { stage: to, ...context });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  /**
   * Log error with context; the stack goes out at debug level
   */
  logError(error: unknown, context?: LoggerContext): void {
    const message = error instanceof Error ? error.message : String(error);
    const details = error instanceof BasePipelineError ? error.getDetails() : { error: message };
    this.error(`Error occurred: ${message}`, { ...details, ...context });
    if (error instanceof Error && error.stack) {
      this.debug(error.stack, context);
    }
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  /**
   * Logger for a batch run
   */
  forPipeline(level: LogLevel = LogLevel.INFO, color = true): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      color,
      prefix: 'AvatarPipeline'
    });
  },

  /**
   * Console-silent logger; records still reach sinks
   */
  silent(level: LogLevel = LogLevel.DEBUG): Logger {
    return createLogger({
      level,
      console: false,
      prefix: 'AvatarPipeline'
    });
  }
};
