/**
 * Structured Logger
 * Levelled logging with context objects; JSON lines in production
 */

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  SILENT = 'silent',
}

export interface LogContext {
  requestId?: string;
  principal?: string;
  capsuleId?: number;
  operation?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LEVEL_ORDER.find((level) => level === value?.toLowerCase());
}

export class Logger {
  private logLevel: LogLevel;
  private isProduction: boolean;

  constructor(private readonly baseContext: LogContext = {}) {
    this.isProduction = process.env.NODE_ENV === 'production';
    const fallback = process.env.NODE_ENV === 'test'
      ? LogLevel.SILENT
      : this.isProduction ? LogLevel.INFO : LogLevel.DEBUG;
    this.logLevel = parseLogLevel(process.env.LOG_LEVEL) ?? fallback;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Logger that stamps every line with the given context
   */
  child(context: LogContext): Logger {
    const child = new Logger({ ...this.baseContext, ...context });
    child.setLevel(this.logLevel);
    return child;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
    const timestamp = new Date().toISOString();
    const merged = { ...this.baseContext, ...context };
    const hasContext = Object.keys(merged).length > 0;

    if (this.isProduction) {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...merged,
        ...(error && {
          error: { name: error.name, message: error.message },
        }),
      });
    }

    return `${timestamp} [${level.toUpperCase()}] ${message}${hasContext ? ` ${JSON.stringify(merged)}` : ''}${error ? `\n${error.stack}` : ''}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatMessage(level, message, context, error);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.INFO:
        console.log(formatted);
        break;
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }
}

// Export singleton instance
export const logger = new Logger();

export default logger;
