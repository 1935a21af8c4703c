/**
 * Namespaced console logger shared by every component
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogContext {
  [key: string]: unknown;
}

const LOG_LEVELS: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS[(value || 'info').toUpperCase()] ?? LogLevel.INFO;
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel;
  private readonly namespace?: string;
  private structured: boolean;

  private constructor(namespace?: string) {
    this.namespace = namespace;
    this.logLevel = parseLogLevel(process.env['LOG_LEVEL']);
    this.structured = (process.env['LOG_STRUCTURED'] || 'false').toLowerCase() === 'true';
  }

  static getInstance(namespace?: string): Logger {
    if (namespace) {
      return new Logger(namespace);
    }
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Drop the shared root instance so the next lookup re-reads the environment
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (this.structured) {
      const { error, ...rest }: LogContext = context ?? {};
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        ...(Object.keys(rest).length > 0 ? { context: rest } : {}),
        ...(error !== undefined ? { error } : {}),
      });
    }
    const prefix = this.namespace ? `[${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level} ${prefix} ${message}${contextStr}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        error:
          error instanceof Error
            ? {
                message: error.message,
                stack: error.stack,
                name: error.name,
              }
            : error,
      };

      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }

  /**
   * Creates a child logger with a nested namespace
   */
  child(namespace: string): Logger {
    const fullNamespace = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger(fullNamespace);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  setStructured(enabled: boolean): void {
    this.structured = enabled;
  }
}
