/**
 * Log levels understood by the Logger
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

/**
 * Configuration options for Logger
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default LogLevel.INFO, or LOG_LEVEL from the environment
   */
  minLogLevel?: LogLevel;

  /**
   * Whether to include timestamps in log messages
   * @default true
   */
  includeTimestamps?: boolean;

  /**
   * Custom prefix for all log messages
   */
  prefix?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4
};

/**
 * Parse a level name such as "debug" or "WARN". Unknown names fall back to INFO.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

/**
 * Console-backed logger that tags every line with a level and a component name.
 *
 * Output looks like `[2024-06-01T10:00:00.000Z] [INFO] [VectorSearch] Index ready Context: {"docs":25}`.
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private componentName: string;

  constructor(componentName: string, config: LoggerConfig = {}) {
    this.componentName = componentName;
    this.config = {
      minLogLevel: config.minLogLevel || parseLogLevel(process.env.LOG_LEVEL),
      includeTimestamps: config.includeTimestamps !== false,
      prefix: config.prefix || ''
    };
  }

  get component(): string {
    return this.componentName;
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }
    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    parts.push(`[${level}]`);
    if (this.componentName) {
      parts.push(`[${this.componentName}]`);
    }
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      try {
        parts.push(`Context: ${JSON.stringify(context)}`);
      } catch (e) {
        parts.push('Context: [unserializable]');
      }
    }

    return parts.join(' ');
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

  /**
   * Log at ERROR level. The error's message and stack are appended to the context.
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const merged = error
      ? { ...context, error: error.message, stack: error.stack }
      : context;
    this.log(LogLevel.ERROR, message, merged);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.wouldLog(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, context);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
    }
  }

  wouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.minLogLevel];
  }

  /**
   * Create a child logger named `<parent>.<subcomponent>` sharing this logger's configuration
   */
  createChildLogger(subcomponent: string, additionalConfig: LoggerConfig = {}): Logger {
    const childComponentName = this.componentName ? `${this.componentName}.${subcomponent}` : subcomponent;
    return new Logger(childComponentName, { ...this.config, ...additionalConfig });
  }
}
