/**
 * Log level type.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Log metadata type.
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Interface for structured logging.
 */
export interface ILogger {
  /**
   * Log an error message.
   * @param message - Error message
   * @param error - Error object (optional)
   * @param meta - Additional metadata (optional)
   */
  error(message: string, error?: Error, meta?: LogMetadata): void;

  /**
   * Log a warning message.
   */
  warn(message: string, meta?: LogMetadata): void;

  /**
   * Log an info message.
   */
  info(message: string, meta?: LogMetadata): void;

  /**
   * Log a debug message.
   */
  debug(message: string, meta?: LogMetadata): void;

  /**
   * Create a child logger with additional context.
   * @param context - Additional context to include in all logs
   */
  child?(context: LogMetadata): ILogger;

  /**
   * Set log level dynamically.
   */
  setLevel?(level: LogLevel): void;
}

/**
 * Scope a logger to a component when the implementation supports it.
 */
export function componentLogger(logger: ILogger, component: string): ILogger {
  return logger.child ? logger.child({ component }) : logger;
}
