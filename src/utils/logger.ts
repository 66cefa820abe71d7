/**
 * Structured logging utility for the feature formatting system
 * Provides consistent logging format with correlation IDs for better tracing
 */

import { environmentConfig } from "../config/environment";

export interface LogContext {
  correlationId?: string;
  formatName?: string;
  operation?: string;
  [key: string]: unknown;
}

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Structured logger class with correlation ID support
 */
export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext: LogContext;
  private readonly minLevel: LogLevel;

  constructor(
    serviceName: string = "FeatureFormatter",
    defaultContext: LogContext = {},
    minLevel: LogLevel = LogLevel[environmentConfig.logLevel],
  ) {
    this.serviceName = serviceName;
    this.defaultContext = defaultContext;
    this.minLevel = minLevel;
  }

  /**
   * Creates a child logger with additional default context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      {
        ...this.defaultContext,
        ...additionalContext,
      },
      this.minLevel,
    );
  }

  /**
   * Whether entries at the given level are written
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Logs an error message
   */
  error(message: string, error?: Error, context: LogContext = {}): void {
    const errorContext = error
      ? {
          error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
          },
        }
      : {};

    this.log(LogLevel.ERROR, message, { ...context, ...errorContext });
  }

  /**
   * Core logging method that outputs structured JSON logs
   */
  private log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      ...this.defaultContext,
      ...context,
    };

    let logOutput: string;
    try {
      logOutput = JSON.stringify(logEntry, (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value,
      );
    } catch (error) {
      // Context that cannot be serialized (e.g. circular) is dropped
      logOutput = JSON.stringify({
        timestamp: logEntry.timestamp,
        level,
        service: this.serviceName,
        message,
        contextError: error instanceof Error ? error.message : String(error),
      });
    }

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logOutput);
        break;
      case LogLevel.INFO:
        console.info(logOutput);
        break;
      case LogLevel.WARN:
        console.warn(logOutput);
        break;
      case LogLevel.ERROR:
        console.error(logOutput);
        break;
    }
  }
}

/**
 * Default logger instance for the feature formatters
 */
export const logger = new Logger("FeatureFormatter");

/**
 * Creates a logger with correlation ID context
 */
export function createCorrelatedLogger(
  correlationId: string,
  additionalContext: LogContext = {},
): Logger {
  return logger.child({ correlationId, ...additionalContext });
}
