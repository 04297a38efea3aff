/**
 * Structured logging infrastructure.
 * Provides consistent logging with levels, timestamps, and context.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

class Logger {
  // Shared with every child so setLevel() on any of them applies to the tree
  private threshold: { level: LogLevel };
  private context: LogContext;

  constructor(minLevel: LogLevel = "info", baseContext: LogContext = {}) {
    this.threshold = { level: minLevel };
    this.context = baseContext;
  }

  /**
   * Create a child logger with additional context.
   */
  child(additionalContext: LogContext): Logger {
    const child = new Logger(this.threshold.level, { ...this.context, ...additionalContext });
    child.threshold = this.threshold;
    return child;
  }

  /**
   * Set minimum log level.
   */
  setLevel(level: LogLevel): void {
    this.threshold.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.threshold.level);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
    const timestamp = new Date().toISOString();
    const levelUpper = level.toUpperCase().padEnd(5);
    const merged = { ...this.context, ...context };
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    const errorStr = error ? ` Error: ${error.message}${error.stack ? `\n${error.stack}` : ""}` : "";
    return `[${timestamp}] ${levelUpper} ${message}${contextStr}${errorStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatMessage(level, message, context, error);

    switch (level) {
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log("error", message, context, error);
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

// Default logger instance
export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : "info",
  { service: "volume-spike-scanner" }
);

// Export Logger class for creating custom loggers
export { Logger };
