/**
 * Structured logging for order index operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  item?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  /**
   * Log an event; debug output needs TREEORDER_DEBUG
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.item) {
      parts.push(entry.item);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    switch (level) {
      case "debug":
        if (process.env.TREEORDER_DEBUG) {
          console.debug(parts.join(" "));
        }
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
