/**
 * Structured logging for index operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  index?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  #enabled = true;
  #debug: boolean | undefined;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.isDebugEnabled()) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const line = formatEntry(entry);

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Debug output follows RECORD_INDEX_DEBUG unless overridden with setDebug
   */
  isDebugEnabled(): boolean {
    return this.#debug ?? process.env.RECORD_INDEX_DEBUG === "1";
  }

  /**
   * Force debug output on or off; `undefined` goes back to the environment
   */
  setDebug(enabled: boolean | undefined): void {
    this.#debug = enabled;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Render a log entry as a single console line
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.index) {
    parts.push(entry.index);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

/**
 * Global logger instance
 */
export const logger = new Logger();
