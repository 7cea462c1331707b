/**
 * Defines the available logging levels, lowest first.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Where formatted log lines end up. `console` satisfies it.
 */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Context-tagged logging with a minimum severity.
 * Messages below the configured level are dropped.
 */
export class LoggerService {
  private readonly threshold: number;
  private readonly sink: LogSink;

  constructor(options: { level?: LogLevel; sink?: LogSink } = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? "info");
    this.sink = options.sink ?? console;
  }

  private formatMessage(context: string, message: string): string {
    return `[${context}] ${message}`;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(context: string, message: string, data?: unknown): void {
    if (!this.enabled("debug")) return;
    this.sink.debug(this.formatMessage(context, message), data !== undefined ? data : "");
  }

  info(context: string, message: string, data?: unknown): void {
    if (!this.enabled("info")) return;
    this.sink.info(this.formatMessage(context, message), data !== undefined ? data : "");
  }

  warn(context: string, message: string, data?: unknown): void {
    if (!this.enabled("warn")) return;
    this.sink.warn(this.formatMessage(context, message), data !== undefined ? data : "");
  }

  /**
   * Log an error message.
   * @param error Optional error object or data.
   */
  error(context: string, message: string, error?: unknown): void {
    if (!this.enabled("error")) return;
    this.sink.error(this.formatMessage(context, message), error !== undefined ? error : "");
  }
}

export const Logger = new LoggerService();
