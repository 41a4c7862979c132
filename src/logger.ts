type LogLevel = "debug" | "info" | "warn" | "error";

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

export class Logger {
  private prefix: string;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || "[WATCH]";
    this.enabled = options.enabled ?? process.env.NODE_ENV !== "test";
  }

  private format(level: LogLevel, message: string): string {
    return `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.enabled && process.env.LOG_LEVEL === "debug") {
      console.debug(this.format("debug", message));
    }
  }

  info(message: string): void {
    if (this.enabled) {
      console.log(this.format("info", message));
    }
  }

  // warn and error go to stderr so scheduler logs pick them up
  warn(message: string): void {
    if (this.enabled) {
      console.warn(this.format("warn", message));
    }
  }

  error(message: string, err?: unknown): void {
    if (!this.enabled) return;
    if (err instanceof Error && err.stack && process.env.LOG_LEVEL === "debug") {
      console.error(this.format("error", message), err.stack);
    } else {
      console.error(this.format("error", message));
    }
  }
}

export function createLogger(prefix: string, enabled?: boolean): Logger {
  return new Logger({ prefix, enabled });
}

export const logger = createLogger("[WATCH]");
