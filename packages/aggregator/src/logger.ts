export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, error?: unknown): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel,
  ) {}

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return RANK[level] >= RANK[this.level];
  }

  debug(message: string, meta?: unknown): void {
    if (!this.enabled("debug")) return;
    console.debug(`[${this.prefix}] ${message}`, meta ?? "");
  }

  info(message: string, meta?: unknown): void {
    if (!this.enabled("info")) return;
    console.info(`[${this.prefix}] ${message}`, meta ?? "");
  }

  warn(message: string, meta?: unknown): void {
    if (!this.enabled("warn")) return;
    console.warn(`[${this.prefix}] ${message}`, meta ?? "");
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled("error")) return;
    console.error(`[${this.prefix}] ${message}`, error ?? "");
  }
}

/**
   A console logger whose lines start with `[prefix]`. Messages below
   `level` are dropped.
*/
export function createLogger(prefix: string, level: LogLevel = "info"): Logger {
  return new ConsoleLogger(prefix, level);
}
