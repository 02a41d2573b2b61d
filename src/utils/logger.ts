type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

function thresholdFromEnv(): number {
  const level = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return LEVEL_RANK[level];
  }
  return LEVEL_RANK.info;
}

/**
 * Prefixed console logger. Everything goes to stderr so that stdout stays free
 * for command output.
 */
class DriftLogger {
  private readonly prefix: string;
  private readonly enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix ?? "[Drift]";
    this.enabled = options.enabled ?? process.env.NODE_ENV !== "test";
  }

  private write(level: LogLevel, message: string, extra?: string): void {
    if (!this.enabled || LEVEL_RANK[level] < thresholdFromEnv()) return;
    const line = `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}`;
    console.error(extra ? `${line} ${extra}` : line);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: Error): void {
    this.write("error", message, error?.stack);
  }
}

export function createLogger(prefix: string): DriftLogger {
  return new DriftLogger({ prefix });
}

export type { DriftLogger };
