const DEFAULT_SOURCE = "vocab";

function formatTimestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function formatLogLine(message: string, source: string): string {
  return `${formatTimestamp()} [${source}] ${message}`;
}

export function log(message: string, source: string = DEFAULT_SOURCE): void {
  console.log(formatLogLine(message, source));
}

function normaliseError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }

  if (typeof error === "object") {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

export function logError(error: unknown, source: string = DEFAULT_SOURCE): void {
  console.error(formatLogLine(normaliseError(error), source));
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized === "debug" || normalized === "warn" || normalized === "error"
    ? normalized
    : "info";
}

export interface ScopedLogger {
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>, error?: unknown): void;
  error(event: string, data?: Record<string, unknown>, error?: unknown): void;
  debug(event: string, data?: Record<string, unknown>, error?: unknown): void;
}

export interface ScopedLoggerOptions {
  /** Defaults to `LOG_LEVEL`, then `info`. */
  minLevel?: LogLevel;
}

/** One JSON line per event, tagged with `source`. */
export function createScopedLogger(source: string, options: ScopedLoggerOptions = {}): ScopedLogger {
  const threshold = LEVEL_RANK[options.minLevel ?? parseLogLevel(process.env.LOG_LEVEL)];

  const write = (level: LogLevel, event: string, data?: Record<string, unknown>, error?: unknown) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      source,
      event,
    };
    if (data) {
      payload.data = data;
    }
    if (error !== undefined) {
      payload.error = normaliseError(error);
    }

    WRITERS[level](JSON.stringify(payload));
  };

  return {
    info: (event, data) => write("info", event, data),
    warn: (event, data, error) => write("warn", event, data, error),
    error: (event, data, error) => write("error", event, data, error),
    debug: (event, data, error) => write("debug", event, data, error),
  };
}
