/**
 * Structured console logger.
 * Emits JSON lines in production and readable lines everywhere else.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const IS_PRODUCTION = process.env.NODE_ENV === "production";

function resolveThreshold(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return IS_PRODUCTION ? "info" : "debug";
}

const threshold = resolveThreshold();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatLog(level: LogLevel, message: string, meta?: LogMeta): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }

  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
}

/**
 * Extract a loggable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "unknown";
}

export const logger = {
  debug(message: string, meta?: LogMeta): void {
    if (enabled("debug")) {
      console.debug(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: LogMeta): void {
    if (enabled("info")) {
      console.log(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: LogMeta): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(message: string, meta?: LogMeta): void {
    console.error(formatLog("error", message, meta));
  },
};
