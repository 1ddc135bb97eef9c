/* eslint-disable no-console */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";

const COLORS = [
  "\x1b[31m", // Red
  "\x1b[32m", // Green
  "\x1b[33m", // Yellow
  "\x1b[34m", // Blue
  "\x1b[35m", // Magenta
  "\x1b[36m", // Cyan
  "\x1b[91m", // Bright Red
  "\x1b[92m", // Bright Green
  "\x1b[93m", // Bright Yellow
  "\x1b[94m", // Bright Blue
  "\x1b[95m", // Bright Magenta
  "\x1b[96m", // Bright Cyan
];

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function simpleHash(str: string): number {
  let hash = 0;
  if (str.length === 0) {
    return hash;
  }
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash |= 0; // Convert to 32bit integer
  }
  return Math.abs(hash);
}

const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /secret/i,
  /password/i,
  /authorization/i,
  /cookie/i,
  /api[_-]?key/i,
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function maskValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(() => "[redacted]");
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.keys(value).map((key) => [key, "[redacted]"]));
  }
  return "[redacted]";
}

export function sanitizeLogData(data: unknown): unknown {
  if (data === undefined || data === null) {
    return data;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLogData(item));
  }

  if (!isRecord(data)) {
    return data;
  }

  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => {
      const normalizedKey = key.toLowerCase();
      if (normalizedKey === "env" || normalizedKey === "environment") {
        return [key, maskValue(value)];
      }
      if (SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(normalizedKey))) {
        return [key, maskValue(value)];
      }
      return [key, sanitizeLogData(value)];
    }),
  );
}

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
}

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

function write(styledPrefix: string, message: string, data?: LogData) {
  if (data !== undefined) {
    console.log(`${styledPrefix} ${message}`, sanitizeLogData(data));
  } else {
    console.log(`${styledPrefix} ${message}`);
  }
}

export function createLogger(level: LogLevel, prefix: string): Logger {
  const hash = simpleHash(prefix);
  const color = COLORS[hash % COLORS.length];

  const isProduction = process.env.NODE_ENV === "production";

  // Use plain prefix in production, styled prefix otherwise
  const styledPrefix = isProduction
    ? `[${prefix}]`
    : `${BOLD}${color}[${prefix}]${RESET}`;

  // LOG_LEVEL overrides the level the logger was created with
  const threshold = LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL, level)];

  // In production, only allow warn and error logs
  const enabled = (messageLevel: LogLevel) =>
    LEVEL_ORDER[messageLevel] >= threshold &&
    (!isProduction || LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[LogLevel.WARN]);

  return {
    debug: (message, data) => {
      if (enabled(LogLevel.DEBUG)) write(styledPrefix, message, data);
    },
    info: (message, data) => {
      if (enabled(LogLevel.INFO)) write(styledPrefix, message, data);
    },
    warn: (message, data) => {
      if (enabled(LogLevel.WARN)) write(styledPrefix, message, data);
    },
    error: (message, data) => {
      if (enabled(LogLevel.ERROR)) write(styledPrefix, message, data);
    },
  };
}
