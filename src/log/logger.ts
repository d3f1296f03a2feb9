import { pino, stdSerializers, stdTimeFunctions, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const loggers = new Map<string, Logger>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.ICU_FORMAT_LOG_LEVEL;
  return raw !== undefined && isLogLevel(raw) ? raw : "info";
}

function loggerOptions(name: string, level: LogLevel): LoggerOptions {
  return {
    name,
    level,
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ levelLabel: label.toUpperCase() }),
    },
    serializers: {
      err: stdSerializers.err,
    },
  };
}

/**
 * Named logger, one instance per (name, level). Level falls back to
 * ICU_FORMAT_LOG_LEVEL, then "info".
 */
export function createLogger(name: string, level: LogLevel = levelFromEnv()): Logger {
  const key = `${name}:${level}`;
  const existing = loggers.get(key);
  if (existing) return existing;

  const logger = pino(loggerOptions(name, level));
  loggers.set(key, logger);
  return logger;
}
