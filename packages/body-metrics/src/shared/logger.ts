/* eslint-disable no-console */
// Console output mirrors the structured entries that are shipped to Better Stack.
import type { Logtail } from "@logtail/node";
import { monitoringConfig } from "./config/monitoring";
import { parseChoice, readEnv } from "./env";

export type LoggerMetadata = Record<string, unknown>;

const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  fatal: (...args) => console.error(...args),
};

const resolveMinimumLevel = (): LogLevel =>
  parseChoice(readEnv("BODY_METRICS_LOG_LEVEL"), LOG_LEVELS) ?? "info";

let minimumLevel: LogLevel = resolveMinimumLevel();

export const setLogLevel = (level: LogLevel): void => {
  minimumLevel = level;
};

export const getLogLevel = (): LogLevel => minimumLevel;

let logtailInstance: Promise<Logtail | null> | null = null;

const loadLogtail = async (): Promise<Logtail | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (!logtailInstance) {
    logtailInstance = import("@logtail/node")
      .then(({ Logtail: LogtailClient }) => {
        return new LogtailClient(monitoringConfig.logtail.token);
      })
      .catch((error: unknown) => {
        console.error("Failed to initialise Better Stack Logtail client", error);
        return null;
      });
  }

  return logtailInstance;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
): Promise<void> => {
  const client = await loadLogtail();
  if (!client) {
    return;
  }

  switch (level) {
    case "debug":
      await client.debug(message, metadata);
      return;
    case "info":
      await client.info(message, metadata);
      return;
    case "warn":
      await client.warn(message, metadata);
      return;
    default:
      await client.error(message, metadata);
  }
};

export const formatConsoleMessage = (
  level: LogLevel,
  message: string,
  timestamp: string,
): string => `[${timestamp}] [${level.toUpperCase()}] ${message}`;

const createEmitter =
  (module: string, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const enrichedMetadata: LoggerMetadata = {
      ...metadata,
      module,
      environment: monitoringConfig.environment,
      timestamp,
      level,
    };

    consoleWriters[level](
      formatConsoleMessage(level, message, timestamp),
      enrichedMetadata,
    );

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch((error: unknown) => {
        console.error("Failed to send log to Better Stack", error);
      });
    }
  };

export const createLogger = (module: string) => {
  const flush = async (): Promise<void> => {
    const client = await loadLogtail();
    await client?.flush();
  };

  return {
    debug: createEmitter(module, "debug"),
    info: createEmitter(module, "info"),
    warn: createEmitter(module, "warn"),
    error: createEmitter(module, "error"),
    fatal: createEmitter(module, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger(module);
  loggerCache.set(module, logger);
  return logger;
};

export const describeError = (error: unknown): LoggerMetadata => {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
};
