import { parseFlag, readEnv } from "../env";

type Environment = string;

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "dsn"];

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const scrubValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }
  if (isRecord(value)) {
    return scrubRecord(value);
  }
  return value;
};

/**
 * Copies `record`, replacing values under sensitive keys with `[redacted]`.
 */
export const scrubRecord = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  Object.entries(record).forEach(([key, nestedValue]) => {
    result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
  });
  return result;
};

const resolveEnvironment = (): Environment => {
  return readEnv("APP_ENV") ?? readEnv("NODE_ENV") ?? "development";
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const resolveMonitoringConfig = (): MonitoringConfig => {
  const environment = resolveEnvironment();
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = readEnv("SENTRY_DSN") ?? "";
  const logtailToken = readEnv("BETTER_STACK_TOKEN") ?? "";

  const parsedSampleRate = Number.parseFloat(
    readEnv("SENTRY_TRACES_SAMPLE_RATE") ?? "0.1",
  );

  return {
    environment,
    release: readEnv("npm_package_version"),
    sentry: {
      dsn: sentryDsn,
      enabled:
        sentryDsn.length > 0 &&
        (isProductionLike ||
          parseFlag(readEnv("ENABLE_SENTRY_IN_DEV")) === true),
      tracesSampleRate: Number.isNaN(parsedSampleRate) ? 0.1 : parsedSampleRate,
    },
    logtail: {
      token: logtailToken,
      enabled:
        logtailToken.length > 0 &&
        (isProductionLike ||
          parseFlag(readEnv("ENABLE_BETTER_STACK_IN_DEV")) === true),
    },
  };
};

export const monitoringConfig: MonitoringConfig = resolveMonitoringConfig();
