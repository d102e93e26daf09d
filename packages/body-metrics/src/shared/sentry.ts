import * as Sentry from "@sentry/node";
import { monitoringConfig, scrubRecord } from "./config/monitoring";
import { getLogger } from "./logger";

const logger = getLogger("sentry");

let initialised = false;

export const initSentry = (): boolean => {
  if (initialised) {
    return true;
  }

  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Sentry disabled by configuration");
    return false;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
    beforeSend: (event) => {
      event.request = undefined;
      if (event.extra) {
        event.extra = scrubRecord(event.extra);
      }
      return event;
    },
  });
  Sentry.setTag("package", "body-metrics");

  initialised = true;
  return true;
};

export const captureException = (
  error: unknown,
  extra: Record<string, unknown> = {},
): void => {
  if (!initialised) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  Sentry.captureException(normalisedError, { extra: scrubRecord(extra) });
};

/**
 * Waits for queued events to be sent. Resolves `true` when nothing is pending
 * or Sentry was never initialised.
 */
export const flushSentry = async (timeoutMs = 2000): Promise<boolean> => {
  if (!initialised) {
    return true;
  }
  return Sentry.flush(timeoutMs);
};
