import {
  resolveBodyMetricsConfig,
  type BodyMetricsConfig,
  type BodyMetricsConfigOverrides,
} from "../config/body-metrics-config";
import { trackedJoints } from "../filtering/tracked-joints";
import { BodyBuffer } from "../frame/body-buffer";
import {
  computeHeight,
  computeUpperHeight,
  selectLeg,
  summariseLegTracking,
} from "../metrics/height";
import { countTrackedBodies, selectDefaultBody } from "../selection/default-body";
import { describeError, getLogger } from "../shared/logger";
import { captureException, flushSentry, initSentry } from "../shared/sentry";
import { resolveTimestamp } from "../shared/time";
import type { Body, BodyFrame } from "../shared/types/body";
import type {
  BodyMeasurement,
  BodyMetricsSnapshot,
} from "../shared/types/metrics";

const logger = getLogger("body-frame-processor");

export type BodyFrameProcessorOptions = {
  config?: BodyMetricsConfigOverrides;
  buffer?: BodyBuffer;
};

export const measureBody = (
  body: Body,
  config: BodyMetricsConfig,
): BodyMeasurement => {
  const usable = trackedJoints(body, config.includeInferredJoints);
  const inferredJoints = usable.filter(
    (joint) => joint.trackingState === "INFERRED",
  ).length;

  return {
    trackingId: body.trackingId,
    height: computeHeight(body, config),
    upperHeight: computeUpperHeight(body),
    leg: selectLeg(body, config),
    legTrackedJoints: summariseLegTracking(body),
    trackedJoints: usable.length - inferredJoints,
    inferredJoints,
  };
};

/**
 * Runs one frame through buffer refresh, primary body selection and body
 * measurement. Keep one processor per sensor session.
 */
export class BodyFrameProcessor {
  private readonly buffer: BodyBuffer;

  private readonly config: BodyMetricsConfig;

  private frameCount = 0;

  private activeTrackingId: number | null = null;

  constructor(options: BodyFrameProcessorOptions = {}) {
    this.buffer = options.buffer ?? new BodyBuffer();
    this.config = resolveBodyMetricsConfig(options.config);
    initSentry();
  }

  getConfig(): BodyMetricsConfig {
    return { ...this.config };
  }

  process(frame: BodyFrame, timestamp?: number): BodyMetricsSnapshot {
    const frameId = this.frameCount;
    this.frameCount += 1;

    let bodies: readonly Body[];
    try {
      bodies = this.buffer.bodies(frame);
    } catch (error) {
      logger.error("Failed to refresh bodies from frame", {
        frameId,
        ...describeError(error),
      });
      captureException(error, { frameId, bodyCount: frame.bodyCount });
      throw error;
    }

    const primary = selectDefaultBody(bodies);
    this.trackPresence(primary, frameId);

    return {
      frameId,
      timestamp: resolveTimestamp(timestamp),
      trackedBodyCount: countTrackedBodies(bodies),
      body: primary ? measureBody(primary, this.config) : null,
    };
  }

  /**
   * Sends buffered Better Stack logs and pending Sentry events. Call before
   * the host process exits.
   */
  async flush(timeoutMs = 2000): Promise<void> {
    await logger.flush();
    const drained = await flushSentry(timeoutMs);
    if (!drained) {
      logger.warn("Sentry flush timed out", { timeoutMs });
    }
  }

  reset(): void {
    this.frameCount = 0;
    this.activeTrackingId = null;
    this.buffer.reset();
  }

  private trackPresence(primary: Body | null, frameId: number): void {
    const trackingId = primary ? primary.trackingId : null;
    if (trackingId === this.activeTrackingId) {
      return;
    }

    if (trackingId === null) {
      logger.debug("Primary body lost", {
        frameId,
        previousTrackingId: this.activeTrackingId,
      });
    } else {
      logger.debug("Primary body acquired", {
        frameId,
        trackingId,
        previousTrackingId: this.activeTrackingId,
      });
    }
    this.activeTrackingId = trackingId;
  }
}

export const createBodyFrameProcessor = (
  options?: BodyFrameProcessorOptions,
): BodyFrameProcessor => new BodyFrameProcessor(options);
