import { afterEach, describe, expect, it, vi } from "vitest";
import { createBody, createUntrackedBody } from "../../shared/body";
import { JointType, type BodyFrame } from "../../shared/types/body";
import { isBodyMetricsSnapshot } from "../../shared/validation/bodyValues";
import { createStaticBodyFrame } from "../../frame/static-frame";
import { BodyBuffer } from "../../frame/body-buffer";
import {
  LEG_LENGTH,
  UPRIGHT_UPPER_BODY,
  bodyAtDepth,
  leftLeg,
} from "../../test-utils/bodies";
import { BodyFrameProcessor, measureBody } from "../body-frame-processor";

const subject = createBody({
  trackingId: 42,
  joints: {
    ...UPRIGHT_UPPER_BODY,
    ...leftLeg(),
    [JointType.ShoulderLeft]: {
      position: { x: -0.2, y: 1.4, z: 0 },
      trackingState: "INFERRED",
    },
  },
});

describe("BodyFrameProcessor", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("measures the primary body of a frame", () => {
    const processor = new BodyFrameProcessor({
      config: { headDivergence: 0.1, tieBreakLeg: "right", includeInferredJoints: true },
    });
    const frame = createStaticBodyFrame([createUntrackedBody(), subject]);

    const snapshot = processor.process(frame, 1000);

    expect(snapshot.frameId).toBe(0);
    expect(snapshot.timestamp).toBe(1000);
    expect(snapshot.trackedBodyCount).toBe(1);
    expect(snapshot.body).not.toBeNull();
    expect(snapshot.body?.trackingId).toBe(42);
    expect(snapshot.body?.upperHeight).toBeCloseTo(1.3, 10);
    expect(snapshot.body?.height).toBeCloseTo(1.3 + LEG_LENGTH + 0.1, 10);
    expect(snapshot.body?.leg).toBe("left");
    expect(snapshot.body?.legTrackedJoints).toEqual({ left: 4, right: 0 });
    expect(snapshot.body?.trackedJoints).toBe(9);
    expect(snapshot.body?.inferredJoints).toBe(1);
    expect(isBodyMetricsSnapshot(snapshot)).toBe(true);
  });

  it("reports no body for frames without a tracked subject", () => {
    const processor = new BodyFrameProcessor();

    const snapshot = processor.process(createStaticBodyFrame([]), 5);

    expect(snapshot).toEqual({
      frameId: 0,
      timestamp: 5,
      trackedBodyCount: 0,
      body: null,
    });
  });

  it("selects the closest of several subjects", () => {
    const processor = new BodyFrameProcessor();
    const frame = createStaticBodyFrame([
      bodyAtDepth(3, 1),
      bodyAtDepth(1.2, 2),
      bodyAtDepth(2.5, 3),
    ]);

    const snapshot = processor.process(frame);

    expect(snapshot.trackedBodyCount).toBe(3);
    expect(snapshot.body?.trackingId).toBe(2);
  });

  it("counts frames and restarts after reset", () => {
    const buffer = new BodyBuffer();
    const processor = new BodyFrameProcessor({ buffer });
    const frame = createStaticBodyFrame([subject]);

    expect(processor.process(frame).frameId).toBe(0);
    expect(processor.process(frame).frameId).toBe(1);

    processor.reset();

    expect(buffer.capacity).toBe(0);
    expect(processor.process(frame).frameId).toBe(0);
  });

  it("leaves inferred joints out when configured to", () => {
    const processor = new BodyFrameProcessor({
      config: { includeInferredJoints: false },
    });

    const snapshot = processor.process(createStaticBodyFrame([subject]), 0);

    expect(snapshot.body?.trackedJoints).toBe(9);
    expect(snapshot.body?.inferredJoints).toBe(0);
    expect(processor.getConfig().includeInferredJoints).toBe(false);
  });

  it("logs and rethrows frame source failures", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const processor = new BodyFrameProcessor();
    const failure = new Error("body stream closed");
    const frame: BodyFrame = {
      bodyCount: 6,
      refreshBodies() {
        throw failure;
      },
    };

    expect(() => processor.process(frame)).toThrow(failure);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(
      /\[ERROR\] Failed to refresh bodies from frame$/,
    );
  });
});

describe("measureBody", () => {
  it("uses the configured tie-break leg", () => {
    const body = createBody({ joints: UPRIGHT_UPPER_BODY });

    const measurement = measureBody(body, {
      headDivergence: 0.1,
      tieBreakLeg: "left",
      includeInferredJoints: true,
    });

    expect(measurement.leg).toBe("left");
    expect(measurement.height).toBeCloseTo(1.4, 10);
  });
});
