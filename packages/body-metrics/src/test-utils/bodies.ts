import { createBody, type JointOverrides } from "../shared/body";
import { JointType, type Body, type TrackingState } from "../shared/types/body";

export const point = (x: number, y: number, z = 0) => ({ x, y, z });

export const UPRIGHT_UPPER_BODY: JointOverrides = {
  [JointType.Head]: { position: point(0, 1.8) },
  [JointType.Neck]: { position: point(0, 1.6) },
  [JointType.SpineShoulder]: { position: point(0, 1.4) },
  [JointType.SpineMid]: { position: point(0, 1.0) },
  [JointType.SpineBase]: { position: point(0, 0.5) },
};

export const leftLeg = (
  trackingState: TrackingState = "TRACKED",
  x = 0,
): JointOverrides => ({
  [JointType.HipLeft]: { position: point(x, 0.5), trackingState },
  [JointType.KneeLeft]: { position: point(x, 0.25), trackingState },
  [JointType.AnkleLeft]: { position: point(x, 0.05), trackingState },
  [JointType.FootLeft]: { position: point(x + 0.1, 0), trackingState },
});

export const rightLeg = (
  trackingState: TrackingState = "TRACKED",
  x = 0,
): JointOverrides => ({
  [JointType.HipRight]: { position: point(x, 0.5), trackingState },
  [JointType.KneeRight]: { position: point(x, 0.25), trackingState },
  [JointType.AnkleRight]: { position: point(x, 0.05), trackingState },
  [JointType.FootRight]: { position: point(x + 0.1, 0), trackingState },
});

/** Hip to foot length of {@link leftLeg} and {@link rightLeg}. */
export const LEG_LENGTH = 0.25 + 0.2 + Math.sqrt(0.1 * 0.1 + 0.05 * 0.05);

/**
 * Upright subject with a fully tracked upper body and left leg; the right
 * leg has no data.
 */
export const createStandingBody = (trackingId = 1): Body =>
  createBody({
    trackingId,
    joints: { ...UPRIGHT_UPPER_BODY, ...leftLeg() },
  });

/** A tracked body standing `depth` meters in front of the sensor. */
export const bodyAtDepth = (depth: number, trackingId: number): Body =>
  createBody({
    trackingId,
    joints: { [JointType.SpineBase]: { position: point(0, 0, depth) } },
  });
