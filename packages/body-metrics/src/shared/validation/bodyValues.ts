import {
  JOINT_COUNT,
  type Body,
  type Joint,
  type TrackingState,
  type Vector3,
} from "../types/body";
import type { BodyMetricsSnapshot } from "../types/metrics";

const TRACKING_STATE_LOOKUP: Record<TrackingState, true> = {
  NOT_TRACKED: true,
  INFERRED: true,
  TRACKED: true,
};

const LEG_SIDE_LOOKUP = { left: true, right: true } as const;

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

const isNonNegativeInteger = (value: unknown): value is number => {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= 0;
};

export const isVector3 = (value: unknown): value is Vector3 => {
  if (!isRecord(value)) {
    return false;
  }
  return isFiniteNumber(value.x) && isFiniteNumber(value.y) && isFiniteNumber(value.z);
};

export const isTrackingState = (value: unknown): value is TrackingState => {
  return typeof value === "string" && value in TRACKING_STATE_LOOKUP;
};

export const isJoint = (value: unknown): value is Joint => {
  if (!isRecord(value)) {
    return false;
  }

  const { jointType, position, trackingState } = value;

  return (
    isNonNegativeInteger(jointType) &&
    jointType < JOINT_COUNT &&
    isVector3(position) &&
    isTrackingState(trackingState)
  );
};

/**
 * Checks a full body, including that every joint sits at the index of its
 * own joint type.
 */
export const isBody = (value: unknown): value is Body => {
  if (!isRecord(value)) {
    return false;
  }

  const { isTracked, trackingId, joints } = value;

  if (typeof isTracked !== "boolean" || !isFiniteNumber(trackingId)) {
    return false;
  }

  if (!Array.isArray(joints) || joints.length !== JOINT_COUNT) {
    return false;
  }

  return joints.every(
    (joint: unknown, index) => isJoint(joint) && joint.jointType === index,
  );
};

const isSnapshotBody = (value: unknown): boolean => {
  if (value === null) {
    return true;
  }
  if (!isRecord(value)) {
    return false;
  }

  const {
    trackingId,
    height,
    upperHeight,
    leg,
    legTrackedJoints,
    trackedJoints,
    inferredJoints,
  } = value;

  if (
    !isFiniteNumber(trackingId) ||
    !isFiniteNumber(height) ||
    !isFiniteNumber(upperHeight)
  ) {
    return false;
  }

  if (typeof leg !== "string" || !(leg in LEG_SIDE_LOOKUP)) {
    return false;
  }

  if (
    !isRecord(legTrackedJoints) ||
    !isNonNegativeInteger(legTrackedJoints.left) ||
    !isNonNegativeInteger(legTrackedJoints.right)
  ) {
    return false;
  }

  return isNonNegativeInteger(trackedJoints) && isNonNegativeInteger(inferredJoints);
};

export const isBodyMetricsSnapshot = (
  value: unknown,
): value is BodyMetricsSnapshot => {
  if (!isRecord(value)) {
    return false;
  }

  const { frameId, timestamp, trackedBodyCount, body } = value;

  if (!isNonNegativeInteger(frameId) || !isFiniteNumber(timestamp)) {
    return false;
  }

  if (!isNonNegativeInteger(trackedBodyCount)) {
    return false;
  }

  return isSnapshotBody(body);
};
