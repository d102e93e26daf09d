import { createBody, createUntrackedBody, type JointOverrides } from "../shared/body";
import {
  JOINT_COUNT,
  type Body,
  type BodyFrame,
  type JointType,
  type TrackingState,
} from "../shared/types/body";
import { DEFAULT_BODY_COUNT } from "./static-frame";

// Shapes emitted by the `kinect2` Node binding on "bodyFrame" events.
export interface Kinect2Joint {
  cameraX: number;
  cameraY: number;
  cameraZ: number;
  trackingState: number;
}

export interface Kinect2Body {
  tracked: boolean;
  trackingId?: number;
  joints?: Readonly<Record<number, Kinect2Joint | undefined>>;
}

export interface Kinect2BodyFrame {
  bodies: readonly Kinect2Body[];
  timestamp?: number;
}

const TRACKING_STATES: Record<number, TrackingState> = {
  0: "NOT_TRACKED",
  1: "INFERRED",
  2: "TRACKED",
};

export const toTrackingState = (code: number): TrackingState =>
  TRACKING_STATES[code] ?? "NOT_TRACKED";

const isJointIndex = (index: number): index is JointType =>
  Number.isInteger(index) && index >= 0 && index < JOINT_COUNT;

const isFiniteJoint = (joint: Kinect2Joint): boolean =>
  Number.isFinite(joint.cameraX) &&
  Number.isFinite(joint.cameraY) &&
  Number.isFinite(joint.cameraZ);

/**
 * Converts one binding body into a {@link Body}. Missing joints, and joints
 * without finite coordinates, become `NOT_TRACKED` at the origin.
 */
export const fromKinect2Body = (raw: Kinect2Body): Body => {
  if (!raw.tracked) {
    return createUntrackedBody();
  }

  const joints: JointOverrides = {};
  const rawJoints: Readonly<Record<number, Kinect2Joint | undefined>> =
    raw.joints ?? {};

  for (let index = 0; index < JOINT_COUNT; index += 1) {
    const rawJoint = rawJoints[index];
    if (!isJointIndex(index) || !rawJoint || !isFiniteJoint(rawJoint)) {
      continue;
    }
    joints[index] = {
      position: { x: rawJoint.cameraX, y: rawJoint.cameraY, z: rawJoint.cameraZ },
      trackingState: toTrackingState(rawJoint.trackingState),
    };
  }

  return createBody({
    isTracked: true,
    trackingId: raw.trackingId ?? 0,
    joints,
  });
};

export const fromKinect2BodyFrame = (
  raw: Kinect2BodyFrame,
  bodyCount = DEFAULT_BODY_COUNT,
): BodyFrame => ({
  bodyCount,
  refreshBodies(buffer: Body[]): void {
    for (let index = 0; index < buffer.length; index += 1) {
      const rawBody = raw.bodies[index];
      buffer[index] = rawBody ? fromKinect2Body(rawBody) : createUntrackedBody();
    }
  },
});
