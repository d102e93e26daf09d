import {
  JOINT_COUNT,
  type Body,
  type Joint,
  type JointType,
  type TrackingState,
  type Vector3,
} from "./types/body";

export const ORIGIN: Vector3 = { x: 0, y: 0, z: 0 };

const isJointType = (value: number): value is JointType => {
  return Number.isInteger(value) && value >= 0 && value < JOINT_COUNT;
};

export const createJoint = (
  jointType: JointType,
  position: Vector3 = ORIGIN,
  trackingState: TrackingState = "NOT_TRACKED",
): Joint => ({
  jointType,
  position: { x: position.x, y: position.y, z: position.z },
  trackingState,
});

export type JointOverrides = Partial<
  Record<JointType, { position: Vector3; trackingState?: TrackingState }>
>;

export type CreateBodyOptions = {
  isTracked?: boolean;
  trackingId?: number;
  joints?: JointOverrides;
};

/**
 * Builds a body with a complete joint set. Joints not listed in
 * `options.joints` are `NOT_TRACKED` at the origin; listed joints default to
 * `TRACKED`.
 */
export const createBody = (options: CreateBodyOptions = {}): Body => {
  const overrides = options.joints ?? {};
  const joints: Joint[] = [];

  for (let index = 0; index < JOINT_COUNT; index += 1) {
    if (!isJointType(index)) {
      continue;
    }
    const override = overrides[index];
    joints.push(
      override
        ? createJoint(
            index,
            override.position,
            override.trackingState ?? "TRACKED",
          )
        : createJoint(index),
    );
  }

  return {
    isTracked: options.isTracked ?? true,
    trackingId: options.trackingId ?? 0,
    joints,
  };
};

export const createUntrackedBody = (): Body =>
  createBody({ isTracked: false, trackingId: 0 });

export const getJoint = (body: Body, jointType: JointType): Joint => {
  const joint = body.joints[jointType];
  if (joint) {
    return joint;
  }
  return createJoint(jointType);
};

export const getPosition = (body: Body, jointType: JointType): Vector3 =>
  getJoint(body, jointType).position;
