export type Vector3 = {
  x: number;
  y: number;
  z: number;
};

export type TrackingState = "NOT_TRACKED" | "INFERRED" | "TRACKED";

// Joint indices as reported by the Kinect v2 body tracker.
export const JointType = {
  SpineBase: 0,
  SpineMid: 1,
  Neck: 2,
  Head: 3,
  ShoulderLeft: 4,
  ElbowLeft: 5,
  WristLeft: 6,
  HandLeft: 7,
  ShoulderRight: 8,
  ElbowRight: 9,
  WristRight: 10,
  HandRight: 11,
  HipLeft: 12,
  KneeLeft: 13,
  AnkleLeft: 14,
  FootLeft: 15,
  HipRight: 16,
  KneeRight: 17,
  AnkleRight: 18,
  FootRight: 19,
  SpineShoulder: 20,
  HandTipLeft: 21,
  ThumbLeft: 22,
  HandTipRight: 23,
  ThumbRight: 24,
} as const;

export type JointType = (typeof JointType)[keyof typeof JointType];

export const JOINT_COUNT = 25;

export type Joint = {
  jointType: JointType;
  position: Vector3;
  trackingState: TrackingState;
};

/**
 * Joints of one body indexed by {@link JointType}. Always holds
 * {@link JOINT_COUNT} entries; joints without data are `NOT_TRACKED`.
 */
export type JointSet = readonly Joint[];

export type Body = {
  isTracked: boolean;
  trackingId: number;
  joints: JointSet;
};

export type LegSide = "left" | "right";

/**
 * One sensor snapshot. `refreshBodies` overwrites the slots of the supplied
 * buffer with the bodies of the current frame.
 */
export interface BodyFrame {
  readonly bodyCount: number;
  refreshBodies(buffer: Body[]): void;
}
