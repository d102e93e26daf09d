export * from "./shared/types/body";
export {
  ORIGIN,
  createBody,
  createJoint,
  createUntrackedBody,
  getJoint,
  getPosition,
  type CreateBodyOptions,
  type JointOverrides,
} from "./shared/body";
export { chainLength, distance, vectorLength } from "./shared/math/vector";
export { getLogger, setLogLevel, type Logger, type LogLevel } from "./shared/logger";
export {
  isBody,
  isBodyMetricsSnapshot,
  isJoint,
  isTrackingState,
  isVector3,
} from "./shared/validation/bodyValues";

export {
  DEFAULT_BODY_METRICS_CONFIG,
  resolveBodyMetricsConfig,
  type BodyMetricsConfig,
  type BodyMetricsConfigOverrides,
} from "./config/body-metrics-config";

export { BodyBuffer, createBodyBuffer } from "./frame/body-buffer";
export { DEFAULT_BODY_COUNT, createStaticBodyFrame } from "./frame/static-frame";
export {
  fromKinect2Body,
  fromKinect2BodyFrame,
  toTrackingState,
  type Kinect2Body,
  type Kinect2BodyFrame,
  type Kinect2Joint,
} from "./frame/kinect2-frame";

export {
  countTrackedBodies,
  distanceFromSensor,
  selectDefaultBody,
} from "./selection/default-body";
export {
  LEG_CHAINS,
  UPPER_BODY_CHAIN,
  computeHeight,
  computeLegLength,
  computeUpperHeight,
  legJoints,
  selectLeg,
  summariseLegTracking,
} from "./metrics/height";
export { countTrackedJoints, trackedJoints } from "./filtering/tracked-joints";

export {
  BodyFrameProcessor,
  createBodyFrameProcessor,
  measureBody,
  type BodyFrameProcessorOptions,
} from "./processing/body-frame-processor";
export type {
  BodyMeasurement,
  BodyMetricsSnapshot,
  LegTrackingSummary,
} from "./shared/types/metrics";
