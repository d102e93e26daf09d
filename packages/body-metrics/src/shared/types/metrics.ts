import type { LegSide } from "./body";

/** Number of `TRACKED` joints on each leg. */
export type LegTrackingSummary = Record<LegSide, number>;

export type BodyMeasurement = {
  trackingId: number;
  /** Estimated standing height, meters. */
  height: number;
  /** Head to base of spine, meters. */
  upperHeight: number;
  leg: LegSide;
  legTrackedJoints: LegTrackingSummary;
  trackedJoints: number;
  inferredJoints: number;
};

export type BodyMetricsSnapshot = {
  frameId: number;
  timestamp: number;
  trackedBodyCount: number;
  body: BodyMeasurement | null;
};
