import {
  DEFAULT_BODY_METRICS_CONFIG,
  type BodyMetricsConfig,
} from "../config/body-metrics-config";
import { countTrackedJoints } from "../filtering/tracked-joints";
import { getJoint, getPosition } from "../shared/body";
import { chainLength } from "../shared/math/vector";
import type { LegTrackingSummary } from "../shared/types/metrics";
import {
  JointType,
  type Body,
  type Joint,
  type LegSide,
} from "../shared/types/body";

export const UPPER_BODY_CHAIN = [
  JointType.Head,
  JointType.Neck,
  JointType.SpineShoulder,
  JointType.SpineMid,
  JointType.SpineBase,
] as const;

export const LEG_CHAINS: Readonly<Record<LegSide, readonly JointType[]>> = {
  left: [
    JointType.HipLeft,
    JointType.KneeLeft,
    JointType.AnkleLeft,
    JointType.FootLeft,
  ],
  right: [
    JointType.HipRight,
    JointType.KneeRight,
    JointType.AnkleRight,
    JointType.FootRight,
  ],
};

const measureChain = (body: Body, chain: readonly JointType[]): number =>
  chainLength(chain.map((jointType) => getPosition(body, jointType)));

export const legJoints = (body: Body, side: LegSide): Joint[] =>
  LEG_CHAINS[side].map((jointType) => getJoint(body, jointType));

export const summariseLegTracking = (body: Body): LegTrackingSummary => ({
  left: countTrackedJoints(legJoints(body, "left")),
  right: countTrackedJoints(legJoints(body, "right")),
});

/**
 * The leg with more fully tracked joints; `config.tieBreakLeg` on a tie.
 */
export const selectLeg = (
  body: Body,
  config: Pick<BodyMetricsConfig, "tieBreakLeg"> = DEFAULT_BODY_METRICS_CONFIG,
): LegSide => {
  const { left, right } = summariseLegTracking(body);
  if (left > right) {
    return "left";
  }
  if (right > left) {
    return "right";
  }
  return config.tieBreakLeg;
};

/** Hip to foot, through knee and ankle. */
export const computeLegLength = (body: Body, side: LegSide): number =>
  measureChain(body, LEG_CHAINS[side]);

/** Head to base of spine. */
export const computeUpperHeight = (body: Body): number =>
  measureChain(body, UPPER_BODY_CHAIN);

/**
 * Estimated standing height in meters: the upper-body chain, plus the leg
 * that is tracked best, plus the head divergence. The head joint sits at the
 * centre of the skull, so the divergence accounts for the rest of the head.
 */
export const computeHeight = (
  body: Body,
  config: Pick<
    BodyMetricsConfig,
    "headDivergence" | "tieBreakLeg"
  > = DEFAULT_BODY_METRICS_CONFIG,
): number => {
  const leg = selectLeg(body, config);
  return (
    computeUpperHeight(body) + computeLegLength(body, leg) + config.headDivergence
  );
};
