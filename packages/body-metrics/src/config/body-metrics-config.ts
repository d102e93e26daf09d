import { parseBoundedFloat, parseChoice, parseFlag, readEnv } from "../shared/env";
import { getLogger } from "../shared/logger";
import type { LegSide } from "../shared/types/body";

export type BodyMetricsConfig = {
  /**
   * Distance between the head joint (skull centre) and the top of the head,
   * in meters. Added to every height estimate.
   */
  headDivergence: number;
  /**
   * Leg measured when both legs have the same number of tracked joints.
   * Right by default; not yet validated against anatomical data.
   */
  tieBreakLeg: LegSide;
  /**
   * Whether `INFERRED` joints count as usable in processor snapshots.
   */
  includeInferredJoints: boolean;
};

export type BodyMetricsConfigOverrides = Partial<BodyMetricsConfig>;

export const DEFAULT_BODY_METRICS_CONFIG: Readonly<BodyMetricsConfig> =
  Object.freeze<BodyMetricsConfig>({
    headDivergence: 0.1,
    tieBreakLeg: "right",
    includeInferredJoints: true,
  });

const LEG_SIDES = ["left", "right"] as const;
const MAX_HEAD_DIVERGENCE = 0.5;

const logger = getLogger("body-metrics-config");

export const resolveBodyMetricsEnvOverrides = (): BodyMetricsConfigOverrides => {
  const overrides: BodyMetricsConfigOverrides = {};

  const headDivergence = parseBoundedFloat(
    readEnv("BODY_METRICS_HEAD_DIVERGENCE"),
    0,
    MAX_HEAD_DIVERGENCE,
  );
  if (headDivergence !== null) {
    overrides.headDivergence = headDivergence;
  }

  const tieBreakLeg = parseChoice(
    readEnv("BODY_METRICS_TIE_BREAK_LEG"),
    LEG_SIDES,
  );
  if (tieBreakLeg !== null) {
    overrides.tieBreakLeg = tieBreakLeg;
  }

  const includeInferred = parseFlag(readEnv("BODY_METRICS_INCLUDE_INFERRED"));
  if (includeInferred !== null) {
    overrides.includeInferredJoints = includeInferred;
  }

  return overrides;
};

/**
 * Defaults, then environment overrides, then the explicit overrides passed in.
 * A head divergence other than the default shifts every height, so it is
 * logged when resolved.
 */
export const resolveBodyMetricsConfig = (
  overrides: BodyMetricsConfigOverrides = {},
): BodyMetricsConfig => {
  const config: BodyMetricsConfig = {
    ...DEFAULT_BODY_METRICS_CONFIG,
    ...resolveBodyMetricsEnvOverrides(),
    ...overrides,
  };

  if (config.headDivergence !== DEFAULT_BODY_METRICS_CONFIG.headDivergence) {
    logger.info("Head divergence differs from default", {
      headDivergence: config.headDivergence,
      defaultHeadDivergence: DEFAULT_BODY_METRICS_CONFIG.headDivergence,
    });
  }

  return config;
};
