import type { Body, Joint } from "../shared/types/body";

/**
 * Joints usable for downstream geometry, in joint-set order. `NOT_TRACKED`
 * joints are always dropped; `INFERRED` joints are kept unless
 * `includeInferred` is false. Returns a new array.
 */
export const trackedJoints = (
  body: Body,
  includeInferred = true,
): Joint[] => {
  const joints: Joint[] = [];

  body.joints.forEach((joint) => {
    switch (joint.trackingState) {
      case "TRACKED":
        joints.push(joint);
        break;
      case "INFERRED":
        if (includeInferred) {
          joints.push(joint);
        }
        break;
      case "NOT_TRACKED":
        break;
      default:
        break;
    }
  });

  return joints;
};

/**
 * Counts joints whose state is exactly `TRACKED`; inferred joints do not count.
 */
export const countTrackedJoints = (joints: Iterable<Joint>): number => {
  let tracked = 0;
  for (const joint of joints) {
    if (joint.trackingState === "TRACKED") {
      tracked += 1;
    }
  }
  return tracked;
};
