import { getPosition } from "../shared/body";
import { vectorLength } from "../shared/math/vector";
import { JointType, type Body } from "../shared/types/body";

/**
 * Distance of a body from the sensor origin, measured at the base of the spine.
 */
export const distanceFromSensor = (body: Body): number =>
  vectorLength(getPosition(body, JointType.SpineBase));

/**
 * Returns the tracked body closest to the sensor, or `null` when no body is
 * tracked. Bodies at equal distance resolve to the first one encountered.
 */
export const selectDefaultBody = (bodies: Iterable<Body>): Body | null => {
  let result: Body | null = null;
  let closestDistance = Number.POSITIVE_INFINITY;

  for (const body of bodies) {
    if (!body.isTracked) {
      continue;
    }

    const distance = distanceFromSensor(body);
    if (result === null || distance < closestDistance) {
      result = body;
      closestDistance = distance;
    }
  }

  return result;
};

export const countTrackedBodies = (bodies: Iterable<Body>): number => {
  let count = 0;
  for (const body of bodies) {
    if (body.isTracked) {
      count += 1;
    }
  }
  return count;
};
