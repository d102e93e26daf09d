import type { Vector3 } from "../types/body";

export const vectorLength = (point: Vector3): number => {
  return Math.sqrt(point.x * point.x + point.y * point.y + point.z * point.z);
};

export const distance = (a: Vector3, b: Vector3): number => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
};

/**
 * Sum of the distances between consecutive points, in the order given.
 */
export const chainLength = (points: readonly Vector3[]): number => {
  if (points.length < 2) {
    throw new RangeError(
      `Chain length requires at least two points, received ${points.length}`,
    );
  }

  let length = 0;
  for (let index = 1; index < points.length; index += 1) {
    length += distance(points[index - 1], points[index]);
  }
  return length;
};
