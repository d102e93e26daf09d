import { createUntrackedBody } from "../shared/body";
import type { Body, BodyFrame } from "../shared/types/body";

export const DEFAULT_BODY_COUNT = 6;

/**
 * A frame that replays a fixed list of bodies, e.g. from a recording.
 * Slots past the end of the list are filled with untracked placeholders and
 * bodies beyond `bodyCount` are dropped.
 */
export const createStaticBodyFrame = (
  bodies: readonly Body[],
  bodyCount = DEFAULT_BODY_COUNT,
): BodyFrame => ({
  bodyCount,
  refreshBodies(buffer: Body[]): void {
    for (let index = 0; index < buffer.length; index += 1) {
      buffer[index] = bodies[index] ?? createUntrackedBody();
    }
  },
});
