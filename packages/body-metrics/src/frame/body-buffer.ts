import { createUntrackedBody } from "../shared/body";
import { getLogger } from "../shared/logger";
import type { Body, BodyFrame } from "../shared/types/body";

const logger = getLogger("body-buffer");

const allocate = (capacity: number): Body[] =>
  Array.from({ length: capacity }, () => createUntrackedBody());

/**
 * Reusable storage for the bodies of one frame. Create one per sensor session
 * and pass it every frame: the same array is refreshed in place, so its
 * contents are only valid until the next call to {@link BodyBuffer.bodies}.
 * Not safe for overlapping use from concurrent frame pipelines.
 */
export class BodyBuffer {
  private buffer: Body[] | null = null;

  get capacity(): number {
    return this.buffer?.length ?? 0;
  }

  bodies(frame: BodyFrame): readonly Body[] {
    // A source that cannot report its count yields no bodies.
    const capacity = Number.isFinite(frame.bodyCount)
      ? Math.max(0, Math.floor(frame.bodyCount))
      : 0;

    if (this.buffer === null) {
      this.buffer = allocate(capacity);
    } else if (this.buffer.length !== capacity) {
      logger.warn("Frame body count changed, reallocating body buffer", {
        previousCapacity: this.buffer.length,
        capacity,
      });
      this.buffer = allocate(capacity);
    }

    frame.refreshBodies(this.buffer);
    return this.buffer;
  }

  reset(): void {
    this.buffer = null;
  }
}

export const createBodyBuffer = (): BodyBuffer => new BodyBuffer();
