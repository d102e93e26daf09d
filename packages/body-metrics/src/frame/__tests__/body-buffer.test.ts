import { afterEach, describe, expect, it, vi } from "vitest";
import { createUntrackedBody } from "../../shared/body";
import type { Body, BodyFrame } from "../../shared/types/body";
import { bodyAtDepth } from "../../test-utils/bodies";
import { BodyBuffer } from "../body-buffer";
import { createStaticBodyFrame } from "../static-frame";

describe("BodyBuffer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("allocates lazily to the frame's body count", () => {
    const buffer = new BodyBuffer();
    expect(buffer.capacity).toBe(0);

    const bodies = buffer.bodies(createStaticBodyFrame([], 6));

    expect(buffer.capacity).toBe(6);
    expect(bodies).toHaveLength(6);
    bodies.forEach((body) => {
      expect(body.isTracked).toBe(false);
    });
  });

  it("reuses the same array and refreshes its contents each frame", () => {
    const buffer = new BodyBuffer();
    const first = bodyAtDepth(2, 1);
    const second = bodyAtDepth(1.5, 2);

    const firstFrame = buffer.bodies(createStaticBodyFrame([first], 6));
    expect(firstFrame[0]).toBe(first);

    const secondFrame = buffer.bodies(createStaticBodyFrame([second], 6));

    expect(secondFrame).toBe(firstFrame);
    expect(firstFrame[0]).toBe(second);
  });

  it("hands the buffer itself to the frame source", () => {
    const buffer = new BodyBuffer();
    const received: Body[][] = [];
    const frame: BodyFrame = {
      bodyCount: 2,
      refreshBodies(target) {
        received.push(target);
        target[1] = bodyAtDepth(1, 7);
      },
    };

    const bodies = buffer.bodies(frame);
    buffer.bodies(frame);

    expect(received).toHaveLength(2);
    expect(received[0]).toBe(bodies);
    expect(received[1]).toBe(bodies);
    expect(bodies[1].trackingId).toBe(7);
  });

  it("reallocates and warns when the body count changes", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const buffer = new BodyBuffer();

    const first = buffer.bodies(createStaticBodyFrame([], 6));
    const second = buffer.bodies(createStaticBodyFrame([], 2));

    expect(second).not.toBe(first);
    expect(buffer.capacity).toBe(2);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][1]).toMatchObject({
      previousCapacity: 6,
      capacity: 2,
    });
  });

  it("treats a non-finite body count as empty without reallocating", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const buffer = new BodyBuffer();

    const first = buffer.bodies(createStaticBodyFrame([], Number.NaN));
    const second = buffer.bodies(createStaticBodyFrame([], Number.NaN));

    expect(first).toHaveLength(0);
    expect(second).toBe(first);
    expect(buffer.capacity).toBe(0);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("propagates frame source failures", () => {
    const buffer = new BodyBuffer();
    const frame: BodyFrame = {
      bodyCount: 6,
      refreshBodies() {
        throw new Error("sensor unavailable");
      },
    };

    expect(() => buffer.bodies(frame)).toThrow("sensor unavailable");
  });

  it("drops the allocation on reset", () => {
    const buffer = new BodyBuffer();
    buffer.bodies(createStaticBodyFrame([createUntrackedBody()], 6));

    buffer.reset();

    expect(buffer.capacity).toBe(0);
  });
});

describe("createStaticBodyFrame", () => {
  it("drops bodies beyond the body count", () => {
    const buffer = new BodyBuffer();
    const bodies = [bodyAtDepth(1, 1), bodyAtDepth(2, 2), bodyAtDepth(3, 3)];

    const result = buffer.bodies(createStaticBodyFrame(bodies, 2));

    expect(result.map((body) => body.trackingId)).toEqual([1, 2]);
  });
});
