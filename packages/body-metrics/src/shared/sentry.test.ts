import * as Sentry from "@sentry/node";
import { describe, expect, it, vi } from "vitest";
import { captureException, flushSentry, initSentry } from "./sentry";

vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  setTag: vi.fn(),
  captureException: vi.fn(),
  flush: vi.fn(async () => true),
}));

describe("sentry wiring", () => {
  it("stays uninitialised without a DSN", () => {
    expect(initSentry()).toBe(false);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("does not report exceptions while uninitialised", () => {
    captureException(new Error("frame failed"), { frameId: 1 });

    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  it("resolves a flush immediately while uninitialised", async () => {
    await expect(flushSentry()).resolves.toBe(true);

    expect(Sentry.flush).not.toHaveBeenCalled();
  });
});
