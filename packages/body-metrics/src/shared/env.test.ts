import { afterEach, describe, expect, it } from "vitest";
import { parseBoundedFloat, parseChoice, parseFlag, readEnv } from "./env";

describe("env helpers", () => {
  afterEach(() => {
    delete process.env.BODY_METRICS_TEST_VAR;
  });

  it("reads trimmed values and treats blank ones as unset", () => {
    expect(readEnv("BODY_METRICS_TEST_VAR")).toBeUndefined();

    process.env.BODY_METRICS_TEST_VAR = "  left ";
    expect(readEnv("BODY_METRICS_TEST_VAR")).toBe("left");

    process.env.BODY_METRICS_TEST_VAR = "   ";
    expect(readEnv("BODY_METRICS_TEST_VAR")).toBeUndefined();
  });

  it("parses flags", () => {
    expect(parseFlag("Yes")).toBe(true);
    expect(parseFlag("off")).toBe(false);
    expect(parseFlag("maybe")).toBeNull();
    expect(parseFlag(undefined)).toBeNull();
  });

  it("bounds floats and rejects non-numbers", () => {
    expect(parseBoundedFloat("0.25", 0, 0.5)).toBe(0.25);
    expect(parseBoundedFloat("2", 0, 0.5)).toBe(0.5);
    expect(parseBoundedFloat("-1", 0, 0.5)).toBe(0);
    expect(parseBoundedFloat("abc", 0, 0.5)).toBeNull();
    expect(parseBoundedFloat(undefined, 0, 0.5)).toBeNull();
  });

  it("matches choices case-insensitively", () => {
    expect(parseChoice("LEFT", ["left", "right"] as const)).toBe("left");
    expect(parseChoice("up", ["left", "right"] as const)).toBeNull();
    expect(parseChoice(undefined, ["left", "right"] as const)).toBeNull();
  });
});
