import { performance } from "node:perf_hooks";

export const getMonotonicTime = (): number => performance.now();

export const resolveTimestamp = (value?: number): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return getMonotonicTime();
};
