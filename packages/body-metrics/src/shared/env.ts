// Environment lookups for the BODY_METRICS_* settings and monitoring switches.

export const readEnv = (key: string): string | undefined => {
  const value = process.env[key];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
};

/** `1/true/yes/on` or `0/false/no/off`; anything else is `null`. */
export const parseFlag = (value: string | undefined): boolean | null => {
  switch (value?.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return null;
  }
};

/**
 * A float pulled into `[min, max]`, or `null` when the value is not a number.
 */
export const parseBoundedFloat = (
  value: string | undefined,
  min: number,
  max: number,
): number | null => {
  if (value === undefined) {
    return null;
  }
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return Math.min(max, Math.max(min, parsed));
};

export const parseChoice = <T extends string>(
  value: string | undefined,
  choices: readonly T[],
): T | null => {
  const normalised = value?.toLowerCase();
  return choices.find((choice) => choice === normalised) ?? null;
};
