export type RuntimeEnv = Record<string, string | undefined>;

export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  if (typeof value !== "string") {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  if (normalised === "1" || normalised === "true" || normalised === "yes" || normalised === "on") {
    return true;
  }
  if (normalised === "0" || normalised === "false" || normalised === "no" || normalised === "off") {
    return false;
  }
  return defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

/** Parses a numeric string and clamps it into range. Returns null for blank or non-numeric input. */
export const parseNumeric = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const readEnv = (env: RuntimeEnv, ...keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
};

export const resolveEnvironment = (env: RuntimeEnv): string => {
  const explicitEnv = env.WATCHPOST_ENV ?? env.APP_ENV;
  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }
  const nodeEnv = env.NODE_ENV ?? "development";
  return nodeEnv.trim().length > 0 ? nodeEnv : "development";
};
