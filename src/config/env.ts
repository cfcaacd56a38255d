import type { ProcessEnv } from "../nodePrimitives.js";

/**
 * Readers turning raw environment variables into typed settings. Every reader
 * takes the environment map explicitly so tests can pass a literal object
 * instead of mutating {@link process.env}. Invalid literals fall back to the
 * supplied default; the settings schema then validates the assembled object.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Returns the trimmed value, or `undefined` when unset or blank. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Reads a boolean flag ("1/true/yes/on", "0/false/no/off"). */
export function readBool(env: ProcessEnv, name: string, defaultValue: boolean): boolean {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return defaultValue;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // NaN and Infinity never reach the settings object.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns the base-10 integer held by {@link name}, if valid. */
export function readOptionalInt(env: ProcessEnv, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(env: ProcessEnv, name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(env, name, options) ?? defaultValue;
}

/** Returns the finite floating-point number held by {@link name}, if valid. */
export function readOptionalNumber(env: ProcessEnv, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseFloat(normalised);
  return withinBounds(value, options) ? value : undefined;
}

export function readNumber(env: ProcessEnv, name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalNumber(env, name, options) ?? defaultValue;
}

/** Returns the trimmed string held by {@link name}, treating blanks as unset. */
export function readOptionalString(env: ProcessEnv, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(env: ProcessEnv, name: string, defaultValue: string): string {
  return readOptionalString(env, name) ?? defaultValue;
}

/**
 * Reads an enum-like literal case-insensitively and returns the canonical
 * spelling from {@link allowed}.
 */
export function readEnum<T extends string>(
  env: ProcessEnv,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  return allowed.find((value) => value.toLowerCase() === normalised) ?? defaultValue;
}
