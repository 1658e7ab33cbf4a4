/**
 * Tolerant readers for environment variables. Every helper accepts the source
 * record explicitly (defaulting to {@link process.env}) so configuration can
 * be resolved from a fixture in tests without mutating the process.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Shape of the record the readers consult. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value and collapses blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
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

/** Reads a boolean literal ("1"/"true"/"yes"/"on" and their negations). */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return defaultValue;
}

/** Reads a base-10 integer; malformed or out-of-range literals yield the default. */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return defaultValue;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return defaultValue;
  }
  return withinBounds(value, options) ? value : defaultValue;
}

/** Reads a finite floating-point number, falling back to the default otherwise. */
export function readNumber(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const value = Number(normalised);
  return withinBounds(value, options) ? value : defaultValue;
}

/** Returns the trimmed value when set to a non-empty string. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like value, case-insensitively, and returns the canonical
 * spelling from `allowed`. Unknown literals yield the default.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}
