/**
 * Tolerant environment readers. Absent, blank or unparsable values fall back
 * to the caller's default instead of failing, so a stray export never stops
 * the CLI. Every reader takes the environment explicitly (defaulting to
 * `process.env`) so tests can pass a plain record.
 */
export type Env = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Rejects `NaN`, `Infinity` and anything outside the bounds. */
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

/** `1/true/yes/on` and `0/false/no/off`, case-insensitive; anything else is the default. */
export function readBool(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

export function readOptionalBool(name: string, env: Env = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  return FALSE_LITERALS.has(normalised) ? false : undefined;
}

/** Base-10 integer within the optional bounds, otherwise the default. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions, env: Env = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

export function readOptionalInt(name: string, options?: NumberOptions, env: Env = process.env): number | undefined {
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

/** Trimmed value, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: Env = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/** Case-insensitive match against `allowed`, returned in its canonical spelling. */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: Env = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return undefined;
  }
  return allowed.find((value) => value.toLowerCase() === normalised);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
