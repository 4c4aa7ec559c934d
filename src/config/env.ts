/**
 * Shared helpers reading environment variables with consistent coercion rules.
 * Every reader treats blank values as unset and falls back to the supplied
 * default when a literal cannot be interpreted.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

type Environment = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: Environment = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean, env: Environment = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
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

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: Environment = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: Environment = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(name: string, env: Environment = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: Environment = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Environment = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
