/**
 * Helpers reading environment variables with predictable coercion rules. Each
 * reader accepts an explicit {@link EnvSource} so settings can be assembled from
 * a snapshot (tests, `.env` overlays) instead of the ambient process state.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Key/value view over environment variables. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value and maps blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads {@link name} as a boolean. Accepts "1", "true", "yes", "on" and their
 * negative counterparts case-insensitively; anything else yields the default.
 */
export function readBool(source: EnvSource, name: string, defaultValue: boolean): boolean {
  return readOptionalBool(source, name) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(source: EnvSource, name: string): boolean | undefined {
  const normalised = normaliseEnvValue(source[name]);
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

/** Reads {@link name} as a base-10 integer, falling back to the default when invalid. */
export function readInt(source: EnvSource, name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(source, name, options) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(source: EnvSource, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(source[name]);
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

/**
 * Reads a textual variable while trimming surrounding whitespace. Blank values
 * count as unset.
 */
export function readString(source: EnvSource, name: string, defaultValue: string): string {
  return readOptionalString(source, name) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(source: EnvSource, name: string): string | undefined {
  return normaliseEnvValue(source[name]);
}

/**
 * Splits a comma-separated variable into trimmed, non-empty, de-duplicated
 * entries. Order of first appearance is preserved.
 */
export function readList(source: EnvSource, name: string): string[] {
  const normalised = normaliseEnvValue(source[name]);
  if (!normalised) {
    return [];
  }
  const entries = normalised
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(entries));
}

/**
 * Reads an enum-like variable, returning the canonical literal from
 * {@link allowed}. Comparison ignores case; unknown values yield the default.
 */
export function readEnum<T extends string>(
  source: EnvSource,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const normalised = normaliseEnvValue(source[name]);
  if (!normalised) {
    return defaultValue;
  }
  const match = allowed.find((value) => value.toLowerCase() === normalised.toLowerCase());
  return match ?? defaultValue;
}
