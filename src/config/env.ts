/**
 * Helpers reading environment variables with consistent coercion rules:
 * values are trimmed, blanks count as unset and malformed or out-of-range
 * literals fall back to the caller's default.
 */

/** Returns the trimmed value of {@link name}, or `undefined` when unset or blank. */
function readTrimmed(name: string): string | undefined {
  const raw = process.env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface IntOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Returns the integer held by {@link name} when it is a base-10 literal within bounds. */
export function readOptionalInt(name: string, options: IntOptions = {}): number | undefined {
  const literal = readTrimmed(name);
  if (!literal || !/^[-+]?\d+$/.test(literal)) {
    return undefined;
  }

  const value = Number.parseInt(literal, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (options.min !== undefined && value < options.min) {
    return undefined;
  }
  if (options.max !== undefined && value > options.max) {
    return undefined;
  }
  return value;
}

/** Integer variant of {@link readOptionalInt} falling back to {@link defaultValue}. */
export function readInt(name: string, defaultValue: number, options?: IntOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Trimmed string value of {@link name}, `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  return readTrimmed(name);
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and returns the
 * canonical literal from {@link allowed}; anything else yields the default.
 */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const literal = readTrimmed(name)?.toLowerCase();
  if (literal === undefined) {
    return defaultValue;
  }
  return allowed.find((value) => value.toLowerCase() === literal) ?? defaultValue;
}
