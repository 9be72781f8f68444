import { invariant } from "./guards";

// Config values arrive either from typed setters or from imported JSON, so
// every helper takes `unknown` and names the offending key in its error.

export function normalizeBooleanFlag(value: unknown, context: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  invariant(typeof value === "boolean", `${context} must be a boolean`, { received: value });
  return value;
}

/** Whole number of at least `min`; fractions are floored, smaller values raised to `min`. */
export function normalizeCount(value: unknown, context: string, min = 1): number {
  invariant(typeof value === "number" && Number.isFinite(value), `${context} must be a finite number`, {
    received: value,
  });
  return Math.max(min, Math.floor(value));
}

/** `false` disables wrapping; a number is a column. */
export function normalizeWordwrap(value: unknown, context: string): number | false {
  if (value === false) return false;
  return normalizeCount(value, context);
}

/** Trimmed graph IRI; null or undefined select the default graph. */
export function normalizeGraphName(value: unknown, context: string): string | null {
  if (value === undefined || value === null) return null;
  invariant(typeof value === "string", `${context} must be a string`, { received: value });
  const trimmed = value.trim();
  invariant(trimmed.length > 0, `${context} must not be empty`, { received: value });
  return trimmed;
}
