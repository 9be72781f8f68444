/**
 * Checks shared by config parsing and the normalizers. A failed check throws
 * a LicenseValidationError carrying the offending value in its context.
 */

import { LicenseValidationError } from "./errors";

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function invariant(condition: unknown, message: string, context: PlainObject = {}): asserts condition {
  if (!condition) throw new LicenseValidationError(message, context);
}
