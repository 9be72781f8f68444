import type { PlainObject } from "./guards";

/**
 * Raised when graph content or configuration violates a value contract,
 * e.g. an OSI-approved literal outside {"true","false","1","0"}.
 * Store failures are never wrapped in this type; they propagate as thrown.
 */
export class LicenseValidationError extends Error {
  readonly context: PlainObject;

  constructor(message: string, context: PlainObject = {}) {
    super(message);
    this.name = "LicenseValidationError";
    this.context = context;
  }
}

export function isLicenseValidationError(value: unknown): value is LicenseValidationError {
  return value instanceof LicenseValidationError;
}
