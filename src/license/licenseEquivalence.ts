import { isLicenseTextEquivalent } from "../utils/licenseText";
import type { License } from "./license";

export type TextEquivalence = (a: string | null, b: string | null) => boolean;

/**
 * Semantic equivalence: only the body texts are compared. Id, name, header,
 * template, OSI flag and comment play no part, so two differently named
 * licenses with the same text are equivalent.
 */
export function semanticallyEquivalent(
  a: License,
  b: License,
  compare: TextEquivalence = isLicenseTextEquivalent,
): boolean {
  return compare(a.bodyText, b.bodyText);
}

/** Identity: same license id, whatever the text says. */
export function sameIdentity(a: License, b: License): boolean {
  return a.licenseId === b.licenseId;
}

/** Key for maps and sets of licenses; agrees with sameIdentity. */
export function identityKey(license: License): string {
  return license.licenseId;
}
