import type { License } from "./license";

/**
 * Advisory check of required fields. Returns one message per problem and
 * never throws; an empty list means the license is complete.
 */
export function verifyLicense(license: License): string[] {
  const problems: string[] = [];
  const id = license.licenseId;
  if (!id) {
    problems.push("Missing required license ID");
  }
  const name = license.name;
  if (!name) {
    problems.push("Missing required license name");
  }
  const text = license.bodyText;
  if (!text) {
    problems.push(`Missing required license text for ${id}`);
  }
  return problems;
}
