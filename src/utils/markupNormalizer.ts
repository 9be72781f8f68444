import type { LicenseTextServices } from "./licenseText";

/**
 * Body and template text: converted from HTML only while the field's
 * isHtml flag is still set. A value written through a setter is already
 * plain and must come back untouched.
 */
export function normalizeMarkup(
  text: string,
  isHtml: boolean,
  services: Pick<LicenseTextServices, "htmlToPlainText">,
): string {
  return isHtml ? services.htmlToPlainText(text) : text;
}

/**
 * Header text: entity-unescaped on every read, whatever the HTML flags say,
 * and never run through the full HTML conversion.
 */
export function normalizeHeader(
  text: string,
  services: Pick<LicenseTextServices, "unescapeHtmlEntities">,
): string {
  return services.unescapeHtmlEntities(text);
}
