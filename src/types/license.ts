/**
 * @fileoverview Type definitions for license records
 * Field shapes shared by the entity, the graph reader and the projection.
 */

/**
 * Every persisted field of a license.
 */
export interface LicenseFields {
  /** Catalog identifier; uniqueness is the caller's concern */
  licenseId: string;
  /** Display name, required for a valid license */
  name: string | null;
  /** Full license text in plain form */
  bodyText: string | null;
  /** Short notice block to place in source files */
  standardHeader: string | null;
  /** Machine-template form of the license text */
  standardTemplate: string | null;
  osiApproved: boolean;
  comment: string | null;
  seeAlsoUrls: string[];
}

/**
 * Whether the next read of a field from the graph still has to convert HTML.
 * Both start true; a setter clears its flag and nothing sets it back.
 */
export interface LicenseHtmlFlags {
  bodyTextIsHtml: boolean;
  templateIsHtml: boolean;
}

export type LicenseInit = Pick<LicenseFields, "licenseId"> & Partial<Omit<LicenseFields, "licenseId">>;

export function freshHtmlFlags(): LicenseHtmlFlags {
  return { bodyTextIsHtml: true, templateIsHtml: true };
}

export function licenseFieldsFrom(init: LicenseInit): LicenseFields {
  return {
    licenseId: init.licenseId,
    name: init.name ?? null,
    bodyText: init.bodyText ?? null,
    standardHeader: init.standardHeader ?? null,
    standardTemplate: init.standardTemplate ?? null,
    osiApproved: init.osiApproved ?? false,
    comment: init.comment ?? null,
    seeAlsoUrls: init.seeAlsoUrls ? [...init.seeAlsoUrls] : [],
  };
}
