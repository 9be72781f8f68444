import { RDFS, SPDX, SPDX_V1 } from "./vocabularies";

/**
 * A field stored under one canonical predicate (the only one ever written)
 * and zero or more legacy predicates still honoured on read.
 */
export interface VersionedProperty {
  readonly field: string;
  readonly canonical: string;
  readonly legacy: readonly string[];
}

/** Read order: canonical first, then legacy names in declaration order. */
export function readCandidates(property: VersionedProperty): string[] {
  return [property.canonical, ...property.legacy];
}

export const LICENSE_PROPERTIES = {
  licenseId: { field: "licenseId", canonical: SPDX.licenseId, legacy: [] },
  name: { field: "name", canonical: SPDX.name, legacy: [SPDX_V1.licenseName] },
  comment: { field: "comment", canonical: RDFS.comment, legacy: [SPDX_V1.licenseNotes] },
  seeAlso: { field: "seeAlsoUrls", canonical: RDFS.seeAlso, legacy: [SPDX_V1.licenseSourceUrl] },
  bodyText: { field: "bodyText", canonical: SPDX.licenseText, legacy: [] },
  standardHeader: {
    field: "standardHeader",
    canonical: SPDX.standardLicenseHeader,
    legacy: [SPDX_V1.licenseHeader],
  },
  standardTemplate: {
    field: "standardTemplate",
    canonical: SPDX.standardLicenseTemplate,
    legacy: [SPDX_V1.licenseTemplate],
  },
  osiApproved: {
    field: "osiApproved",
    canonical: SPDX.isOsiApproved,
    legacy: [SPDX_V1.licenseOsiApproved],
  },
} as const satisfies Record<string, VersionedProperty>;

export type LicensePropertyKey = keyof typeof LICENSE_PROPERTIES;
