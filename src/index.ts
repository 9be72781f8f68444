export { License, BoundLicense } from "./license/license";
export { loadLicense, loadLicenses, projectLicense } from "./license/licenseMapper";
export type { LicenseMapperOptions } from "./license/licenseMapper";
export { readLicenseFields, parseOsiApproved } from "./license/licenseReader";
export { semanticallyEquivalent, sameIdentity, identityKey } from "./license/licenseEquivalence";
export type { TextEquivalence } from "./license/licenseEquivalence";
export { verifyLicense } from "./license/licenseVerifier";
export { detachedSink, GraphFieldSink } from "./license/licenseFieldSink";
export type { LicenseFieldSink } from "./license/licenseFieldSink";

export { LICENSE_PROPERTIES, readCandidates } from "./constants/licenseProperties";
export type { VersionedProperty, LicensePropertyKey } from "./constants/licenseProperties";
export { RDF, RDFS, SPDX, SPDX_V1, XML_LITERAL_SUFFIX } from "./constants/vocabularies";

export { N3TripleStore } from "./utils/tripleStore";
export type { TripleStore, LicenseNode, TripleObject, N3TripleStoreOptions } from "./utils/tripleStore";
export { resolveProperty, resolvePropertyValues, resolveVersioned } from "./utils/propertyResolver";
export type { ResolvedProperty } from "./utils/propertyResolver";
export { extractLiteralText, literalExternalForm, stripXmlLiteralSuffix } from "./utils/literalText";
export { normalizeMarkup, normalizeHeader } from "./utils/markupNormalizer";
export {
  defaultLicenseTextServices,
  htmlToPlainText,
  isLicenseTextEquivalent,
  licenseTextTokens,
  resolveTextServices,
  unescapeHtmlEntities,
} from "./utils/licenseText";
export type { LicenseTextServices } from "./utils/licenseText";
export { parseTurtleInto, serializeTurtle, DEFAULT_PREFIXES } from "./utils/rdfParser";
export { LicenseValidationError, isLicenseValidationError } from "./utils/errors";
export { mapperConfigStore, getMapperConfig, defaultMapperConfig } from "./stores/mapperConfigStore";
export type { MapperConfig } from "./stores/mapperConfigStore";
export { getSummary, resetSummary } from "./utils/debugLog";

export type { LicenseFields, LicenseHtmlFlags, LicenseInit } from "./types/license";
