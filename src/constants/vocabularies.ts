/**
 * Centralized RDF and SPDX vocabulary constants
 *
 * Single source of truth for the URIs read and written by the license mapper,
 * so predicate strings are never duplicated across modules.
 */

// ============================================================================
// RDF (Resource Description Framework)
// https://www.w3.org/1999/02/22-rdf-syntax-ns
// ============================================================================

export const RDF = {
  namespace: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  type: "http://www.w3.org/1999/02/22-rdf-syntax-ns#type",
  XMLLiteral: "http://www.w3.org/1999/02/22-rdf-syntax-ns#XMLLiteral",
} as const;

// ============================================================================
// RDFS (RDF Schema)
// https://www.w3.org/2000/01/rdf-schema
// ============================================================================

export const RDFS = {
  namespace: "http://www.w3.org/2000/01/rdf-schema#",
  comment: "http://www.w3.org/2000/01/rdf-schema#comment",
  seeAlso: "http://www.w3.org/2000/01/rdf-schema#seeAlso",
} as const;

// ============================================================================
// XSD (XML Schema Datatypes)
// https://www.w3.org/2001/XMLSchema
// ============================================================================

export const XSD = {
  namespace: "http://www.w3.org/2001/XMLSchema#",
  string: "http://www.w3.org/2001/XMLSchema#string",
} as const;

// ============================================================================
// SPDX terms
// http://spdx.org/rdf/terms
// ============================================================================

const SPDX_NS = "http://spdx.org/rdf/terms#";

export const SPDX = {
  namespace: SPDX_NS,
  License: `${SPDX_NS}License`,
  licenseId: `${SPDX_NS}licenseId`,
  name: `${SPDX_NS}name`,
  licenseText: `${SPDX_NS}licenseText`,
  standardLicenseHeader: `${SPDX_NS}standardLicenseHeader`,
  standardLicenseTemplate: `${SPDX_NS}standardLicenseTemplate`,
  isOsiApproved: `${SPDX_NS}isOsiApproved`,
} as const;

// Predicate names from the 1.x schema, still accepted on read.
export const SPDX_V1 = {
  licenseName: `${SPDX_NS}licenseName`,
  licenseNotes: `${SPDX_NS}licenseNotes`,
  licenseSourceUrl: `${SPDX_NS}licenseSourceUrl`,
  licenseHeader: `${SPDX_NS}licenseHeader`,
  licenseTemplate: `${SPDX_NS}licenseTemplate`,
  licenseOsiApproved: `${SPDX_NS}licenseOsiApproved`,
} as const;

// ============================================================================
// Convenience exports for commonly used URIs
// ============================================================================

export const RDF_TYPE = RDF.type;
export const XSD_STRING = XSD.string;

/**
 * Trailing marker that a legacy serialization appends to XML-literal values
 * (`value^^<rdf:XMLLiteral>` without angle brackets).
 */
export const XML_LITERAL_SUFFIX = `^^${RDF.XMLLiteral}`;
