import type { Term } from "@rdfjs/types";
import { LICENSE_PROPERTIES } from "../constants/licenseProperties";
import type { LicenseFields, LicenseHtmlFlags } from "../types/license";
import { debug, error } from "../utils/debugLog";
import { LicenseValidationError } from "../utils/errors";
import type { LicenseTextServices } from "../utils/licenseText";
import { extractLiteralText, literalExternalForm } from "../utils/literalText";
import { normalizeHeader, normalizeMarkup } from "../utils/markupNormalizer";
import { resolveVersioned } from "../utils/propertyResolver";
import { shortLocalName, termLabel } from "../utils/termUtils";
import type { LicenseNode, TripleStore } from "../utils/tripleStore";

const OSI_TRUE = new Set(["true", "1"]);
const OSI_FALSE = new Set(["false", "0"]);

/**
 * Decodes an OSI-approved literal. Only "true"/"1" and "false"/"0" are
 * accepted, after trimming and with exact case.
 */
export function parseOsiApproved(term: Term, node: LicenseNode, predicate: string): boolean {
  const raw = literalExternalForm(term).trim();
  if (OSI_TRUE.has(raw)) return true;
  if (OSI_FALSE.has(raw)) return false;
  error("license.invalidOsiApproved", { node: termLabel(node), predicate, value: raw });
  throw new LicenseValidationError("Invalid value for OSI Approved - must be {true, false, 0, 1}", {
    node: node.value,
    predicate,
    value: raw,
  });
}

function readText(store: TripleStore, node: LicenseNode, key: "licenseId" | "name" | "comment"): string | null {
  const resolved = resolveVersioned(store, node, LICENSE_PROPERTIES[key]);
  return resolved ? resolved.objects[0].value : null;
}

/**
 * Reads every license field reachable from `node`.
 *
 * Body text and template are suffix-stripped and then converted from HTML
 * only while the matching flag in `flags` is set; the header keeps any
 * suffix and is always entity-unescaped instead. A missing value becomes null, false or an empty
 * list. A malformed OSI-approved literal aborts the whole read.
 */
export function readLicenseFields(
  store: TripleStore,
  node: LicenseNode,
  flags: LicenseHtmlFlags,
  services: LicenseTextServices,
): LicenseFields {
  // inherited base fields
  const storedId = readText(store, node, "licenseId");
  const licenseId = storedId ?? (node.termType === "NamedNode" ? shortLocalName(node.value) : "");
  const name = readText(store, node, "name");
  const comment = readText(store, node, "comment");
  const seeAlso = resolveVersioned(store, node, LICENSE_PROPERTIES.seeAlso);
  const seeAlsoUrls = seeAlso ? seeAlso.objects.map((o) => o.value) : [];

  // body text: canonical predicate only
  const body = resolveVersioned(store, node, LICENSE_PROPERTIES.bodyText);
  const bodyText = body
    ? normalizeMarkup(extractLiteralText(body.objects[0]), flags.bodyTextIsHtml, services)
    : null;

  const header = resolveVersioned(store, node, LICENSE_PROPERTIES.standardHeader);
  const standardHeader = header ? normalizeHeader(literalExternalForm(header.objects[0]), services) : null;

  const template = resolveVersioned(store, node, LICENSE_PROPERTIES.standardTemplate);
  const standardTemplate = template
    ? normalizeMarkup(extractLiteralText(template.objects[0]), flags.templateIsHtml, services)
    : null;

  const osi = resolveVersioned(store, node, LICENSE_PROPERTIES.osiApproved);
  const osiApproved = osi ? parseOsiApproved(osi.objects[0], node, osi.predicate) : false;

  debug("license.load", {
    node: termLabel(node),
    licenseId,
    hasBody: bodyText !== null,
    hasHeader: standardHeader !== null,
    hasTemplate: standardTemplate !== null,
    osiApproved,
  });

  return {
    licenseId,
    name,
    bodyText,
    standardHeader,
    standardTemplate,
    osiApproved,
    comment,
    seeAlsoUrls,
  };
}
