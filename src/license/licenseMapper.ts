import { DataFactory } from "n3";
import { LICENSE_PROPERTIES } from "../constants/licenseProperties";
import { RDF_TYPE, SPDX } from "../constants/vocabularies";
import { freshHtmlFlags } from "../types/license";
import { info } from "../utils/debugLog";
import { resolveTextServices, type LicenseTextServices } from "../utils/licenseText";
import { termLabel } from "../utils/termUtils";
import type { LicenseNode, N3TripleStore, TripleStore } from "../utils/tripleStore";
import { BoundLicense, type License } from "./license";
import { GraphFieldSink } from "./licenseFieldSink";
import { readLicenseFields } from "./licenseReader";

const { namedNode } = DataFactory;

export interface LicenseMapperOptions {
  services?: Partial<LicenseTextServices>;
}

/**
 * Builds a bound license from the triples on `node`. Both HTML flags start
 * set, so body and template are converted on this first read.
 *
 * @throws LicenseValidationError when the OSI-approved literal is malformed
 */
export function loadLicense(
  store: TripleStore,
  node: LicenseNode,
  options: LicenseMapperOptions = {},
): BoundLicense {
  const services = resolveTextServices(options.services);
  const flags = freshHtmlFlags();
  const fields = readLicenseFields(store, node, flags, services);
  return new BoundLicense(store, node, fields, flags, services);
}

/** Loads every `spdx:License` subject of the store's graph. */
export function loadLicenses(store: N3TripleStore, options: LicenseMapperOptions = {}): BoundLicense[] {
  return store.subjectsWithType(SPDX.License).map((node) => loadLicense(store, node, options));
}

/**
 * Writes `license` onto `node` under current-schema predicates and returns
 * a license bound to it.
 *
 * Only present values are written: body text when non-empty, header and
 * template when not null, the OSI flag only when true. Each field's
 * canonical and legacy triples are cleared first, so projecting over an
 * existing node leaves no stale or legacy statements behind.
 */
export function projectLicense(
  license: License,
  store: TripleStore,
  node: LicenseNode,
  options: LicenseMapperOptions = {},
): BoundLicense {
  const fields = license.snapshot();
  const sink = new GraphFieldSink(store, node);

  store.addTriple(node, RDF_TYPE, namedNode(SPDX.License));
  sink.write(LICENSE_PROPERTIES.licenseId, fields.licenseId ? [fields.licenseId] : []);
  sink.write(LICENSE_PROPERTIES.name, fields.name !== null ? [fields.name] : []);
  sink.write(LICENSE_PROPERTIES.comment, fields.comment !== null ? [fields.comment] : []);
  sink.write(LICENSE_PROPERTIES.seeAlso, fields.seeAlsoUrls);
  sink.write(LICENSE_PROPERTIES.bodyText, fields.bodyText ? [fields.bodyText] : []);
  sink.write(LICENSE_PROPERTIES.standardHeader, fields.standardHeader !== null ? [fields.standardHeader] : []);
  sink.write(LICENSE_PROPERTIES.standardTemplate, fields.standardTemplate !== null ? [fields.standardTemplate] : []);
  sink.write(LICENSE_PROPERTIES.osiApproved, fields.osiApproved ? ["true"] : []);

  info("license.project", { node: termLabel(node), licenseId: fields.licenseId });
  return new BoundLicense(store, node, fields, license.htmlFlags(), resolveTextServices(options.services));
}
