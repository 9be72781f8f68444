/**
 * Versioned property lookup.
 *
 * A field may live under several predicate names across schema versions.
 * Resolution walks the candidates in priority order and stops at the first
 * predicate with any triple; later candidates are never consulted, even if
 * they hold different values.
 */

import type { Quad_Object } from "@rdfjs/types";
import { readCandidates, type VersionedProperty } from "../constants/licenseProperties";
import { fallback } from "./debugLog";
import type { LicenseNode, TripleStore } from "./tripleStore";

export interface ResolvedProperty {
  predicate: string;
  objects: Quad_Object[];
}

/**
 * Every object found under the first candidate predicate that matches,
 * or null when no candidate matches.
 */
export function resolvePropertyValues(
  store: TripleStore,
  node: LicenseNode,
  candidates: readonly string[],
): ResolvedProperty | null {
  for (const predicate of candidates) {
    const matches = store.findTriples(node, predicate);
    if (matches.length > 0) {
      return { predicate, objects: matches.map((q) => q.object) };
    }
  }
  return null;
}

/**
 * Object of the first triple under the first matching candidate. Several
 * triples under one predicate are tolerated: the first one wins.
 */
export function resolveProperty(
  store: TripleStore,
  node: LicenseNode,
  candidates: readonly string[],
): Quad_Object | null {
  const resolved = resolvePropertyValues(store, node, candidates);
  return resolved ? resolved.objects[0] : null;
}

/**
 * Field-level wrapper: resolves a VersionedProperty and records a fallback
 * entry when the value came from a legacy predicate.
 */
export function resolveVersioned(
  store: TripleStore,
  node: LicenseNode,
  property: VersionedProperty,
): ResolvedProperty | null {
  const resolved = resolvePropertyValues(store, node, readCandidates(property));
  if (resolved && resolved.predicate !== property.canonical) {
    fallback("license.legacyPredicate", {
      node: node.value,
      field: property.field,
      predicate: resolved.predicate,
    });
  }
  return resolved;
}
