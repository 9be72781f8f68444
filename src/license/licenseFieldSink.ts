import { readCandidates, type VersionedProperty } from "../constants/licenseProperties";
import { debug } from "../utils/debugLog";
import { termLabel } from "../utils/termUtils";
import type { LicenseNode, TripleStore } from "../utils/tripleStore";

/**
 * Where a license's setters send their writes. The choice is made when the
 * license is constructed: detached licenses get a sink that ignores writes,
 * bound licenses get one that rewrites the graph.
 */
export interface LicenseFieldSink {
  readonly bound: boolean;
  write(property: VersionedProperty, values: readonly string[]): void;
}

export const detachedSink: LicenseFieldSink = {
  bound: false,
  write() {
    // detached licenses only live in memory
  },
};

/**
 * Replace semantics: clears the canonical and every legacy predicate, then
 * inserts each value under the canonical predicate. Delete and insert are
 * separate store calls, so a reader in between sees the field empty.
 */
export class GraphFieldSink implements LicenseFieldSink {
  readonly bound = true;

  constructor(
    readonly store: TripleStore,
    readonly node: LicenseNode,
  ) {}

  write(property: VersionedProperty, values: readonly string[]): void {
    let removed = 0;
    for (const predicate of readCandidates(property)) {
      removed += this.store.removeTriples(this.node, predicate);
    }
    for (const value of values) {
      this.store.addTriple(this.node, property.canonical, value);
    }
    debug("license.write", {
      node: termLabel(this.node),
      field: property.field,
      removed,
      added: values.length,
    });
  }
}
