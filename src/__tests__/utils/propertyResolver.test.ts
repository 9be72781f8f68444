import { describe, it, expect, beforeEach } from "vitest";
import { DataFactory } from "n3";
import type { Quad } from "@rdfjs/types";
import { resolveProperty, resolvePropertyValues, resolveVersioned } from "../../utils/propertyResolver";
import { N3TripleStore, type TripleStore } from "../../utils/tripleStore";
import { LICENSE_PROPERTIES } from "../../constants/licenseProperties";
import { getSummary } from "../../utils/debugLog";

const { namedNode, literal, quad } = DataFactory;

const node = namedNode("http://example.org/licenses/R");
const CURRENT = "http://example.org/terms#current";
const LEGACY = "http://example.org/terms#legacy";

describe("resolveProperty", () => {
  let store: N3TripleStore;

  beforeEach(() => {
    store = new N3TripleStore();
  });

  it("returns null when no candidate matches", () => {
    expect(resolveProperty(store, node, [CURRENT, LEGACY])).toBeNull();
  });

  it("falls through to later candidates", () => {
    store.addTriple(node, LEGACY, "old");
    expect(resolveProperty(store, node, [CURRENT, LEGACY])?.value).toBe("old");
  });

  it("ignores later candidates once one matches", () => {
    store.addTriple(node, CURRENT, "new");
    store.addTriple(node, LEGACY, "old");
    expect(resolveProperty(store, node, [CURRENT, LEGACY])?.value).toBe("new");
    expect(resolveProperty(store, node, [LEGACY, CURRENT])?.value).toBe("old");
  });

  it("only looks at the given subject", () => {
    store.addTriple(namedNode("http://example.org/licenses/Other"), CURRENT, "elsewhere");
    expect(resolveProperty(store, node, [CURRENT])).toBeNull();
  });

  it("takes the first triple the store returns under a predicate", () => {
    const triples: Quad[] = [
      quad(node, namedNode(CURRENT), literal("first")),
      quad(node, namedNode(CURRENT), literal("second")),
    ];
    const fixed: TripleStore = {
      findTriples: (_subject, predicate) => (predicate === CURRENT ? triples : []),
      removeTriples: () => 0,
      addTriple: () => undefined,
    };
    expect(resolveProperty(fixed, node, [CURRENT])?.value).toBe("first");
    expect(resolvePropertyValues(fixed, node, [CURRENT])?.objects.map((o) => o.value)).toEqual(["first", "second"]);
  });
});

describe("resolveVersioned", () => {
  it("reports which predicate matched and logs legacy use", () => {
    const store = new N3TripleStore();
    store.addTriple(node, LICENSE_PROPERTIES.standardHeader.legacy[0], "legacy header");

    const resolved = resolveVersioned(store, node, LICENSE_PROPERTIES.standardHeader);

    expect(resolved?.predicate).toBe("http://spdx.org/rdf/terms#licenseHeader");
    const entries = getSummary().fallbacks;
    expect(entries).toHaveLength(1);
    expect(entries[0].meta).toEqual({
      node: node.value,
      field: "standardHeader",
      predicate: "http://spdx.org/rdf/terms#licenseHeader",
    });
  });

  it("does not log when the canonical predicate matched", () => {
    const store = new N3TripleStore();
    store.addTriple(node, LICENSE_PROPERTIES.standardHeader.canonical, "header");
    resolveVersioned(store, node, LICENSE_PROPERTIES.standardHeader);
    expect(getSummary().fallbacks).toEqual([]);
  });
});
