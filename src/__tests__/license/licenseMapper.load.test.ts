/**
 * Load path: graph node -> License, across current and legacy predicate names.
 */

import { describe, test, expect, beforeEach } from "vitest";
import { DataFactory } from "n3";
import { loadLicense, loadLicenses } from "../../license/licenseMapper";
import { N3TripleStore } from "../../utils/tripleStore";
import { parseTurtleInto } from "../../utils/rdfParser";
import { LicenseValidationError } from "../../utils/errors";
import { SPDX, SPDX_V1, RDF, XML_LITERAL_SUFFIX } from "../../constants/vocabularies";
import { getSummary } from "../../utils/debugLog";
import { FIXTURES, LICENSE_NS, markerServices } from "../fixtures/licenseFixtures";

const { namedNode, blankNode, literal } = DataFactory;

describe("loadLicense", () => {
  let store: N3TripleStore;

  beforeEach(() => {
    store = new N3TripleStore();
  });

  test("reads every current-schema field and normalizes each the right way", () => {
    parseTurtleInto(store, FIXTURES.currentSchema);
    const license = loadLicense(store, namedNode(`${LICENSE_NS}Sample-1.0`), { services: markerServices });

    expect(license.licenseId).toBe("Sample-1.0");
    expect(license.name).toBe("Sample License 1.0");
    expect(license.comment).toBe("Used only in tests");
    expect(license.seeAlsoUrls).toEqual(["https://example.org/sample-1.0"]);
    expect(license.bodyText).toBe("text(<p>Permission is granted.</p>)");
    expect(license.standardHeader).toBe("unescaped(Copyright &lt;year&gt; &amp; contributors)");
    expect(license.standardTemplate).toBe("text(<p>Template body</p>)");
    expect(license.osiApproved).toBe(true);
    expect(license.isBound).toBe(true);
    expect(license.bodyTextIsHtml).toBe(true);
    expect(license.templateIsHtml).toBe(true);
  });

  test("default services convert HTML body text and unescape the header", () => {
    parseTurtleInto(store, FIXTURES.currentSchema);
    const license = loadLicense(store, namedNode(`${LICENSE_NS}Sample-1.0`));

    expect(license.bodyText).toBe("Permission is granted.");
    expect(license.standardHeader).toBe("Copyright <year> & contributors");
  });

  test("falls back to 1.x predicate names", () => {
    parseTurtleInto(store, FIXTURES.legacySchema);
    const license = loadLicense(store, namedNode(`${LICENSE_NS}Legacy-1.0`), { services: markerServices });

    expect(license.name).toBe("Legacy License");
    expect(license.comment).toBe("legacy notes");
    expect([...license.seeAlsoUrls].sort()).toEqual([
      "https://example.org/legacy-a",
      "https://example.org/legacy-b",
    ]);
    expect(license.bodyText).toBe("text(Legacy text)");
    expect(license.standardHeader).toBe("unescaped(legacy header)");
    expect(license.standardTemplate).toBe("text(legacy template)");
    expect(license.osiApproved).toBe(true);
  });

  test("prefers the current predicate when both versions are present", () => {
    parseTurtleInto(store, FIXTURES.mixedSchema);
    const license = loadLicense(store, namedNode(`${LICENSE_NS}Mixed`), { services: markerServices });

    expect(license.standardHeader).toBe("unescaped(current header)");
    expect(license.standardTemplate).toBe("text(legacy template)");
    expect(license.osiApproved).toBe(false);
  });

  test("records a fallback entry for each field read from a legacy predicate", () => {
    parseTurtleInto(store, FIXTURES.mixedSchema);
    loadLicense(store, namedNode(`${LICENSE_NS}Mixed`), { services: markerServices });

    const legacy = getSummary().fallbacks.filter((e) => e.event === "license.legacyPredicate");
    expect(legacy.map((e) => e.meta.field)).toEqual(["standardTemplate"]);
    expect(legacy[0].meta.predicate).toBe(SPDX_V1.licenseTemplate);
  });

  test("absent optional fields degrade to null / false / empty", () => {
    parseTurtleInto(store, FIXTURES.minimal);
    const license = loadLicense(store, namedNode(`${LICENSE_NS}NoId`), { services: markerServices });

    expect(license.licenseId).toBe("NoId");
    expect(license.name).toBeNull();
    expect(license.comment).toBeNull();
    expect(license.seeAlsoUrls).toEqual([]);
    expect(license.bodyText).toBe("text(Bare text)");
    expect(license.standardHeader).toBeNull();
    expect(license.standardTemplate).toBeNull();
    expect(license.osiApproved).toBe(false);
  });

  test("a blank node without a licenseId loads with an empty id", () => {
    const node = blankNode("anon");
    store.addTriple(node, SPDX.licenseText, "text");
    const license = loadLicense(store, node, { services: markerServices });

    expect(license.licenseId).toBe("");
    expect(license.bodyText).toBe("text(text)");
  });

  test("uses the first value when a predicate unexpectedly holds several", () => {
    const node = namedNode(`${LICENSE_NS}Dup`);
    store.addTriple(node, SPDX.standardLicenseHeader, "one");
    store.addTriple(node, SPDX.standardLicenseHeader, "two");
    const license = loadLicense(store, node, { services: markerServices });

    expect(["unescaped(one)", "unescaped(two)"]).toContain(license.standardHeader);
  });

  test("keeps the XML-literal suffix on the header and only unescapes it", () => {
    const node = namedNode(`${LICENSE_NS}SuffixHeader`);
    store.addTriple(node, SPDX.standardLicenseHeader, `hdr &amp; co${XML_LITERAL_SUFFIX}`);
    const license = loadLicense(store, node);

    expect(license.standardHeader).toBe(`hdr & co${XML_LITERAL_SUFFIX}`);
  });

  test("an XMLLiteral-typed header carries its datatype suffix into the unescaper", () => {
    const node = namedNode(`${LICENSE_NS}TypedHeader`);
    store.addTriple(node, SPDX.standardLicenseHeader, literal("<b>hdr</b>", namedNode(RDF.XMLLiteral)));
    const license = loadLicense(store, node, { services: markerServices });

    expect(license.standardHeader).toBe(`unescaped(<b>hdr</b>${XML_LITERAL_SUFFIX})`);
  });
});

describe("loadLicense OSI-approved values", () => {
  const node = namedNode(`${LICENSE_NS}Osi`);

  function storeWithOsi(predicate: string, value: string): N3TripleStore {
    const store = new N3TripleStore();
    store.addTriple(node, SPDX.licenseId, "Osi");
    store.addTriple(node, predicate, value);
    return store;
  }

  test.each([
    ["true", true],
    ["1", true],
    ["false", false],
    ["0", false],
    [" true ", true],
  ])("%j loads as %s", (value, expected) => {
    const license = loadLicense(storeWithOsi(SPDX.isOsiApproved, value), node, { services: markerServices });
    expect(license.osiApproved).toBe(expected);
  });

  test("legacy predicate values are validated the same way", () => {
    const license = loadLicense(storeWithOsi(SPDX_V1.licenseOsiApproved, "0"), node, { services: markerServices });
    expect(license.osiApproved).toBe(false);
  });

  test.each(["yes", "TRUE", "False", ""])("%j fails the load", (value) => {
    const store = storeWithOsi(SPDX.isOsiApproved, value);
    expect(() => loadLicense(store, node, { services: markerServices })).toThrow(LicenseValidationError);
  });

  test("the validation error names the node, predicate and value", () => {
    const store = storeWithOsi(SPDX_V1.licenseOsiApproved, "yes");
    let caught: unknown;
    try {
      loadLicense(store, node, { services: markerServices });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LicenseValidationError);
    if (!(caught instanceof LicenseValidationError)) return;
    expect(caught.message).toBe("Invalid value for OSI Approved - must be {true, false, 0, 1}");
    expect(caught.context).toEqual({ node: node.value, predicate: SPDX_V1.licenseOsiApproved, value: "yes" });
  });

  test("a boolean-typed literal is accepted by its lexical value", () => {
    const store = new N3TripleStore();
    store.addTriple(node, SPDX.isOsiApproved, literal("true", namedNode("http://www.w3.org/2001/XMLSchema#boolean")));
    expect(loadLicense(store, node, { services: markerServices }).osiApproved).toBe(true);
  });

  test("an XML-literal OSI value keeps its suffix and is rejected", () => {
    const store = new N3TripleStore();
    store.addTriple(node, SPDX.isOsiApproved, literal("true", namedNode(RDF.XMLLiteral)));
    expect(() => loadLicense(store, node, { services: markerServices })).toThrow(LicenseValidationError);
  });
});

describe("loadLicenses", () => {
  test("loads every spdx:License subject in the graph", () => {
    const store = new N3TripleStore();
    parseTurtleInto(store, FIXTURES.currentSchema);
    parseTurtleInto(store, FIXTURES.legacySchema);

    const ids = loadLicenses(store, { services: markerServices }).map((l) => l.licenseId).sort();
    expect(ids).toEqual(["Legacy-1.0", "Sample-1.0"]);
  });
});
