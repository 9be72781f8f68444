import type { Term } from "@rdfjs/types";

/**
 * Extract the local name from an IRI: the segment after the last '#' or '/'.
 */
export function shortLocalName(iri?: string): string {
  if (!iri) return "";
  const parts = iri.split(/[#/]/).filter(Boolean);
  return parts.length ? parts[parts.length - 1] : iri;
}

/** Display form used in log metadata: `<iri>` or `_:label`. */
export function termLabel(term: Term): string {
  if (term.termType === "BlankNode") return `_:${term.value}`;
  if (term.termType === "NamedNode") return `<${term.value}>`;
  return JSON.stringify(term.value);
}
