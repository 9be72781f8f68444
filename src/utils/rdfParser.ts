/**
 * Turtle in / Turtle out for N3TripleStore.
 *
 * Parsed triples are re-homed into the target store's graph so a document
 * without graph names lands where the mapper reads. Export drops the graph
 * name for the same reason.
 */

import { DataFactory, Parser, Writer } from "n3";
import { RDF, RDFS, SPDX } from "../constants/vocabularies";
import { debug } from "./debugLog";
import type { N3TripleStore } from "./tripleStore";

const { quad, defaultGraph } = DataFactory;

export const DEFAULT_PREFIXES: Record<string, string> = {
  rdf: RDF.namespace,
  rdfs: RDFS.namespace,
  spdx: SPDX.namespace,
};

export interface ParseTurtleOptions {
  baseIRI?: string;
  format?: "text/turtle" | "application/n-triples";
}

/** Parses `text` synchronously and adds every triple; returns the number added. */
export function parseTurtleInto(target: N3TripleStore, text: string, options: ParseTurtleOptions = {}): number {
  const parser = new Parser({ format: options.format ?? "text/turtle", baseIRI: options.baseIRI });
  const parsed = parser.parse(text);
  const store = target.getStore();
  const graph = target.getGraph();
  let added = 0;
  for (const q of parsed) {
    store.addQuad(quad(q.subject, q.predicate, q.object, graph));
    added++;
  }
  debug("rdf.parseTurtle", { added, graph: graph.value });
  return added;
}

export async function serializeTurtle(
  source: N3TripleStore,
  prefixes: Record<string, string> = DEFAULT_PREFIXES,
): Promise<string> {
  const quads = source
    .getStore()
    .getQuads(null, null, null, source.getGraph())
    .map((q) => quad(q.subject, q.predicate, q.object, defaultGraph()));
  const writer = new Writer({ prefixes, format: "text/turtle" });
  writer.addQuads(quads);
  return new Promise<string>((resolve, reject) => {
    writer.end((err, result) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(result);
    });
  });
}
