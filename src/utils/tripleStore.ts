import { DataFactory, Store } from "n3";
import type { BlankNode, Literal, NamedNode, Quad, Quad_Graph } from "@rdfjs/types";
import { getMapperConfig } from "../stores/mapperConfigStore";
import { RDF_TYPE } from "../constants/vocabularies";
import { debug } from "./debugLog";

const { namedNode, literal, quad, defaultGraph } = DataFactory;

/** A graph node that can stand for one license: an IRI or a blank node. */
export type LicenseNode = NamedNode | BlankNode;

export type TripleObject = string | Literal | NamedNode;

/**
 * The three store capabilities the mapper relies on. Anything that can
 * match (subject, predicate, *), delete by (subject, predicate) and insert a
 * triple can back a license; N3TripleStore is the in-process implementation.
 */
export interface TripleStore {
  findTriples(subject: LicenseNode, predicate: string): Quad[];
  removeTriples(subject: LicenseNode, predicate: string): number;
  addTriple(subject: LicenseNode, predicate: string, object: TripleObject): void;
}

export interface N3TripleStoreOptions {
  store?: Store;
  // undefined -> mapperConfigStore.graphName, null -> default graph
  graphName?: string | null;
}

function toObjectTerm(value: TripleObject): Literal | NamedNode {
  return typeof value === "string" ? literal(value) : value;
}

/**
 * TripleStore backed by an n3 Store, scoped to a single graph.
 * Every call goes straight to the store; nothing is cached.
 */
export class N3TripleStore implements TripleStore {
  private readonly store: Store;
  private readonly graph: Quad_Graph;

  constructor(options: N3TripleStoreOptions = {}) {
    this.store = options.store ?? new Store();
    const graphName = options.graphName === undefined ? getMapperConfig().graphName : options.graphName;
    this.graph = graphName ? namedNode(graphName) : defaultGraph();
  }

  getStore(): Store {
    return this.store;
  }

  getGraph(): Quad_Graph {
    return this.graph;
  }

  get size(): number {
    return this.store.getQuads(null, null, null, this.graph).length;
  }

  findTriples(subject: LicenseNode, predicate: string): Quad[] {
    return this.store.getQuads(subject, namedNode(predicate), null, this.graph);
  }

  removeTriples(subject: LicenseNode, predicate: string): number {
    const matches = this.findTriples(subject, predicate);
    if (matches.length > 0) {
      this.store.removeQuads(matches);
      debug("store.removeTriples", { subject: subject.value, predicate, removed: matches.length });
    }
    return matches.length;
  }

  addTriple(subject: LicenseNode, predicate: string, object: TripleObject): void {
    this.store.addQuad(quad(subject, namedNode(predicate), toObjectTerm(object), this.graph));
  }

  /** Subjects carrying `rdf:type <typeIri>` in this graph, in store order. */
  subjectsWithType(typeIri: string): LicenseNode[] {
    const out: LicenseNode[] = [];
    const seen = new Set<string>();
    for (const q of this.store.getQuads(null, namedNode(RDF_TYPE), namedNode(typeIri), this.graph)) {
      const subject = q.subject;
      if (subject.termType !== "NamedNode" && subject.termType !== "BlankNode") continue;
      const key = `${subject.termType}:${subject.value}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(subject);
    }
    return out;
  }

  clear(): void {
    this.store.removeQuads(this.store.getQuads(null, null, null, this.graph));
  }
}
