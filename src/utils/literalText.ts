import type { Term } from "@rdfjs/types";
import { RDF, XML_LITERAL_SUFFIX } from "../constants/vocabularies";

/**
 * External string form of a term as the legacy serializer produced it:
 * the lexical value, with `^^<datatype>` appended for rdf:XMLLiteral values.
 * Language tags and other datatypes are not part of the form.
 */
export function literalExternalForm(term: Term): string {
  if (term.termType === "Literal" && term.datatype.value === RDF.XMLLiteral) {
    return `${term.value}^^${term.datatype.value}`;
  }
  return term.value;
}

/** Removes exactly one trailing XML-literal marker (case-sensitive), if present. */
export function stripXmlLiteralSuffix(text: string): string {
  return text.endsWith(XML_LITERAL_SUFFIX) ? text.slice(0, text.length - XML_LITERAL_SUFFIX.length) : text;
}

export function extractLiteralText(term: Term): string {
  return stripXmlLiteralSuffix(literalExternalForm(term));
}
