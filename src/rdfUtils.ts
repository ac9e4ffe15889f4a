import N3, { type Store } from "n3";
import type { Literal, NamedNode, Quad, Term } from "@rdfjs/types";
import { RDF } from "./namespace.ts";
import type { LanguageMap } from "./entity.ts";

const { namedNode } = N3.DataFactory;

export function isNamedNode(term: Term): term is NamedNode {
  return term.termType === "NamedNode";
}

export function isLiteral(term: Term): term is Literal {
  return term.termType === "Literal";
}

export function findObjects(
  store: Store,
  subject: string,
  predicate: string,
): Term[] {
  return store.getObjects(namedNode(subject), namedNode(predicate), null);
}

export function findTypes(store: Store, subject: string): string[] {
  return findObjects(store, subject, RDF("type").value)
    .filter(isNamedNode)
    .map((type) => type.value);
}

export function quadsOf(store: Store, subject: string): Quad[] {
  return store.getQuads(namedNode(subject), null, null, null);
}

/** Named subjects in the order they first appear in the store. */
export function namedSubjects(store: Store): string[] {
  const seen = new Set<string>();
  for (const quad of store.getQuads(null, null, null, null)) {
    if (isNamedNode(quad.subject)) seen.add(quad.subject.value);
  }
  return [...seen];
}

/** The part of a URI after its last `#` or `/`. */
export function localName(uri: string): string {
  const name = uri.replace(/.*[#/]/, "");
  return name.length > 0 ? name : uri;
}

/**
 * Collects literal values of the first predicate that has any, keyed by
 * language. Several values in one language are joined with `separator`.
 */
export function collectLanguageMap(
  store: Store,
  subject: string,
  predicates: readonly string[],
  defaultLanguage: string,
  separator = "\n\n",
): LanguageMap {
  for (const predicate of predicates) {
    const literals = findObjects(store, subject, predicate).filter(isLiteral);
    if (literals.length === 0) continue;

    const values: LanguageMap = {};
    for (const literal of literals) {
      const language = literal.language || defaultLanguage;
      values[language] = language in values
        ? values[language] + separator + literal.value
        : literal.value;
    }
    return values;
  }
  return {};
}
