import type { Store } from "n3";
import { RDF } from "./namespace.ts";
import { isNamedNode, quadsOf } from "./rdfUtils.ts";

/**
 * For every node, the nodes that must exist first: the predicates it uses and
 * the types it declares. Only nodes in `nodes` are considered.
 */
export function dependencies(
  graph: Store,
  nodes: readonly string[],
): Map<string, Set<string>> {
  const members = new Set(nodes);
  const type = RDF("type").value;
  const result = new Map<string, Set<string>>();

  for (const node of members) {
    const needs = new Set<string>();
    for (const quad of quadsOf(graph, node)) {
      const predicate = quad.predicate.value;
      if (members.has(predicate)) needs.add(predicate);
      if (
        predicate === type && isNamedNode(quad.object) &&
        members.has(quad.object.value)
      ) {
        needs.add(quad.object.value);
      }
    }
    needs.delete(node);
    result.set(node, needs);
  }
  return result;
}

/**
 * Stable topological order: each step takes the earliest node whose
 * dependencies are all placed. When only cycles remain, the earliest
 * remaining node goes next.
 */
export function conversionOrder(
  graph: Store,
  nodes: readonly string[],
): string[] {
  const needs = dependencies(graph, nodes);
  const remaining = [...needs.keys()];
  const placed = new Set<string>();
  const order: string[] = [];

  while (remaining.length > 0) {
    const ready = remaining.findIndex((node) =>
      [...(needs.get(node) ?? [])].every((dependency) => placed.has(dependency))
    );
    const [next] = remaining.splice(ready < 0 ? 0 : ready, 1);
    order.push(next);
    placed.add(next);
  }
  return order;
}
