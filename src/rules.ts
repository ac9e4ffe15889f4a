import { readFile } from "node:fs/promises";
import type { Store } from "n3";
import { z } from "zod";
import {
  entityKindOf,
  isEntityDatatype,
  PROPERTY_DATATYPES,
  type PropertyDatatype,
} from "./entity.ts";
import { ConfigError, MappingGapError } from "./errors.ts";
import { PREFIXES, RDFS } from "./namespace.ts";
import { findObjects, findTypes, isNamedNode } from "./rdfUtils.ts";

export const DEFAULT_RULES_FILE = new URL(
  "../rules/okh-losh.json",
  import.meta.url,
);

const datatypeSchema = z.enum(PROPERTY_DATATYPES);

const typeRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("skip") }),
  z.object({ kind: z.literal("item"), class: z.boolean().default(false) }),
  z.object({ kind: z.literal("property"), datatype: datatypeSchema }),
]);

const anchorSchema = z.object({
  id: z.string().regex(/^[PQ][0-9]+$/, "expected a Wikibase identifier"),
  datatype: datatypeSchema.optional(),
});

const substituteSchema = z.object({
  kind: z.enum(["item", "property"]),
  label: z.string().min(1),
  description: z.string().optional(),
  datatype: datatypeSchema.optional(),
});

const valueRuleSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("literal"),
    datatype: z.enum(["string", "url", "quantity"]),
    unit: z.string().optional(),
  }),
  z.object({
    kind: z.literal("reference"),
    datatype: z.enum(["wikibase-item", "wikibase-property"]),
  }),
  z.object({
    kind: z.literal("constant"),
    datatype: datatypeSchema,
    values: z.record(z.string()),
  }),
]);

export const ruleTableSchema = z.object({
  version: z.string().default("0"),
  ontology: z.string().optional(),
  prefixes: z.record(z.string()).default({}),
  labelPredicates: z.array(z.string()).default(["rdfs:label"]),
  descriptionPredicates: z.array(z.string()).default(["rdfs:comment"]),
  ignoredPredicates: z.array(z.string()).default([]),
  types: z.record(typeRuleSchema).default({}),
  datatypes: z.record(datatypeSchema).default({}),
  anchors: z.record(anchorSchema).default({}),
  substitutes: z.record(substituteSchema).default({}),
  values: z.record(valueRuleSchema).default({}),
});

export type RuleTableInput = z.input<typeof ruleTableSchema>;
export type TypeRule = z.infer<typeof typeRuleSchema>;
export type Anchor = z.infer<typeof anchorSchema>;
export type Substitute = z.infer<typeof substituteSchema>;
export type ValueRule = z.infer<typeof valueRuleSchema>;

/** What the target store should hold for an RDF node. */
export type NodeClass =
  | { kind: "skip" }
  | { kind: "item"; label?: string; description?: string }
  | {
    kind: "property";
    datatype: PropertyDatatype;
    label?: string;
    description?: string;
  };

function ruleForDatatype(datatype: PropertyDatatype): ValueRule {
  return isEntityDatatype(datatype)
    ? { kind: "reference", datatype }
    : { kind: "literal", datatype };
}

/**
 * Declarative mapping from OKH-LOSH URIs to Wikibase items, properties and
 * claim values. Keys are full URIs; the data file may use prefixed names.
 */
export class RuleTable {
  readonly version: string;
  readonly labelPredicates: readonly string[];
  readonly descriptionPredicates: readonly string[];
  private readonly ignored: Set<string>;
  private readonly types: Map<string, TypeRule>;
  private readonly datatypes: Map<string, PropertyDatatype>;
  private readonly anchors: Map<string, Anchor>;
  private readonly anchorIds: Set<string>;
  private readonly substitutes: Map<string, Substitute>;
  private readonly values: Map<string, ValueRule>;

  private constructor(data: z.infer<typeof ruleTableSchema>) {
    const prefixes = { ...PREFIXES, ...data.prefixes };
    const expand = (name: string) => expandName(name, prefixes);
    const expandKeys = <T>(record: Record<string, T>) =>
      new Map(Object.entries(record).map(([key, value]) => [expand(key), value]));

    this.version = data.version;
    this.labelPredicates = data.labelPredicates.map(expand);
    this.descriptionPredicates = data.descriptionPredicates.map(expand);
    this.ignored = new Set(data.ignoredPredicates.map(expand));
    this.types = expandKeys(data.types);
    this.datatypes = expandKeys(data.datatypes);
    this.anchors = expandKeys(data.anchors);
    this.anchorIds = new Set([...this.anchors.values()].map((a) => a.id));
    this.substitutes = expandKeys(data.substitutes);
    this.values = expandKeys(data.values);
  }

  static create(input: RuleTableInput): RuleTable {
    return RuleTable.parse(input);
  }

  static parse(input: unknown): RuleTable {
    const parsed = ruleTableSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(`Invalid rule table: ${parsed.error.message}`, {
        details: { issues: parsed.error.issues },
      });
    }
    return new RuleTable(parsed.data);
  }

  anchorOf(uri: string): Anchor | undefined {
    return this.anchors.get(uri);
  }

  /** Anchors as `[uri, anchor]` pairs, in table order. */
  anchorEntries(): Array<[string, Anchor]> {
    return [...this.anchors];
  }

  substituteOf(uri: string): Substitute | undefined {
    return this.substitutes.get(uri);
  }

  /** Whether the URI is mapped by the table itself rather than the ontology. */
  hasEntityRule(uri: string): boolean {
    return this.anchors.has(uri) || this.substitutes.has(uri);
  }

  isAnchorId(id: string): boolean {
    return this.anchorIds.has(id);
  }

  isMetaType(uri: string): boolean {
    return this.types.has(uri);
  }

  isIgnored(predicate: string): boolean {
    return this.ignored.has(predicate) ||
      this.labelPredicates.includes(predicate) ||
      this.descriptionPredicates.includes(predicate);
  }

  /** Whether `uri` names a class, so that nodes typed with it are individuals. */
  isClass(graph: Store, uri: string): boolean {
    const anchor = this.anchors.get(uri);
    if (anchor) return entityKindOf(anchor.id) === "item";
    if (this.substitutes.get(uri)?.kind === "item") return true;
    return findTypes(graph, uri).some((type) => {
      const rule = this.types.get(type);
      return rule?.kind === "item" && rule.class;
    });
  }

  /**
   * Decides whether a node becomes an item or a property.
   * Throws a MappingGapError when nothing in the table covers it.
   */
  classify(graph: Store, uri: string): NodeClass {
    const anchor = this.anchors.get(uri);
    if (anchor) {
      return entityKindOf(anchor.id) === "property"
        ? { kind: "property", datatype: anchor.datatype ?? "string" }
        : { kind: "item" };
    }

    const substitute = this.substitutes.get(uri);
    if (substitute) {
      const { label, description } = substitute;
      return substitute.kind === "property"
        ? {
          kind: "property",
          datatype: this.datatypeOf(graph, uri, "string"),
          label,
          description,
        }
        : { kind: "item", label, description };
    }

    const types = findTypes(graph, uri);
    for (const type of types) {
      const rule = this.types.get(type);
      if (!rule) continue;
      if (rule.kind === "property") {
        return {
          kind: "property",
          datatype: this.datatypeOf(graph, uri, rule.datatype),
        };
      }
      return rule.kind === "skip" ? { kind: "skip" } : { kind: "item" };
    }

    if (types.some((type) => this.isClass(graph, type))) {
      return { kind: "item" };
    }

    throw new MappingGapError(
      types.length === 0
        ? `No rdf:type for <${uri}>`
        : `No type rule for <${uri}> (${types.map((t) => `<${t}>`).join(", ")})`,
      { subject: uri, details: { types } },
    );
  }

  /** Datatype of a property node, falling back when nothing narrows it. */
  datatypeOf(
    graph: Store,
    uri: string,
    fallback: PropertyDatatype,
  ): PropertyDatatype {
    const declared = this.values.get(uri)?.datatype ??
      this.anchors.get(uri)?.datatype ??
      this.substitutes.get(uri)?.datatype;
    if (declared) return declared;

    for (const range of findObjects(graph, uri, RDFS("range").value)) {
      if (!isNamedNode(range)) continue;
      const datatype = this.datatypes.get(range.value);
      if (datatype) return datatype;
      if (this.isClass(graph, range.value)) return "wikibase-item";
    }
    return fallback;
  }

  /** How objects of `predicate` become claim values. */
  valueRule(graph: Store, predicate: string): ValueRule {
    const explicit = this.values.get(predicate);
    if (explicit) return explicit;

    const node = this.classify(graph, predicate);
    if (node.kind !== "property") {
      throw new MappingGapError(`<${predicate}> is not mapped to a property`, {
        subject: predicate,
      });
    }
    return ruleForDatatype(node.datatype);
  }
}

export function expandName(
  name: string,
  prefixes: Record<string, string>,
): string {
  if (name.includes("://") || name.startsWith("urn:")) return name;
  const separator = name.indexOf(":");
  const base = separator > 0 ? prefixes[name.slice(0, separator)] : undefined;
  if (base === undefined) {
    throw new ConfigError(`Unknown prefix in rule table name "${name}"`);
  }
  return base + name.slice(separator + 1);
}

export async function loadRuleTable(
  source: string | URL = DEFAULT_RULES_FILE,
): Promise<RuleTable> {
  let text: string;
  try {
    text = await readFile(source, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read rule table ${source}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Rule table ${source} is not valid JSON`, {
      cause: error,
    });
  }
  return RuleTable.parse(data);
}
