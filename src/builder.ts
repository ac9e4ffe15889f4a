import type { Store } from "n3";
import type { Quad } from "@rdfjs/types";
import { z } from "zod";
import {
  type Claim,
  type ClaimValue,
  decimalAmount,
  type TargetEntity,
} from "./entity.ts";
import { MappingGapError } from "./errors.ts";
import { RDF } from "./namespace.ts";
import { isLiteral, isNamedNode, quadsOf } from "./rdfUtils.ts";
import type { EntityResolver } from "./resolver.ts";
import type { RuleTable, ValueRule } from "./rules.ts";
import { consoleLogger, type Logger } from "./utils.ts";

const urlSchema = z.string().url();

export interface EntityBuilderOptions {
  graph: Store;
  rules: RuleTable;
  resolver: EntityResolver;
  /** Receives every claim that had to be left out. */
  onGap?: (gap: MappingGapError) => void;
  logger?: Logger;
}

export class EntityBuilder {
  private readonly graph: Store;
  private readonly rules: RuleTable;
  private readonly resolver: EntityResolver;
  private readonly onGap: (gap: MappingGapError) => void;
  private readonly logger: Logger;

  constructor(options: EntityBuilderOptions) {
    this.graph = options.graph;
    this.rules = options.rules;
    this.resolver = options.resolver;
    this.logger = options.logger ?? consoleLogger;
    this.onGap = options.onGap ??
      ((gap) => this.logger.warn(`WARNING: ${gap.message}`));
  }

  /**
   * Full definition of a node: labels, descriptions and every claim the rule
   * table can express. Claims it cannot express are reported through `onGap`.
   */
  async build(uri: string): Promise<TargetEntity> {
    const node = this.rules.classify(this.graph, uri);
    if (node.kind === "skip") {
      throw new MappingGapError(`<${uri}> is excluded from conversion`, {
        subject: uri,
      });
    }

    const entity: TargetEntity = {
      subject: uri,
      kind: node.kind,
      labels: this.resolver.labelsOf(uri, node.label),
      descriptions: this.resolver.descriptionsOf(uri, node.description),
      ...(node.kind === "property" && { datatype: node.datatype }),
      claims: [],
    };

    // Anchored entities belong to the target store; only the link is ours.
    if (this.rules.anchorOf(uri)) return entity;

    for (const quad of quadsOf(this.graph, uri)) {
      if (this.isAnnotation(quad)) continue;
      try {
        entity.claims.push(await this.claimFor(uri, quad));
      } catch (error) {
        if (!(error instanceof MappingGapError)) throw error;
        this.onGap(
          new MappingGapError(error.message, {
            subject: uri,
            predicate: quad.predicate.value,
            details: { object: quad.object.value },
            cause: error,
          }),
        );
      }
    }
    return entity;
  }

  /** Triples that never become claims: labels, ranges, meta types, ... */
  private isAnnotation(quad: Quad): boolean {
    const predicate = quad.predicate.value;
    if (this.rules.isIgnored(predicate)) {
      this.logger.debug(`Not a claim: <${predicate}>`);
      return true;
    }
    return predicate === RDF("type").value &&
      this.rules.isMetaType(quad.object.value);
  }

  private async claimFor(subject: string, quad: Quad): Promise<Claim> {
    const predicate = quad.predicate.value;
    let rule: ValueRule;
    try {
      rule = this.rules.valueRule(this.graph, predicate);
    } catch (error) {
      if (error instanceof MappingGapError) {
        throw new MappingGapError(
          `No rule for predicate <${predicate}> on <${subject}>`,
          { subject, predicate, cause: error },
        );
      }
      throw error;
    }

    const property = await this.resolver.resolve(predicate);
    const value = await this.valueFor(rule, quad);
    this.logger.debug(`Claim ${property} on <${subject}>`);
    return { property, value };
  }

  private async valueFor(rule: ValueRule, quad: Quad): Promise<ClaimValue> {
    const object = quad.object;
    const where = `<${quad.subject.value}> <${quad.predicate.value}>`;

    switch (rule.kind) {
      case "reference": {
        if (!isNamedNode(object)) {
          throw new MappingGapError(
            `${where} expects a URI, found ${object.termType} "${object.value}"`,
          );
        }
        return { type: "entity", id: await this.resolver.resolve(object.value) };
      }

      case "constant": {
        const constant = rule.values[object.value];
        if (constant === undefined) {
          throw new MappingGapError(
            `${where} has no constant for "${object.value}"`,
          );
        }
        return rule.datatype === "wikibase-item" ||
            rule.datatype === "wikibase-property"
          ? { type: "entity", id: constant }
          : literalValue(where, rule.datatype, constant);
      }

      case "literal": {
        if (!isLiteral(object) && !isNamedNode(object)) {
          throw new MappingGapError(
            `${where} expects a value, found ${object.termType}`,
          );
        }
        return literalValue(where, rule.datatype, object.value, rule.unit);
      }
    }
  }
}

function literalValue(
  where: string,
  datatype: "string" | "url" | "quantity",
  value: string,
  unit = "1",
): ClaimValue {
  switch (datatype) {
    case "string":
      return { type: "string", value };
    case "url":
      if (!urlSchema.safeParse(value).success) {
        throw new MappingGapError(`${where} "${value}" is not a URL`);
      }
      return { type: "url", value };
    case "quantity": {
      const amount = decimalAmount(value);
      if (amount === undefined) {
        throw new MappingGapError(`${where} "${value}" is not a number`);
      }
      return { type: "quantity", amount, unit };
    }
  }
}
