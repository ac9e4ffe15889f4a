import type { Store } from "n3";
import { EntityBuilder } from "./builder.ts";
import type { CorrespondenceStore } from "./correspondence.ts";
import { claimReferences } from "./entity.ts";
import {
  ConsistencyError,
  ConversionError,
  MappingGapError,
} from "./errors.ts";
import { conversionOrder } from "./order.ts";
import { isNamedNode, namedSubjects } from "./rdfUtils.ts";
import { EntityResolver } from "./resolver.ts";
import type { RuleTable } from "./rules.ts";
import { consoleLogger, type Logger } from "./utils.ts";
import type { WikibaseClient } from "./wikibase.ts";

export type NodeState =
  | "unvisited"
  | "skeleton-created"
  | "claims-submitted"
  | "skipped";

export type NodeOutcome = "created" | "reused" | "anchored" | "skipped";

export interface NodeReport {
  uri: string;
  outcome: NodeOutcome;
  state: NodeState;
  id?: string;
  /** Claims submitted for this node during the run. */
  claims: number;
}

export interface ConversionReport {
  nodes: NodeReport[];
  created: number;
  reused: number;
  anchored: number;
  skipped: number;
  claims: number;
  warnings: MappingGapError[];
}

export interface ConverterOptions {
  rules: RuleTable;
  store: CorrespondenceStore;
  client: WikibaseClient;
  language?: string;
  logger?: Logger;
  /** URIs never converted, such as the ontology's own IRI. */
  exclude?: Iterable<string>;
  /** Called after every creation and every claim submission. */
  checkpoint?: (store: CorrespondenceStore) => Promise<void>;
}

const TRANSITIONS: Record<NodeState, readonly NodeState[]> = {
  "unvisited": ["skeleton-created", "skipped"],
  "skeleton-created": ["claims-submitted"],
  "claims-submitted": [],
  "skipped": [],
};

/**
 * Converts a whole ontology graph in two passes: skeletons for every node in
 * dependency order, then the claims of every node, so that references
 * between nodes (cyclic ones included) always point at existing entities.
 */
export class Converter {
  private readonly rules: RuleTable;
  private readonly store: CorrespondenceStore;
  private readonly client: WikibaseClient;
  private readonly language: string;
  private readonly logger: Logger;
  private readonly exclude: Set<string>;
  private readonly checkpoint: (store: CorrespondenceStore) => Promise<void>;

  constructor(options: ConverterOptions) {
    this.rules = options.rules;
    this.store = options.store;
    this.client = options.client;
    this.language = options.language ?? "en";
    this.logger = options.logger ?? consoleLogger;
    this.exclude = new Set(options.exclude);
    this.checkpoint = options.checkpoint ?? (() => Promise.resolve());
  }

  /**
   * Subjects of the graph plus the predicates and objects the rule table maps
   * by itself, in input order.
   */
  nodesOf(graph: Store): string[] {
    const nodes = new Set<string>();
    const consider = (uri: string) => {
      if (nodes.has(uri) || this.exclude.has(uri)) return;
      try {
        if (this.rules.classify(graph, uri).kind === "skip") {
          this.logger.debug(`Excluded by type: <${uri}>`);
          return;
        }
      } catch (error) {
        // Kept, so that the gap is reported when the node is resolved.
        if (!(error instanceof MappingGapError)) throw error;
      }
      nodes.add(uri);
    };

    for (const subject of namedSubjects(graph)) consider(subject);
    for (const quad of graph.getQuads(null, null, null, null)) {
      if (this.rules.hasEntityRule(quad.predicate.value)) {
        consider(quad.predicate.value);
      }
      if (isNamedNode(quad.object) && this.rules.hasEntityRule(quad.object.value)) {
        consider(quad.object.value);
      }
    }
    return [...nodes];
  }

  async run(graph: Store): Promise<ConversionReport> {
    const warnings: MappingGapError[] = [];
    const warn = (gap: MappingGapError) => {
      warnings.push(gap);
      this.logger.warn(`WARNING: ${gap.message}`);
    };

    const resolver = new EntityResolver({
      graph,
      rules: this.rules,
      store: this.store,
      client: this.client,
      language: this.language,
      logger: this.logger,
    });
    const builder = new EntityBuilder({
      graph,
      rules: this.rules,
      resolver,
      onGap: warn,
      logger: this.logger,
    });

    const order = conversionOrder(graph, this.nodesOf(graph));
    const reports = new Map<string, NodeReport>(
      order.map((uri) => [uri, {
        uri,
        outcome: "skipped",
        state: "unvisited",
        claims: 0,
      }]),
    );
    const advance = (report: NodeReport, next: NodeState) => {
      if (!TRANSITIONS[report.state].includes(next)) {
        throw new ConsistencyError(
          `<${report.uri}> cannot go from ${report.state} to ${next}`,
          { subject: report.uri },
        );
      }
      report.state = next;
    };

    this.logger.log(`Converting ${order.length} nodes ...`);

    for (const report of reports.values()) {
      try {
        const { id, status } = await resolver.ensure(report.uri);
        report.id = id;
        report.outcome = status;
        advance(report, "skeleton-created");
        if (status === "created") await this.checkpoint(this.store);
      } catch (error) {
        if (!(error instanceof MappingGapError)) throw attach(error, report.uri);
        warn(error);
        advance(report, "skipped");
      }
    }

    for (const report of reports.values()) {
      if (report.state !== "skeleton-created") continue;
      try {
        report.claims = await this.submitClaims(report, builder, resolver);
      } catch (error) {
        throw attach(error, report.uri);
      }
      advance(report, "claims-submitted");
    }

    const nodes = [...reports.values()];
    const count = (outcome: NodeOutcome) =>
      nodes.filter((node) => node.outcome === outcome).length;
    const result: ConversionReport = {
      nodes,
      created: count("created"),
      reused: count("reused"),
      anchored: count("anchored"),
      skipped: count("skipped"),
      claims: nodes.reduce((sum, node) => sum + node.claims, 0),
      warnings,
    };
    this.logger.log(
      `Done: ${result.created} created, ${result.reused} reused, ` +
        `${result.anchored} anchored, ${result.skipped} skipped, ` +
        `${result.claims} claims, ${warnings.length} warnings`,
    );
    return result;
  }

  private async submitClaims(
    report: NodeReport,
    builder: EntityBuilder,
    resolver: EntityResolver,
  ): Promise<number> {
    const { uri, id } = report;
    if (id === undefined || !resolver.claimsPending(uri)) return 0;

    const entity = await builder.build(uri);
    for (const claim of entity.claims) {
      const dangling = claimReferences(claim).find((ref) =>
        !resolver.isKnownIdentifier(ref)
      );
      if (dangling) {
        throw new ConsistencyError(
          `Claim on <${uri}> refers to ${dangling}, which has no correspondence`,
          { subject: uri, details: { claim } },
        );
      }
    }

    if (entity.claims.length > 0) {
      this.logger.log(`- Adding ${entity.claims.length} claims to ${id} ...`);
      await this.client.addClaims(id, entity.claims);
    }
    resolver.markClaimsSubmitted(uri);
    await this.checkpoint(this.store);
    return entity.claims.length;
  }
}

function attach(error: unknown, uri: string): unknown {
  return error instanceof ConversionError ? error.at(uri) : error;
}
