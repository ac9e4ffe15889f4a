import type { Store } from "n3";
import type { CorrespondenceStore } from "./correspondence.ts";
import type { LanguageMap } from "./entity.ts";
import { MappingGapError } from "./errors.ts";
import { collectLanguageMap, localName } from "./rdfUtils.ts";
import type { NodeClass, RuleTable } from "./rules.ts";
import { consoleLogger, type Logger } from "./utils.ts";
import type { WikibaseClient } from "./wikibase.ts";

export type ResolutionStatus = "created" | "reused" | "anchored";

export interface Resolution {
  id: string;
  status: ResolutionStatus;
}

export interface EntityResolverOptions {
  graph: Store;
  rules: RuleTable;
  store: CorrespondenceStore;
  client: WikibaseClient;
  language?: string;
  logger?: Logger;
}

/**
 * Maps RDF URIs to target identifiers, creating a skeleton entity (labels
 * and descriptions, no claims) the first time a URI is seen. The only writer
 * of the correspondence store.
 */
export class EntityResolver {
  readonly language: string;
  private readonly graph: Store;
  private readonly rules: RuleTable;
  private readonly store: CorrespondenceStore;
  private readonly client: WikibaseClient;
  private readonly logger: Logger;
  private readonly pending = new Map<string, Promise<Resolution>>();
  private readonly gaps = new Map<string, MappingGapError>();

  constructor(options: EntityResolverOptions) {
    this.graph = options.graph;
    this.rules = options.rules;
    this.store = options.store;
    this.client = options.client;
    this.language = options.language ?? "en";
    this.logger = options.logger ?? consoleLogger;
  }

  async resolve(uri: string): Promise<string> {
    return (await this.ensure(uri)).id;
  }

  /** Identifier of a URI that is already resolved, without creating anything. */
  lookup(uri: string): string | undefined {
    return this.rules.anchorOf(uri)?.id ?? this.store.identifierOf(uri);
  }

  /** Whether `id` came from this resolver or the rule table's anchors. */
  isKnownIdentifier(id: string): boolean {
    return this.store.hasIdentifier(id) || this.rules.isAnchorId(id);
  }

  /** Whether a created entity still waits for its claims. */
  claimsPending(uri: string): boolean {
    const record = this.store.get(uri);
    return record !== undefined && record.claimsSubmittedAt === undefined;
  }

  markClaimsSubmitted(uri: string): void {
    this.store.markClaimsSubmitted(uri);
  }

  ensure(uri: string): Promise<Resolution> {
    const anchor = this.rules.anchorOf(uri);
    if (anchor) return Promise.resolve({ id: anchor.id, status: "anchored" });

    const id = this.store.identifierOf(uri);
    if (id) return Promise.resolve({ id, status: "reused" });

    const gap = this.gaps.get(uri);
    if (gap) return Promise.reject(gap);

    // Overlapping calls for one URI share a single creation.
    let pending = this.pending.get(uri);
    if (!pending) {
      pending = this.create(uri).finally(() => this.pending.delete(uri));
      this.pending.set(uri, pending);
    }
    return pending;
  }

  private async create(uri: string): Promise<Resolution> {
    const node = this.classify(uri);
    const labels = this.labelsOf(uri, node.label);
    const descriptions = this.descriptionsOf(uri, node.description);

    this.logger.log(`- Creating ${node.kind} for subject "${uri}" ...`);
    const id = node.kind === "property"
      ? await this.client.createProperty(labels, descriptions, node.datatype)
      : await this.client.createItem(labels, descriptions);

    this.store.record(uri, id);
    this.logger.log(`- Subject "${uri}" is represented by "${id}"`);
    return { id, status: "created" };
  }

  private classify(uri: string): Exclude<NodeClass, { kind: "skip" }> {
    try {
      const node = this.rules.classify(this.graph, uri);
      if (node.kind === "skip") {
        throw new MappingGapError(`<${uri}> is excluded from conversion`, {
          subject: uri,
        });
      }
      return node;
    } catch (error) {
      if (error instanceof MappingGapError) this.gaps.set(uri, error);
      throw error;
    }
  }

  labelsOf(uri: string, label?: string): LanguageMap {
    if (label) return { [this.language]: label };
    const labels = collectLanguageMap(
      this.graph,
      uri,
      this.rules.labelPredicates,
      this.language,
    );
    return Object.keys(labels).length > 0
      ? labels
      : { [this.language]: localName(uri) };
  }

  descriptionsOf(uri: string, description?: string): LanguageMap {
    if (description) return { [this.language]: description };
    return collectLanguageMap(
      this.graph,
      uri,
      this.rules.descriptionPredicates,
      this.language,
    );
  }
}
