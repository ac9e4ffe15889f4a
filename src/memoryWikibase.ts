import {
  type Claim,
  claimReferences,
  entityKindOf,
  type EntityKind,
  type LanguageMap,
  type PropertyDatatype,
} from "./entity.ts";
import { AuthenticationError, RemoteFaultError } from "./errors.ts";
import { silentLogger, type Logger } from "./utils.ts";
import type { WikibaseClient } from "./wikibase.ts";

export interface StoredEntity {
  id: string;
  kind: EntityKind;
  labels: LanguageMap;
  descriptions: LanguageMap;
  datatype?: PropertyDatatype;
  claims: Claim[];
}

export interface MemoryWikibaseOptions {
  /** Accepted credentials; any login succeeds when omitted. */
  accounts?: Record<string, string>;
  /** Entities present before the run, such as the rule table's anchors. */
  existing?: Array<Pick<StoredEntity, "id"> & Partial<StoredEntity>>;
  logger?: Logger;
}

/**
 * A Wikibase kept in memory. Backs dry runs and tests; hands out
 * identifiers `Q1`, `Q2`, ... and `P1`, `P2`, ... in creation order.
 */
export class MemoryWikibase implements WikibaseClient {
  readonly entities = new Map<string, StoredEntity>();
  private readonly accounts?: Record<string, string>;
  private readonly logger: Logger;
  private nextItem = 1;
  private nextProperty = 1;
  private created = 0;

  constructor(options: MemoryWikibaseOptions = {}) {
    this.accounts = options.accounts;
    this.logger = options.logger ?? silentLogger;
    for (const entity of options.existing ?? []) {
      this.entities.set(entity.id, {
        kind: entityKindOf(entity.id),
        labels: {},
        descriptions: {},
        claims: [],
        ...entity,
      });
    }
  }

  /** Entities created through this client, not counting `existing` ones. */
  get createdCount(): number {
    return this.created;
  }

  private allocate(prefix: "P" | "Q"): string {
    let id: string;
    do {
      id = prefix === "P" ? `P${this.nextProperty++}` : `Q${this.nextItem++}`;
    } while (this.entities.has(id));
    this.created++;
    return id;
  }

  login(user: string, password: string): Promise<void> {
    if (this.accounts && this.accounts[user] !== password) {
      return Promise.reject(
        new AuthenticationError(`Failed to log in as "${user}"`, {
          details: { user },
        }),
      );
    }
    return Promise.resolve();
  }

  createItem(labels: LanguageMap, descriptions: LanguageMap): Promise<string> {
    const id = this.allocate("Q");
    this.logger.log(`- Dry-Creating Item ${id} ...`);
    this.entities.set(id, {
      id,
      kind: "item",
      labels: { ...labels },
      descriptions: { ...descriptions },
      claims: [],
    });
    return Promise.resolve(id);
  }

  createProperty(
    labels: LanguageMap,
    descriptions: LanguageMap,
    datatype: PropertyDatatype,
  ): Promise<string> {
    const id = this.allocate("P");
    this.logger.log(`- Dry-Creating Property ${id} ...`);
    this.entities.set(id, {
      id,
      kind: "property",
      labels: { ...labels },
      descriptions: { ...descriptions },
      datatype,
      claims: [],
    });
    return Promise.resolve(id);
  }

  addClaim(entityId: string, claim: Claim): Promise<void> {
    return this.addClaims(entityId, [claim]);
  }

  addClaims(entityId: string, claims: Claim[]): Promise<void> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      return Promise.reject(
        new RemoteFaultError("no-such-entity", `Could not find ${entityId}`),
      );
    }
    for (const claim of claims) {
      const missing = claimReferences(claim).find((id) => !this.entities.has(id));
      if (missing) {
        return Promise.reject(
          new RemoteFaultError("no-such-entity", `Could not find ${missing}`),
        );
      }
    }
    entity.claims.push(...claims);
    return Promise.resolve();
  }

  /** Entities whose label in `language` equals `label`. */
  findByLabel(label: string, language = "en"): StoredEntity[] {
    return [...this.entities.values()].filter((entity) =>
      entity.labels[language] === label
    );
  }
}
