import { readFile, rename, writeFile } from "node:fs/promises";
import N3 from "n3";
import type { Quad } from "@rdfjs/types";
import { ConsistencyError, OntologyError } from "./errors.ts";
import { Schema, XSD } from "./namespace.ts";
import { isLiteral, isNamedNode } from "./rdfUtils.ts";
import { writeTurtle } from "./utils.ts";

const { literal, namedNode, quad } = N3.DataFactory;

export interface CorrespondenceRecord {
  uri: string;
  id: string;
  createdAt: Date;
  /** Set once every claim of the entity has been accepted by the target store. */
  claimsSubmittedAt?: Date;
}

/**
 * RDF URI to target-store identifier. Grows monotonically during a run:
 * records are added once and never replaced or removed.
 */
export class CorrespondenceStore {
  private readonly records = new Map<string, CorrespondenceRecord>();
  private readonly subjects = new Map<string, string>();

  constructor(records: Iterable<CorrespondenceRecord> = []) {
    for (const record of records) {
      this.add({ ...record });
    }
  }

  get size(): number {
    return this.records.size;
  }

  get(uri: string): Readonly<CorrespondenceRecord> | undefined {
    return this.records.get(uri);
  }

  has(uri: string): boolean {
    return this.records.has(uri);
  }

  identifierOf(uri: string): string | undefined {
    return this.records.get(uri)?.id;
  }

  hasIdentifier(id: string): boolean {
    return this.subjects.has(id);
  }

  /** The URI an identifier was recorded for. */
  subjectOf(id: string): string | undefined {
    return this.subjects.get(id);
  }

  entries(): Readonly<CorrespondenceRecord>[] {
    return [...this.records.values()];
  }

  record(
    uri: string,
    id: string,
    createdAt: Date = new Date(),
  ): Readonly<CorrespondenceRecord> {
    return this.add({ uri, id, createdAt });
  }

  markClaimsSubmitted(uri: string, at: Date = new Date()): void {
    const record = this.records.get(uri);
    if (!record) {
      throw new ConsistencyError(`No correspondence for <${uri}>`, {
        subject: uri,
      });
    }
    record.claimsSubmittedAt ??= at;
  }

  private add(record: CorrespondenceRecord): CorrespondenceRecord {
    const existing = this.records.get(record.uri);
    if (existing) {
      throw new ConsistencyError(
        `<${record.uri}> already corresponds to ${existing.id}, refusing ${record.id}`,
        { subject: record.uri },
      );
    }
    const holder = this.subjects.get(record.id);
    if (holder !== undefined) {
      throw new ConsistencyError(
        `${record.id} already represents <${holder}>, refusing it for <${record.uri}>`,
        { subject: record.uri, details: { id: record.id, holder } },
      );
    }
    this.records.set(record.uri, record);
    this.subjects.set(record.id, record.uri);
    return record;
  }

  toQuads(): Quad[] {
    const quads: Quad[] = [];
    for (const record of this.records.values()) {
      const subject = namedNode(record.uri);
      quads.push(quad(subject, Schema("identifier"), literal(record.id)));
      quads.push(
        quad(subject, Schema("dateCreated"), dateTime(record.createdAt)),
      );
      if (record.claimsSubmittedAt) {
        quads.push(
          quad(subject, Schema("dateModified"), dateTime(record.claimsSubmittedAt)),
        );
      }
    }
    return quads;
  }

  toTurtle(): Promise<string> {
    return writeTurtle(this.toQuads(), {
      schema: Schema("").value,
      xsd: XSD("").value,
    });
  }

  /**
   * Reads a snapshot. Snapshots holding only `schema:identifier` load as
   * records whose claims are still to be submitted.
   */
  static fromQuads(quads: Quad[], loadedAt: Date = new Date()): CorrespondenceStore {
    const bySubject = new Map<string, Quad[]>();
    for (const q of quads) {
      if (!isNamedNode(q.subject)) continue;
      const list = bySubject.get(q.subject.value) ?? [];
      list.push(q);
      bySubject.set(q.subject.value, list);
    }

    const records: CorrespondenceRecord[] = [];
    for (const [uri, subjectQuads] of bySubject) {
      const valuesOf = (predicate: string) =>
        subjectQuads
          .filter((q) => q.predicate.value === predicate && isLiteral(q.object))
          .map((q) => q.object.value);

      const ids = valuesOf(Schema("identifier").value);
      if (ids.length === 0) continue;
      if (ids.length > 1) {
        throw new ConsistencyError(
          `<${uri}> has ${ids.length} identifiers in the snapshot: ${ids.join(", ")}`,
          { subject: uri },
        );
      }

      const createdAt = parseDate(valuesOf(Schema("dateCreated").value)[0]);
      const submittedAt = parseDate(valuesOf(Schema("dateModified").value)[0]);
      records.push({
        uri,
        id: ids[0],
        createdAt: createdAt ?? loadedAt,
        ...(submittedAt && { claimsSubmittedAt: submittedAt }),
      });
    }
    return new CorrespondenceStore(records);
  }

  static fromTurtle(text: string): CorrespondenceStore {
    let quads: Quad[];
    try {
      quads = new N3.Parser().parse(text);
    } catch (error) {
      throw new OntologyError("Correspondence snapshot is not valid Turtle", {
        cause: error,
      });
    }
    return CorrespondenceStore.fromQuads(quads);
  }
}

function dateTime(date: Date) {
  return literal(date.toISOString(), XSD("dateTime"));
}

function parseDate(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** The correspondence snapshot kept between runs (the "link file"). */
export class CorrespondenceFile {
  constructor(readonly path: string) {}

  async load(): Promise<CorrespondenceStore> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return new CorrespondenceStore();
      throw error;
    }
    return CorrespondenceStore.fromTurtle(text);
  }

  async save(store: CorrespondenceStore): Promise<void> {
    const temporary = `${this.path}.tmp`;
    await writeFile(temporary, await store.toTurtle(), "utf-8");
    await rename(temporary, this.path);
  }
}
