import { readFile } from "node:fs/promises";
import type { AxiosInstance } from "axios";
import N3, { type Store } from "n3";
import { OntologyError } from "./errors.ts";
import { createHttpClient, failedStatus } from "./http.ts";
import { OWL, RDF } from "./namespace.ts";

export const ONTOLOGY_FILE_LOCAL = "../LOSH/OKH-LOSH.ttl";
export const ONTOLOGY_FILE_REMOTE =
  "https://raw.githubusercontent.com/OPEN-NEXT/OKH-LOSH/master/OKH-LOSH.ttl";
export const ONTOLOGY_BASE_URI =
  "https://github.com/OPEN-NEXT/OKH-LOSH/raw/master/OKH-LOSH.ttl";

export interface LoadOntologyOptions {
  baseIRI?: string;
  /** Defaults to a client from `createHttpClient`. */
  http?: AxiosInstance;
}

function isRemote(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

async function readSource(source: string, http: AxiosInstance): Promise<string> {
  if (!isRemote(source)) {
    try {
      return await readFile(source, "utf-8");
    } catch (error) {
      throw new OntologyError(`Cannot read ontology ${source}`, {
        cause: error,
      });
    }
  }

  try {
    const response = await http.get<string>(source, {
      headers: { Accept: "text/turtle" },
      responseType: "text",
    });
    return response.data;
  } catch (error) {
    const status = failedStatus(error);
    throw new OntologyError(
      status === undefined
        ? `Cannot download ontology ${source}`
        : `Downloading ontology ${source} failed with HTTP ${status}`,
      { cause: error },
    );
  }
}

export function parseOntology(
  text: string,
  baseIRI: string = ONTOLOGY_BASE_URI,
): Store {
  const store = new N3.Store();
  try {
    store.addQuads(new N3.Parser({ baseIRI }).parse(text));
  } catch (error) {
    throw new OntologyError(
      `Ontology is not valid Turtle: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error },
    );
  }
  return store;
}

/** Reads a Turtle ontology from a local path or an http(s) URL. */
export async function loadOntology(
  source: string,
  options: LoadOntologyOptions = {},
): Promise<Store> {
  const text = await readSource(source, options.http ?? createHttpClient());
  return parseOntology(text, options.baseIRI);
}

/** IRIs declared as `owl:Ontology`, which are never converted. */
export function ontologyIris(graph: Store): string[] {
  return graph
    .getSubjects(RDF("type"), OWL("Ontology"), null)
    .filter((subject) => subject.termType === "NamedNode")
    .map((subject) => subject.value);
}
