import { existsSync } from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import {
  ONTOLOGY_BASE_URI,
  ONTOLOGY_FILE_LOCAL,
  ONTOLOGY_FILE_REMOTE,
} from "./ontology.ts";
import { DEFAULT_API_URL } from "./wikibase.ts";

export const DEFAULT_LINK_FILE = "ont2wb_links.ttl";

const envSchema = z.object({
  WIKIBASE_API_URL: z.string().url().default(DEFAULT_API_URL),
  ONTOLOGY_SOURCE: z.string().optional(),
  ONTOLOGY_BASE_URI: z.string().url().default(ONTOLOGY_BASE_URI),
  LINK_FILE: z.string().default(DEFAULT_LINK_FILE),
  LANGUAGE: z.string().regex(/^[a-z]{2,3}(-[a-z0-9]+)*$/i).default("en"),
  RULES_FILE: z.string().optional(),
  SUCCESS_EXIT_CODE: z.coerce.number().int().min(0).max(255).default(0),
  WIKIBASE_USER: z.string().optional(),
  WIKIBASE_PASSWORD: z.string().optional(),
});

export interface Config {
  apiUrl: string;
  ontologySource: string;
  ontologyBaseUri: string;
  linkFile: string;
  language: string;
  rulesFile?: string;
  successExitCode: number;
  user?: string;
  password?: string;
}

type Env = Record<string, string | undefined>;

/** The sibling LOSH checkout when there is one, else the published file. */
export function defaultOntologySource(
  exists: (path: string) => boolean = existsSync,
): string {
  return exists(ONTOLOGY_FILE_LOCAL) ? ONTOLOGY_FILE_LOCAL : ONTOLOGY_FILE_REMOTE;
}

export function parseConfig(
  env: Env,
  exists: (path: string) => boolean = existsSync,
): Config {
  // Unset and empty variables both mean "use the default".
  const present = Object.fromEntries(
    Object.keys(envSchema.shape)
      .map((key): [string, string | undefined] => [key, env[key]?.trim()])
      .filter(([, value]) => value),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`, {
      details: { issues: parsed.error.issues },
    });
  }

  const values = parsed.data;
  return {
    apiUrl: values.WIKIBASE_API_URL,
    ontologySource: values.ONTOLOGY_SOURCE ?? defaultOntologySource(exists),
    ontologyBaseUri: values.ONTOLOGY_BASE_URI,
    linkFile: values.LINK_FILE,
    language: values.LANGUAGE,
    rulesFile: values.RULES_FILE,
    successExitCode: values.SUCCESS_EXIT_CODE,
    user: values.WIKIBASE_USER,
    password: values.WIKIBASE_PASSWORD,
  };
}

/** Reads `.env` into the process environment, then validates it. */
export function loadConfig(): Config {
  dotenv.config();
  return parseConfig(process.env);
}
