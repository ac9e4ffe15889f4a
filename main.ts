import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { type Config, loadConfig } from "./src/config.ts";
import { Converter, type ConversionReport } from "./src/convert.ts";
import {
  CorrespondenceFile,
  CorrespondenceStore,
} from "./src/correspondence.ts";
import { ConversionError, describeError } from "./src/errors.ts";
import { createHttpClient } from "./src/http.ts";
import { MemoryWikibase } from "./src/memoryWikibase.ts";
import { loadOntology, ontologyIris } from "./src/ontology.ts";
import { loadRuleTable, type RuleTable } from "./src/rules.ts";
import { consoleLogger, type Logger, verboseLogger } from "./src/utils.ts";
import { type WikibaseClient, WikibaseSession } from "./src/wikibase.ts";

export const USAGE_EXIT_CODE = 64;

export const USAGE = `Usage: ont2wb convert <user> <password> [options]

Converts the OKH-LOSH ontology into items and properties of a Wikibase.

Options:
  --dry               convert into an in-memory Wikibase, write nothing
  --debug             print debug output
  --ontology <src>    Turtle file or http(s) URL to convert
  --link-file <path>  correspondence snapshot to resume from and update
  --no-link-file      neither read nor write a correspondence snapshot
  --help              show this text
  --version           show the version`;

const packageJson = z.object({ version: z.string() });

export function version(): string {
  const text = readFileSync(new URL("./package.json", import.meta.url), "utf-8");
  return packageJson.parse(JSON.parse(text)).version;
}

export interface MainOptions {
  config?: Config;
  logger?: Logger;
  /** Client for the Wikibase API and ontology downloads. */
  http?: AxiosInstance;
}

class UsageError extends Error {}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        "dry": { type: "boolean", default: false },
        "debug": { type: "boolean", default: false },
        "ontology": { type: "string" },
        "link-file": { type: "string" },
        "no-link-file": { type: "boolean", default: false },
        "help": { type: "boolean", short: "h", default: false },
        "version": { type: "boolean", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/** Entities that exist before a dry run: anchors and earlier creations. */
function dryRunTarget(
  rules: RuleTable,
  store: CorrespondenceStore,
  logger: Logger,
): MemoryWikibase {
  return new MemoryWikibase({
    logger,
    existing: [
      ...rules.anchorEntries().map(([, anchor]) => ({
        id: anchor.id,
        ...(anchor.datatype && { datatype: anchor.datatype }),
      })),
      ...store.entries().map((record) => ({ id: record.id })),
    ],
  });
}

async function convert(
  user: string,
  password: string,
  flags: ReturnType<typeof parseCommandLine>["values"],
  config: Config,
  logger: Logger,
  http: AxiosInstance,
): Promise<ConversionReport> {
  const rules = await loadRuleTable(config.rulesFile);
  logger.debug(`Rule table version ${rules.version}`);

  const source = flags.ontology ?? config.ontologySource;
  logger.log(`Loading ontology from ${source} ...`);
  const graph = await loadOntology(source, {
    baseIRI: config.ontologyBaseUri,
    http,
  });

  const linkFile = flags["no-link-file"]
    ? undefined
    : new CorrespondenceFile(flags["link-file"] ?? config.linkFile);
  const store = linkFile ? await linkFile.load() : new CorrespondenceStore();
  if (store.size > 0) {
    logger.log(`Resuming with ${store.size} known subjects from ${linkFile?.path}`);
  }

  const client: WikibaseClient = flags.dry
    ? dryRunTarget(rules, store, logger)
    : new WikibaseSession(config.apiUrl, { http, logger });
  await client.login(user, password);

  const converter = new Converter({
    rules,
    store,
    client,
    language: config.language,
    logger,
    exclude: ontologyIris(graph),
    // Identifiers from a dry run are not real; keep them out of the snapshot.
    checkpoint: linkFile && !flags.dry
      ? (current) => linkFile.save(current)
      : undefined,
  });
  return converter.run(graph);
}

/** Runs the command line and returns the process exit status. */
export async function main(
  argv: string[],
  options: MainOptions = {},
): Promise<number> {
  let logger = options.logger ?? consoleLogger;

  try {
    const { values: flags, positionals } = parseCommandLine(argv);
    if (flags.help) {
      logger.log(USAGE);
      return 0;
    }
    if (flags.version) {
      logger.log(version());
      return 0;
    }
    if (flags.debug && !options.logger) logger = verboseLogger;

    const [command, ...rest] = positionals;
    if (command !== "convert") {
      throw new UsageError(
        command === undefined ? "No command given" : `Unknown command "${command}"`,
      );
    }

    const config = options.config ?? loadConfig();
    const user = rest[0] ?? config.user;
    const password = rest[1] ?? config.password;
    if (user === undefined || password === undefined || rest.length > 2) {
      throw new UsageError("convert takes exactly <user> and <password>");
    }

    await convert(
      user,
      password,
      flags,
      config,
      logger,
      options.http ?? createHttpClient(),
    );
    return config.successExitCode;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.warn(`${error.message}\n\n${USAGE}`);
      return USAGE_EXIT_CODE;
    }
    logger.warn(`ERROR: ${describeError(error)}`);
    return error instanceof ConversionError ? error.exitCode : 1;
  }
}

if (
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(process.argv[1]).href
) {
  process.exitCode = await main(process.argv.slice(2));
}
