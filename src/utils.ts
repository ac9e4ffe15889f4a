import N3 from "n3";
import type { Quad } from "@rdfjs/types";
import { PREFIXES } from "./namespace.ts";

export function writeTurtle(
  quads: Quad[],
  prefixes: Record<string, string> = PREFIXES,
): Promise<string> {
  const writer = new N3.Writer({ format: "text/turtle", prefixes });

  for (const quad of quads) {
    writer.addQuad(quad);
  }

  return new Promise<string>((resolve, reject) => {
    writer.end((error: Error | null, result: string) =>
      error ? reject(error) : resolve(result)
    );
  });
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  debug: () => {},
};

export const verboseLogger: Logger = {
  ...consoleLogger,
  debug: (message) => console.log(`... ${message}`),
};

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  debug: () => {},
};
