import { readFile } from "node:fs/promises";
import {
  type AxiosAdapter,
  AxiosError,
  AxiosHeaders,
  type AxiosInstance,
} from "axios";
import type { Store } from "n3";
import { createHttpClient } from "../src/http.ts";
import { parseOntology } from "../src/ontology.ts";
import type { Logger } from "../src/utils.ts";
import { TURTLE_PREFIXES } from "./namespace.ts";

export const HARDWARE_FIXTURE = new URL("./fixtures/hardware.ttl", import.meta.url);

/** Parses Turtle written without its prefix block. */
export function parseTurtle(body: string): Store {
  return parseOntology(TURTLE_PREFIXES + body);
}

export async function hardwareGraph(): Promise<Store> {
  return parseOntology(await readFile(HARDWARE_FIXTURE, "utf-8"));
}

export interface CapturedLines {
  log: string[];
  warn: string[];
  debug: string[];
}

export function captureLogger(): { logger: Logger; lines: CapturedLines } {
  const lines: CapturedLines = { log: [], warn: [], debug: [] };
  const logger: Logger = {
    log: (message) => lines.log.push(message),
    warn: (message) => lines.warn.push(message),
    debug: (message) => lines.debug.push(message),
  };
  return { logger, lines };
}

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  /** Form fields sent in the body. */
  body: URLSearchParams;
  timeout?: number;
}

export interface FakeResponse {
  status: number;
  body: string;
  headers: Record<string, string | string[]>;
}

/**
 * An axios client that never leaves the process: every request is recorded
 * and answered by `respond`. Statuses outside 2xx reject as axios does.
 */
export function fakeHttp(
  respond: (request: RecordedRequest) => FakeResponse | Promise<FakeResponse>,
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const headers = new Headers();
    for (const [name, value] of Object.entries(config.headers.toJSON(true))) {
      if (value !== null) headers.set(name, String(value));
    }
    const request: RecordedRequest = {
      url: new URL(config.url ?? ""),
      method: (config.method ?? "get").toUpperCase(),
      headers,
      body: new URLSearchParams(
        typeof config.data === "string" ? config.data : "",
      ),
      timeout: config.timeout,
    };
    requests.push(request);

    const answer = await respond(request);
    const response = {
      data: answer.body,
      status: answer.status,
      statusText: String(answer.status),
      headers: AxiosHeaders.from(
        Object.fromEntries(
          Object.entries(answer.headers).map((
            [name, value],
          ) => [name.toLowerCase(), value]),
        ),
      ),
      config,
      request,
    };
    if (config.validateStatus && !config.validateStatus(answer.status)) {
      throw new AxiosError(
        `Request failed with status code ${answer.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        request,
        response,
      );
    }
    return response;
  };
  return { http: createHttpClient({ adapter }), requests };
}

export function textResponse(
  body: string,
  status = 200,
  headers: Record<string, string | string[]> = {},
): FakeResponse {
  return { status, body, headers };
}

export function jsonResponse(
  data: unknown,
  status = 200,
  headers: Record<string, string | string[]> = {},
): FakeResponse {
  return textResponse(JSON.stringify(data), status, {
    "Content-Type": "application/json",
    ...headers,
  });
}
