import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";

/** Every request fails after this long rather than blocking the run. */
export const HTTP_TIMEOUT = 30_000;

const httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 30_000 });
const httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 30_000 });

/** An axios instance with the shared agents and a default timeout. */
export function createHttpClient(
  config: CreateAxiosDefaults = {},
): AxiosInstance {
  return axios.create({
    timeout: HTTP_TIMEOUT,
    httpAgent,
    httpsAgent,
    ...config,
  });
}

/** Status of the answer behind a failed request, if the server answered. */
export function failedStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/** `Set-Cookie` values of a response, whatever shape the headers came in. */
export function setCookieHeaders(headers: unknown): string[] {
  if (typeof headers !== "object" || headers === null) return [];
  const value: unknown = Reflect.get(headers, "set-cookie");
  if (typeof value === "string") return [value];
  return Array.isArray(value)
    ? value.filter((cookie): cookie is string => typeof cookie === "string")
    : [];
}
