import type { AxiosInstance, AxiosResponse } from "axios";
import { CookieJar } from "tough-cookie";
import { z } from "zod";
import {
  type Claim,
  type ClaimValue,
  entityKindOf,
  type EntityKind,
  type LanguageMap,
  type PropertyDatatype,
} from "./entity.ts";
import {
  AuthenticationError,
  NetworkError,
  RemoteFaultError,
} from "./errors.ts";
import { createHttpClient, failedStatus, setCookieHeaders } from "./http.ts";
import { consoleLogger, type Logger } from "./utils.ts";

export const DEFAULT_API_URL = "http://losh.ose-germany.de/api.php";

const MAX_DESCRIPTION_LENGTH = 250;

/** The operations the converter needs from a Wikibase instance. */
export interface WikibaseClient {
  login(user: string, password: string): Promise<void>;
  createItem(labels: LanguageMap, descriptions: LanguageMap): Promise<string>;
  createProperty(
    labels: LanguageMap,
    descriptions: LanguageMap,
    datatype: PropertyDatatype,
  ): Promise<string>;
  addClaim(entityId: string, claim: Claim): Promise<void>;
  /** Adds all claims in one edit, so a failure leaves none of them behind. */
  addClaims(entityId: string, claims: Claim[]): Promise<void>;
}

type Params = Record<string, string>;

const loginTokenResponse = z.object({
  query: z.object({ tokens: z.object({ logintoken: z.string() }) }),
});

const csrfTokenResponse = z.object({
  query: z.object({ tokens: z.object({ csrftoken: z.string() }) }),
});

const clientLoginResponse = z.object({
  clientlogin: z.object({
    status: z.string(),
    username: z.string().optional(),
    messagecode: z.string().optional(),
    message: z.string().optional(),
  }),
});

const apiErrorResponse = z.object({
  error: z.object({ code: z.string(), info: z.string() }),
});

const editEntityResponse = z.object({
  entity: z.object({ id: z.string() }),
});

export interface WikibaseSessionOptions {
  /** Defaults to a client from `createHttpClient`. */
  http?: AxiosInstance;
  logger?: Logger;
  /** Sent as `loginreturnurl` with `clientlogin`. */
  loginReturnUrl?: string;
}

/**
 * A session against a Wikibase `api.php`. Keeps the session cookies between
 * calls and caches the CSRF token after the first edit.
 */
export class WikibaseSession implements WikibaseClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly loginReturnUrl: string;
  private readonly cookies = new CookieJar();
  private csrfToken?: string;

  constructor(
    readonly apiUrl: string = DEFAULT_API_URL,
    options: WikibaseSessionOptions = {},
  ) {
    this.http = options.http ?? createHttpClient();
    this.logger = options.logger ?? consoleLogger;
    this.loginReturnUrl = options.loginReturnUrl ?? "http://127.0.0.1:5000/";
  }

  async login(user: string, password: string): Promise<void> {
    const tokens = loginTokenResponse.safeParse(
      await this.callApi({
        action: "query",
        meta: "tokens",
        type: "login",
      }, undefined, "GET"),
    );
    if (!tokens.success) {
      throw new RemoteFaultError("bad-response", "No login token in response");
    }

    const answer = clientLoginResponse.safeParse(
      await this.callApi({ action: "clientlogin" }, {
        username: user,
        password,
        loginreturnurl: this.loginReturnUrl,
        logintoken: tokens.data.query.tokens.logintoken,
      }),
    );
    if (!answer.success) {
      throw new RemoteFaultError("bad-response", "Unexpected clientlogin answer");
    }

    const { status, username, messagecode, message } = answer.data.clientlogin;
    if (status !== "PASS") {
      throw new AuthenticationError(
        `Failed to log into Wikibase at "${this.apiUrl}": ${messagecode ?? status}`,
        { details: { user, status, messagecode, message } },
      );
    }
    this.csrfToken = undefined;
    this.logger.log(`Login success! Welcome, ${username ?? user}!`);
  }

  createItem(labels: LanguageMap, descriptions: LanguageMap): Promise<string> {
    return this.createEntity("item", entityData(labels, descriptions));
  }

  createProperty(
    labels: LanguageMap,
    descriptions: LanguageMap,
    datatype: PropertyDatatype,
  ): Promise<string> {
    return this.createEntity("property", {
      ...entityData(labels, descriptions),
      datatype,
    });
  }

  addClaim(entityId: string, claim: Claim): Promise<void> {
    return this.addClaims(entityId, [claim]);
  }

  async addClaims(entityId: string, claims: Claim[]): Promise<void> {
    if (claims.length === 0) return;
    await this.editEntity({ id: entityId }, {
      claims: claims.map(toStatement),
    });
  }

  /** Removes labels, descriptions and claims from an entity. */
  async clearEntity(entityId: string): Promise<void> {
    this.logger.log(`- Clearing ${entityId} ...`);
    await this.editEntity({ id: entityId, clear: "true" }, {});
  }

  private async createEntity(
    kind: EntityKind,
    data: Record<string, unknown>,
  ): Promise<string> {
    this.logger.debug(`Creating ${kind}: ${JSON.stringify(data)}`);
    try {
      return await this.editEntity({ new: kind, clear: "true" }, data);
    } catch (error) {
      const existing = error instanceof RemoteFaultError
        ? conflictingEntity(error, kind)
        : undefined;
      if (!existing) throw error;

      // The label is taken: take that entity over. Recording the identifier
      // fails if it already represents another subject.
      this.logger.log(`- ${kind} ${existing} already has this label, reusing it`);
      await this.clearEntity(existing);
      return this.editEntity({ id: existing }, data);
    }
  }

  private async editEntity(
    target: Params,
    data: Record<string, unknown>,
  ): Promise<string> {
    const answer = await this.callApi(
      { action: "wbeditentity", ...target, data: JSON.stringify(data) },
      { token: await this.requestToken() },
    );

    const failure = apiErrorResponse.safeParse(answer);
    if (failure.success) {
      const { code, info } = failure.data.error;
      throw new RemoteFaultError(code, `wbeditentity failed: ${code} - ${info}`, {
        details: { target, info },
      });
    }

    const edited = editEntityResponse.safeParse(answer);
    if (!edited.success) {
      throw new RemoteFaultError("bad-response", "wbeditentity returned no entity", {
        details: { target },
      });
    }
    return edited.data.entity.id;
  }

  private async requestToken(): Promise<string> {
    if (this.csrfToken) return this.csrfToken;
    const answer = csrfTokenResponse.safeParse(
      await this.callApi({ action: "query", meta: "tokens" }, undefined, "GET"),
    );
    if (!answer.success) {
      throw new RemoteFaultError("bad-response", "No CSRF token in response");
    }
    this.csrfToken = answer.data.query.tokens.csrftoken;
    return this.csrfToken;
  }

  private async callApi(
    params: Params,
    data?: Params,
    method: "GET" | "POST" = "POST",
  ): Promise<unknown> {
    const url = new URL(this.apiUrl);
    for (const [key, value] of Object.entries({ ...params, format: "json" })) {
      url.searchParams.set(key, value);
    }

    const cookie = await this.cookies.getCookieString(url.href);
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: url.href,
        method,
        headers: cookie ? { Cookie: cookie } : {},
        data: data ? new URLSearchParams(data) : undefined,
      });
    } catch (error) {
      const status = failedStatus(error);
      if (status !== undefined) {
        throw new RemoteFaultError(
          `http-${status}`,
          `${params.action} failed with HTTP ${status}`,
          { cause: error },
        );
      }
      throw new NetworkError(`Cannot reach ${this.apiUrl}`, {
        cause: error,
        details: { action: params.action },
      });
    }

    for (const header of setCookieHeaders(response.headers)) {
      await this.cookies.setCookie(header, url.href, { ignoreError: true });
    }
    if (typeof response.data === "string") {
      throw new RemoteFaultError("bad-response", `${params.action} did not return JSON`);
    }
    return response.data;
  }
}

function languageValues(values: LanguageMap) {
  return Object.fromEntries(
    Object.entries(values).map((
      [language, value],
    ) => [language, { language, value }]),
  );
}

/** Cuts long descriptions by code point, so no surrogate pair is split. */
export function truncateDescription(description: string): string {
  const characters = [...description];
  return characters.length > MAX_DESCRIPTION_LENGTH
    ? characters.slice(0, MAX_DESCRIPTION_LENGTH - 3).join("") + "..."
    : description;
}

export function entityData(labels: LanguageMap, descriptions: LanguageMap) {
  const truncated: LanguageMap = {};
  for (const [language, value] of Object.entries(descriptions)) {
    truncated[language] = truncateDescription(value);
  }
  return {
    labels: languageValues(labels),
    descriptions: languageValues(truncated),
  };
}

function datavalue(value: ClaimValue) {
  switch (value.type) {
    case "string":
    case "url":
      return { value: value.value, type: "string" };
    case "entity":
      return {
        value: {
          "entity-type": entityKindOf(value.id),
          "numeric-id": Number(value.id.slice(1)),
          id: value.id,
        },
        type: "wikibase-entityid",
      };
    case "quantity":
      return {
        value: {
          amount: value.amount,
          unit: value.unit,
        },
        type: "quantity",
      };
  }
}

function snakDatatype(value: ClaimValue): PropertyDatatype {
  if (value.type === "entity") {
    return entityKindOf(value.id) === "property"
      ? "wikibase-property"
      : "wikibase-item";
  }
  return value.type;
}

/** Wikibase statement JSON for a claim. */
export function toStatement(claim: Claim) {
  return {
    mainsnak: {
      snaktype: "value",
      property: claim.property,
      datatype: snakDatatype(claim.value),
      datavalue: datavalue(claim.value),
    },
    type: "statement",
    rank: "normal",
  };
}

function conflictingEntity(
  error: RemoteFaultError,
  kind: EntityKind,
): string | undefined {
  const info = error.details["info"];
  if (typeof info !== "string" || !info.includes(" already has ")) {
    return undefined;
  }
  const pattern = kind === "item"
    ? /\[\[(?:Item:)?(Q[0-9]+)/
    : /\[\[Property:(P[0-9]+)/;
  return pattern.exec(info)?.[1];
}
