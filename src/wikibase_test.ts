import { test } from "node:test";
import assert from "node:assert/strict";
import { AxiosError } from "axios";
import {
  AuthenticationError,
  NetworkError,
  RemoteFaultError,
} from "./errors.ts";
import { HTTP_TIMEOUT } from "./http.ts";
import { MemoryWikibase } from "./memoryWikibase.ts";
import {
  entityData,
  toStatement,
  truncateDescription,
  WikibaseSession,
} from "./wikibase.ts";
import {
  captureLogger,
  type FakeResponse,
  fakeHttp,
  jsonResponse,
  type RecordedRequest,
  textResponse,
} from "../test/utils.ts";

const API_URL = "http://wikibase.example.org/w/api.php";

/** Answers token queries and a successful login; `edit` handles the rest. */
function wikibase(edit: (request: RecordedRequest) => FakeResponse = () =>
  jsonResponse({ entity: { id: "Q1" } })
) {
  return fakeHttp((request) => {
    const action = request.url.searchParams.get("action");
    if (action === "query") {
      return request.url.searchParams.get("type") === "login"
        ? jsonResponse({ query: { tokens: { logintoken: "login-token+\\" } } }, 200, {
          "Set-Cookie": "wikisession=abc123; path=/; HttpOnly",
        })
        : jsonResponse({ query: { tokens: { csrftoken: "csrf-token+\\" } } });
    }
    if (action === "clientlogin") {
      return jsonResponse({
        clientlogin: { status: "PASS", username: "Bot" },
      });
    }
    return edit(request);
  });
}

test("Wikibase session", async (t) => {
  await t.test("logs in with a login token and keeps the cookie", async () => {
    const { http, requests } = wikibase();
    const { logger, lines } = captureLogger();
    const session = new WikibaseSession(API_URL, { http, logger });

    await session.login("bot", "test-secret");

    assert.equal(requests.length, 2);
    assert.equal(requests[0].method, "GET");
    assert.equal(requests[0].url.searchParams.get("format"), "json");
    assert.equal(requests[1].method, "POST");
    assert.equal(requests[1].url.searchParams.get("action"), "clientlogin");
    assert.equal(requests[1].body.get("username"), "bot");
    assert.equal(requests[1].body.get("password"), "test-secret");
    assert.equal(requests[1].body.get("logintoken"), "login-token+\\");
    assert.equal(requests[1].headers.get("Cookie"), "wikisession=abc123");
    assert.deepEqual(lines.log, ["Login success! Welcome, Bot!"]);
  });

  await t.test("drops cookies the server expires", async () => {
    const { http, requests } = fakeHttp((request) => {
      const action = request.url.searchParams.get("action");
      if (action === "query" && request.url.searchParams.get("type") === "login") {
        return jsonResponse({ query: { tokens: { logintoken: "login-token" } } }, 200, {
          "Set-Cookie": ["wikisession=abc123; Path=/", "wikitrace=t1; Path=/"],
        });
      }
      if (action === "clientlogin") {
        return jsonResponse({ clientlogin: { status: "PASS" } }, 200, {
          "Set-Cookie": "wikisession=deleted; Max-Age=0; Path=/",
        });
      }
      return action === "query"
        ? jsonResponse({ query: { tokens: { csrftoken: "csrf-token" } } })
        : jsonResponse({ entity: { id: "Q1" } });
    });
    const session = new WikibaseSession(API_URL, {
      http,
      logger: captureLogger().logger,
    });

    await session.login("bot", "test-secret");
    await session.createItem({ en: "Lamp" }, {});

    assert.deepEqual(
      requests.map((request) => request.headers.get("Cookie")),
      [null, "wikisession=abc123; wikitrace=t1", "wikitrace=t1", "wikitrace=t1"],
    );
    assert.ok(requests.every((request) => request.timeout === HTTP_TIMEOUT));
  });

  await t.test("rejects failed logins", async () => {
    const { http } = fakeHttp((request) =>
      request.url.searchParams.get("action") === "query"
        ? jsonResponse({ query: { tokens: { logintoken: "login-token" } } })
        : jsonResponse({
          clientlogin: { status: "FAIL", messagecode: "wrongpassword" },
        })
    );
    const session = new WikibaseSession(API_URL, { http });

    await assert.rejects(
      session.login("bot", "wrong"),
      (error: unknown) =>
        error instanceof AuthenticationError &&
        error.exitCode === 2 &&
        error.message ===
          `Failed to log into Wikibase at "${API_URL}": wrongpassword`,
    );
  });

  await t.test("creates items through wbeditentity", async () => {
    const { http, requests } = wikibase(() =>
      jsonResponse({ entity: { id: "Q42" } })
    );
    const { logger } = captureLogger();
    const session = new WikibaseSession(API_URL, { http, logger });

    const first = await session.createItem({ en: "Lamp" }, { en: "Gives light" });
    await session.createItem({ en: "Bulb" }, {});

    assert.equal(first, "Q42");
    const edits = requests.filter((request) =>
      request.url.searchParams.get("action") === "wbeditentity"
    );
    const tokenQueries = requests.filter((request) =>
      request.url.searchParams.get("action") === "query"
    );
    assert.equal(edits.length, 2);
    assert.equal(tokenQueries.length, 1);

    const params = edits[0].url.searchParams;
    assert.equal(params.get("new"), "item");
    assert.equal(params.get("clear"), "true");
    assert.deepEqual(JSON.parse(params.get("data") ?? "null"), {
      labels: { en: { language: "en", value: "Lamp" } },
      descriptions: { en: { language: "en", value: "Gives light" } },
    });
    assert.equal(edits[0].body.get("token"), "csrf-token+\\");
  });

  await t.test("creates properties with their datatype", async () => {
    const { http, requests } = wikibase(() =>
      jsonResponse({ entity: { id: "P9" } })
    );
    const session = new WikibaseSession(API_URL, {
      http,
      logger: captureLogger().logger,
    });

    assert.equal(await session.createProperty({ en: "mass" }, {}, "quantity"), "P9");
    const data = requests.at(-1)?.url.searchParams.get("data") ?? "null";
    assert.equal(JSON.parse(data).datatype, "quantity");
    assert.equal(requests.at(-1)?.url.searchParams.get("new"), "property");
  });

  await t.test("takes over an entity that already has the label", async () => {
    let edits = 0;
    const { http, requests } = wikibase(() => {
      edits++;
      return edits === 1
        ? jsonResponse({
          error: {
            code: "modification-failed",
            info:
              "Item [[Item:Q5|Q5]] already has label \"Lamp\" associated with language code en.",
          },
        })
        : jsonResponse({ entity: { id: "Q5" } });
    });
    const { logger } = captureLogger();
    const session = new WikibaseSession(API_URL, { http, logger });

    assert.equal(await session.createItem({ en: "Lamp" }, {}), "Q5");

    const targets = requests
      .filter((request) => request.url.searchParams.get("action") === "wbeditentity")
      .map((request) => ({
        id: request.url.searchParams.get("id"),
        clear: request.url.searchParams.get("clear"),
      }));
    assert.deepEqual(targets, [
      { id: null, clear: "true" },
      { id: "Q5", clear: "true" },
      { id: "Q5", clear: null },
    ]);
  });

  await t.test("adds all claims of an entity in one edit", async () => {
    const { http, requests } = wikibase();
    const session = new WikibaseSession(API_URL, {
      http,
      logger: captureLogger().logger,
    });

    await session.addClaims("Q1", [
      { property: "P1", value: { type: "string", value: "MIT" } },
      { property: "P2", value: { type: "entity", id: "Q2" } },
    ]);
    await session.addClaims("Q1", []);

    const edits = requests.filter((request) =>
      request.url.searchParams.get("action") === "wbeditentity"
    );
    assert.equal(edits.length, 1);
    assert.equal(edits[0].url.searchParams.get("id"), "Q1");
    const data = JSON.parse(edits[0].url.searchParams.get("data") ?? "null");
    assert.equal(data.claims.length, 2);
  });

  await t.test("turns API errors into RemoteFaultErrors", async () => {
    const { http } = wikibase(() =>
      jsonResponse({ error: { code: "badtoken", info: "Invalid CSRF token." } })
    );
    const session = new WikibaseSession(API_URL, { http });

    await assert.rejects(
      session.addClaim("Q1", {
        property: "P1",
        value: { type: "string", value: "MIT" },
      }),
      (error: unknown) =>
        error instanceof RemoteFaultError && error.remoteCode === "badtoken",
    );
  });

  await t.test("turns HTTP failures into RemoteFaultErrors", async () => {
    const { http } = fakeHttp(() => textResponse("down", 503));
    const session = new WikibaseSession(API_URL, { http });

    await assert.rejects(
      session.login("bot", "test-secret"),
      (error: unknown) =>
        error instanceof RemoteFaultError && error.remoteCode === "http-503",
    );
  });

  await t.test("turns unreachable hosts into NetworkErrors", async () => {
    const { http } = fakeHttp(() => {
      throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED");
    });
    const session = new WikibaseSession(API_URL, { http });

    await assert.rejects(session.login("bot", "test-secret"), NetworkError);
  });
});

test("Statement JSON", async (t) => {
  await t.test("strings and urls are plain strings", () => {
    assert.deepEqual(
      toStatement({
        property: "P3",
        value: { type: "url", value: "https://example.org/lamp" },
      }),
      {
        mainsnak: {
          snaktype: "value",
          property: "P3",
          datatype: "url",
          datavalue: { value: "https://example.org/lamp", type: "string" },
        },
        type: "statement",
        rank: "normal",
      },
    );
  });

  await t.test("entities carry their numeric id", () => {
    assert.deepEqual(
      toStatement({ property: "P1", value: { type: "entity", id: "P12" } })
        .mainsnak,
      {
        snaktype: "value",
        property: "P1",
        datatype: "wikibase-property",
        datavalue: {
          value: { "entity-type": "property", "numeric-id": 12, id: "P12" },
          type: "wikibase-entityid",
        },
      },
    );
  });

  await t.test("quantities are signed", () => {
    assert.deepEqual(
      toStatement({
        property: "P4",
        value: { type: "quantity", amount: "+0.5", unit: "1" },
      }).mainsnak.datavalue,
      { value: { amount: "+0.5", unit: "1" }, type: "quantity" },
    );
  });

  await t.test("long descriptions are cut", () => {
    const long = "x".repeat(300);
    assert.equal(truncateDescription(long), "x".repeat(247) + "...");
    assert.equal(truncateDescription("short"), "short");
    const gears = "\u{2699}\u{1F527}".repeat(150);
    const cut = truncateDescription(gears);
    assert.equal([...cut].length, 250);
    assert.equal(cut, "\u{2699}\u{1F527}".repeat(123) + "\u{2699}...");
    assert.deepEqual(entityData({ en: "Lamp" }, { en: long }).descriptions, {
      en: { language: "en", value: "x".repeat(247) + "..." },
    });
  });
});

test("Memory Wikibase", async (t) => {
  await t.test("skips identifiers that already exist", async () => {
    const client = new MemoryWikibase({ existing: [{ id: "Q1" }, { id: "P1" }] });

    assert.equal(await client.createItem({ en: "Lamp" }, {}), "Q2");
    assert.equal(await client.createProperty({ en: "mass" }, {}, "quantity"), "P2");
    assert.equal(client.createdCount, 2);
    assert.deepEqual(client.findByLabel("Lamp").map((entity) => entity.id), ["Q2"]);
  });

  await t.test("checks credentials when accounts are given", async () => {
    const client = new MemoryWikibase({ accounts: { bot: "test-secret" } });
    await client.login("bot", "test-secret");
    await assert.rejects(client.login("bot", "wrong"), AuthenticationError);
  });

  await t.test("refuses claims that point nowhere", async () => {
    const client = new MemoryWikibase({ existing: [{ id: "Q1" }, { id: "P1" }] });
    await assert.rejects(
      client.addClaim("Q1", { property: "P1", value: { type: "entity", id: "Q9" } }),
      (error: unknown) =>
        error instanceof RemoteFaultError && error.remoteCode === "no-such-entity",
    );
    await client.addClaim("Q1", {
      property: "P1",
      value: { type: "string", value: "MIT" },
    });
    assert.equal(client.entities.get("Q1")?.claims.length, 1);
  });
});
