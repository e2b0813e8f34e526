import { describe, test, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert";
import Client from "../client/client";
import { EMPTY_BODY, jsonBody } from "../models/body";
import { Json } from "../json/json";
import { JsonParseError } from "../json/token/json-token-error";
import { jsonMiddleware } from "../middleware/json-middleware";
import { HttpStatusError, statusMiddleware } from "../middleware/status-middleware";
import { loggingMiddleware } from "../middleware/logging-middleware";
import { CACHE_HIT, cacheMiddleware } from "../middleware/cache-middleware";
import { MemoryCacheRepository } from "../middleware/cache-repository";
import {
  combineValidators,
  DEFAULT_CACHE_TTL,
  matchHeaders,
  matchMethod,
  type CacheEntry,
} from "../middleware/cache-validator";
import type { ClientRequest } from "../models/request-params";
import { configureLogging, createLogger, resetLogging, type LogEntry } from "../utils/logger";
import TestAdapter from "./__mocks__/test-adapter";

const JSON_HEADERS = { "content-type": "application/json; charset=utf-8" };

describe("jsonMiddleware", () => {
  let engine: TestAdapter;

  beforeEach(() => {
    engine = new TestAdapter();
  });

  test("parses JSON responses", async () => {
    engine.respondOnce(200, '{"id": 7, "price": 19.990}', JSON_HEADERS);

    const call = await new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
      url: "http://example.com/items/7",
    });

    const body = call.requireResponse().body;
    assert.strictEqual(body.type, "json");
    if (body.type === "json") {
      assert.ok(Json.equals(body.json, Json.from({ id: 7, price: 19.99 })));
      assert.strictEqual(Json.stringify(body.json), '{"id":7,"price":19.990}');
    }
  });

  for (const contentType of ["text/json", "application/x-json", "APPLICATION/JSON"]) {
    test(`recognizes ${contentType}`, async () => {
      engine.respondOnce(200, "[1]", { "content-type": contentType });

      const call = await new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
        url: "http://example.com/list",
      });

      assert.strictEqual(call.requireResponse().body.type, "json");
    });
  }

  test("leaves other content types as text", async () => {
    engine.respondOnce(200, "[1]", { "content-type": "application/vnd.api+json" });

    const call = await new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
      url: "http://example.com/list",
    });

    assert.deepStrictEqual(call.requireResponse().body, { type: "text", text: "[1]" });
  });

  test("leaves responses as text when response parsing is off", async () => {
    engine.respondOnce(200, "[1]", JSON_HEADERS);

    const call = await new Client({
      engine,
      middlewares: [jsonMiddleware({ response: false })],
    }).fetch({ url: "http://example.com/list" });

    assert.deepStrictEqual(call.requireResponse().body, { type: "text", text: "[1]" });
  });

  test("aborts the call on malformed JSON", async () => {
    engine.respondOnce(200, '{"a":}', JSON_HEADERS);

    await assert.rejects(
      new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
        url: "http://example.com/broken",
      }),
      (error: unknown) =>
        error instanceof JsonParseError &&
        error.index === 5 &&
        error.message === 'Unexpected token: {"a":<}>'
    );
  });

  test("labels JSON request bodies", async () => {
    engine.respondOnce(201);

    await new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
      url: "http://example.com/items",
      method: "POST",
      body: jsonBody(Json.from({ name: "lamp" })),
    });

    assert.deepStrictEqual(engine.getRequests()[0].headers, {
      "content-type": "application/json; charset=utf-8",
    });
    assert.strictEqual(engine.getRequests()[0].body, '{"name":"lamp"}');
  });

  test("keeps a content type set by the caller", async () => {
    engine.respondOnce(200);

    await new Client({ engine, middlewares: [jsonMiddleware()] }).fetch({
      url: "http://example.com/items/1",
      method: "PATCH",
      headers: { "Content-Type": "application/merge-patch+json" },
      body: jsonBody(Json.from({ name: null })),
    });

    assert.deepStrictEqual(engine.getRequests()[0].headers, {
      "content-type": "application/merge-patch+json",
    });
  });

  test("without request labelling the engine default applies", async () => {
    engine.respondOnce(200);

    await new Client({ engine, middlewares: [jsonMiddleware({ request: false })] }).fetch({
      url: "http://example.com/items",
      method: "POST",
      body: jsonBody(Json.from([1, 2])),
    });

    assert.deepStrictEqual(engine.getRequests()[0].headers, {
      "content-type": "application/json",
    });
  });

  test("injecting it twice has no further effect", async () => {
    engine.respondOnce(200, '{"ok":true}', JSON_HEADERS);
    const json = jsonMiddleware();

    const call = await new Client({ engine })
      .open({ url: "http://example.com/items", method: "PUT", body: jsonBody(Json.from({})) })
      .inject(json)
      .inject(json)
      .fetch();

    const body = call.requireResponse().body;
    assert.strictEqual(body.type, "json");
    if (body.type === "json") {
      assert.strictEqual(Json.stringify(body.json), '{"ok":true}');
    }
    assert.strictEqual(
      engine.getRequests()[0].headers["content-type"],
      "application/json; charset=utf-8"
    );
  });
});

describe("statusMiddleware", () => {
  let engine: TestAdapter;

  beforeEach(() => {
    engine = new TestAdapter();
  });

  test("passes 2xx and 3xx responses", async () => {
    engine.respondOnce(304);

    const call = await new Client({ engine, middlewares: [statusMiddleware()] }).fetch({
      url: "http://example.com/cached",
    });

    assert.strictEqual(call.requireResponse().status, 304);
  });

  test("aborts with an HttpStatusError otherwise", async () => {
    engine.respondOnce(404, "not here");

    await assert.rejects(
      new Client({ engine, middlewares: [statusMiddleware()] }).fetch({
        url: "http://example.com/missing",
      }),
      (error: unknown) =>
        error instanceof HttpStatusError &&
        error.status === 404 &&
        error.request.url === "http://example.com/missing" &&
        error.message === "Request GET http://example.com/missing failed with status 404"
    );
  });

  test("accepts statuses chosen by the caller", async () => {
    engine.respondOnce(404);

    const call = await new Client({
      engine,
      middlewares: [statusMiddleware({ accept: (status) => status === 404 })],
    }).fetch({ url: "http://example.com/missing" });

    assert.strictEqual(call.requireResponse().status, 404);
  });
});

describe("loggingMiddleware", () => {
  let engine: TestAdapter;
  let entries: LogEntry[];

  beforeEach(() => {
    engine = new TestAdapter();
    entries = [];
    configureLogging({ level: "info", sink: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    resetLogging();
  });

  test("logs the request and the response", async () => {
    engine.respondOnce(200, "ok");

    await new Client({
      engine,
      middlewares: [loggingMiddleware(createLogger("http"))],
    }).fetch({ url: "http://example.com/items" });

    assert.deepStrictEqual(
      entries.map(({ level, component, msg }) => ({ level, component, msg })),
      [
        { level: "info", component: "http", msg: "sending request" },
        { level: "info", component: "http", msg: "response received" },
      ]
    );
    assert.deepStrictEqual(entries[0].meta, {
      method: "GET",
      url: "http://example.com/items",
    });
    const meta = entries[1].meta ?? {};
    assert.strictEqual(meta.status, 200);
    assert.strictEqual(meta.engine, "test");
    assert.strictEqual(typeof meta.duration_ms, "number");
  });

  test("logs failed calls", async () => {
    engine.failOnce(new Error("connection reset"));

    await assert.rejects(
      new Client({
        engine,
        middlewares: [loggingMiddleware(createLogger("http"))],
      }).fetch({ url: "http://example.com/items" })
    );

    assert.deepStrictEqual(entries.map((entry) => entry.msg), ["sending request", "request failed"]);
    assert.deepStrictEqual(entries[1].level, "error");
    assert.deepStrictEqual(entries[1].meta, {
      method: "GET",
      url: "http://example.com/items",
      error: { name: "Error", message: "connection reset" },
    });
  });
});

describe("cacheMiddleware", () => {
  let engine: TestAdapter;

  beforeEach(() => {
    engine = new TestAdapter();
  });

  test("answers a repeated call from the cache without the engine", async () => {
    engine.respondOnce(200, "fresh", { "content-type": "text/plain" });
    const client = new Client({ engine, middlewares: [cacheMiddleware()] });

    const first = await client.fetch({ url: "http://example.com/items" });
    const second = await client.fetch({ url: "http://example.com/items" });

    assert.strictEqual(engine.getRequests().length, 1);
    assert.strictEqual(first.engine, "test");
    assert.strictEqual(first.extras.has(CACHE_HIT), false);
    assert.strictEqual(second.engine, undefined);
    assert.strictEqual(second.extras.get(CACHE_HIT), true);
    assert.deepStrictEqual(second.requireResponse(), {
      status: 200,
      statusText: "",
      headers: { "content-type": "text/plain" },
      body: { type: "text", text: "fresh" },
    });
  });

  test("runs received pipes on cached responses", async () => {
    engine.respondOnce(200, '{"id":1}', JSON_HEADERS);
    const client = new Client({ engine, middlewares: [cacheMiddleware(), jsonMiddleware()] });

    await client.fetch({ url: "http://example.com/items/1" });
    const cached = await client.fetch({ url: "http://example.com/items/1" });

    assert.strictEqual(engine.getRequests().length, 1);
    const body = cached.requireResponse().body;
    assert.strictEqual(body.type, "json");
    if (body.type === "json") {
      assert.strictEqual(Json.stringify(body.json), '{"id":1}');
    }
  });

  test("sends requests with other headers to the engine", async () => {
    engine.respondOnce(200, "en").respondOnce(200, "de");
    const client = new Client({ engine, middlewares: [cacheMiddleware()] });

    await client.fetch({ url: "http://example.com/greeting", headers: { "Accept-Language": "en" } });
    const other = await client.fetch({
      url: "http://example.com/greeting",
      headers: { "Accept-Language": "de" },
    });

    assert.strictEqual(engine.getRequests().length, 2);
    assert.deepStrictEqual(other.requireResponse().body, { type: "text", text: "de" });
  });

  test("drops expired entries and asks the engine again", async () => {
    let now = 0;
    const repository = new MemoryCacheRepository({ now: () => now });
    engine.respondOnce(200, "old").respondOnce(200, "new");
    const client = new Client({ engine, middlewares: [cacheMiddleware({ repository })] });

    await client.fetch({ url: "http://example.com/items" });
    now = DEFAULT_CACHE_TTL - 1;
    const cached = await client.fetch({ url: "http://example.com/items" });
    now = DEFAULT_CACHE_TTL;
    const renewed = await client.fetch({ url: "http://example.com/items" });

    assert.deepStrictEqual(cached.requireResponse().body, { type: "text", text: "old" });
    assert.deepStrictEqual(renewed.requireResponse().body, { type: "text", text: "new" });
    assert.strictEqual(engine.getRequests().length, 2);
    assert.strictEqual(repository.size, 1);
  });

  test("does not store failed calls", async () => {
    const repository = new MemoryCacheRepository();
    engine.failOnce(new Error("connection reset"));

    await assert.rejects(
      new Client({ engine, middlewares: [cacheMiddleware({ repository })] }).fetch({
        url: "http://example.com/items",
      }),
      { message: "connection reset" }
    );

    assert.strictEqual(repository.size, 0);
  });

  describe("validators", () => {
    const request = (headers: Record<string, string>): ClientRequest => ({
      method: "GET",
      url: "http://example.com/items",
      headers,
      body: EMPTY_BODY,
    });
    const entry = (headers: Record<string, string>): CacheEntry => ({
      request: request(headers),
      response: { status: 200, statusText: "OK", headers: {}, body: EMPTY_BODY },
      createdAt: 0,
    });

    test("matchHeaders compares only the named header", () => {
      const validator = matchHeaders("Accept");

      assert.strictEqual(validator(request({ accept: "a", "x-id": "1" }), entry({ accept: "a" })), "valid");
      assert.strictEqual(validator(request({ accept: "b" }), entry({ accept: "a" })), "invalid");
    });

    test("matchHeaders without a name compares every header", () => {
      assert.strictEqual(matchHeaders()(request({ accept: "a" }), entry({ accept: "a" })), "valid");
      assert.strictEqual(
        matchHeaders()(request({ accept: "a", "x-id": "1" }), entry({ accept: "a" })),
        "invalid"
      );
    });

    test("combineValidators returns the first verdict that is not valid", () => {
      const validator = combineValidators(matchMethod, () => "expired", () => "invalid");

      assert.strictEqual(validator(request({}), entry({})), "expired");
    });
  });
});
