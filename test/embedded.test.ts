import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createClient, TransportError } from "../src/index.js";
import type { TransportClient } from "../src/index.js";
import { EmbeddedEngine, NotFoundError } from "../src/engine.js";
import { openEngine } from "../src/embedded.js";

describe("EmbeddedEngine", () => {
  let engine: EmbeddedEngine;

  beforeEach(() => {
    engine = new EmbeddedEngine(":memory:");
  });

  afterEach(() => {
    engine.close();
  });

  it("returns rows for readers and change counts for writers", () => {
    engine.createTable("people", "id INTEGER PRIMARY KEY, name TEXT");

    const insert = engine.query("INSERT INTO people (name) VALUES ('Alice'), ('Bob')");
    expect(insert.data).toEqual([]);
    expect(insert.meta.changes).toBe(2);

    const select = engine.query("SELECT id, name FROM people ORDER BY id");
    expect(select.data).toEqual([
      { id: 1, name: "Alice" },
      { id: 2, name: "Bob" },
    ]);
    expect(select.meta.count).toBe(2);
  });

  it("creates tables and adds columns on insert", () => {
    engine.insertRows("events", [{ kind: "click" }]);
    engine.insertRows("events", [{ kind: "view", page: "/home" }]);

    expect(engine.tableInfo("events").columns).toEqual(["kind", "page"]);
    expect(engine.query("SELECT kind, page FROM events").data).toEqual([
      { kind: "click", page: null },
      { kind: "view", page: "/home" },
    ]);
  });

  it("stores booleans as integers and objects as JSON", () => {
    engine.insertRows("flags", [{ enabled: true, tags: ["a", "b"] }]);

    expect(engine.query("SELECT enabled, tags FROM flags").data).toEqual([
      { enabled: 1, tags: '["a","b"]' },
    ]);
  });

  it("hides internal tables", () => {
    engine.createTable("docs", "body TEXT");

    expect(engine.listTables()).toEqual(["docs"]);
  });

  it("measures rows and bytes", () => {
    engine.insertRows("notes", [{ text: "abcd" }, { text: "ef" }]);

    const info = engine.tableInfo("notes");
    expect(info.rows).toBe(2);
    expect(info.sizeBytes).toBe(6);
    expect(info.createdAt).not.toBeNull();

    expect(engine.stats()).toEqual({ totalTables: 1, totalRows: 2, totalSizeBytes: 6 });
  });

  it("raises NotFoundError for unknown tables", () => {
    expect(() => engine.tableInfo("missing")).toThrow(NotFoundError);
  });

  it("rejects reserved and invalid table names", () => {
    expect(() => engine.createTable("_vectra_x", "a TEXT")).toThrow(
      "Table name is reserved: _vectra_x"
    );
    expect(() => engine.insertRows("bad-name", [{ a: 1 }])).toThrow("Invalid table name: bad-name");
  });

  it("cancels subscriptions idempotently", () => {
    const subscription = engine.subscribe("orders");
    expect(subscription.id).toMatch(/^sub_/);
    expect(engine.subscriptionStatus(subscription.id)).toBe("active");

    engine.unsubscribe(subscription.id);
    engine.unsubscribe(subscription.id);

    expect(engine.subscriptionStatus(subscription.id)).toBe("cancelled");
    expect(() => engine.unsubscribe("sub_unknown")).toThrow(NotFoundError);
  });

  it("reports whether an index was dropped", () => {
    engine.insertRows("docs", [{ body: "hello" }]);
    const id = engine.createIndex("docs", "body");

    expect(engine.dropIndex(id)).toBe(true);
    expect(engine.dropIndex(id)).toBe(false);
  });

  it("rejects an index on a missing column", () => {
    engine.insertRows("docs", [{ body: "hello" }]);

    expect(() => engine.createIndex("docs", "title")).toThrow("Column not found: docs.title");
  });
});

describe("Embedded transport", () => {
  let client: TransportClient;

  beforeEach(async () => {
    client = await createClient({ mode: "embedded", dataPath: ":memory:" });
  });

  afterEach(() => {
    client.close();
  });

  it("round-trips tables, rows and queries", async () => {
    await client.createTable("docs", "id INTEGER, body TEXT");
    await client.insertData("docs", [
      { id: 1, body: "first" },
      { id: 2, body: "second" },
    ]);

    const result = await client.executeQuery("SELECT id, body FROM docs WHERE id > 1");

    expect(result).toMatchObject({ data: [{ id: 2, body: "second" }], meta: { count: 1 } });
    expect(await client.listTables()).toEqual(["docs"]);
    expect(await client.getStats()).toMatchObject({ totalTables: 1, totalRows: 2 });
  });

  it("wraps engine errors with the operation phrase", async () => {
    await expect(client.getTableInfo("nope")).rejects.toThrow(
      "Failed to get table info: Table not found: nope"
    );
    await expect(client.executeQuery("SELEC 1")).rejects.toThrow(TransportError);
  });

  it("finds indexed text by similarity", async () => {
    await client.insertData("docs", [
      { id: 1, body: "machine learning models" },
      { id: 2, body: "cooking pasta recipes" },
    ]);
    const index = await client.createVectorIndex("docs", "body");
    expect(index.id).toMatch(/^idx_/);

    const result = await client.vectorSearch("machine learning models", 2);

    expect(result.query).toBe("machine learning models");
    expect(result.limit).toBe(2);
    expect(result.results[0].metadata.text).toBe("machine learning models");
    expect(result.results[0].score).toBeCloseTo(1, 6);
  });

  it("indexes rows inserted after the index exists", async () => {
    await client.insertData("docs", { id: 1, body: "cooking pasta recipes" });
    await client.createVectorIndex("docs", "body");
    await client.insertData("docs", { id: 2, body: "deep learning" });

    const result = await client.vectorSearch("deep learning", 1);

    expect(result.results).toHaveLength(1);
    expect(result.results[0].metadata.text).toBe("deep learning");
  });

  it("searches raw vectors through an index handle", async () => {
    await client.insertData("docs", { id: 1, body: "hello" });
    const index = await client.createVectorIndex("docs", "body");
    await index.insertVector("v1", [1, 0, 0], { label: "x-axis" });
    await index.insertVector("v2", [0, 1, 0]);

    const result = await index.search([1, 0, 0], 1);

    expect(result).toEqual({
      results: [{ id: "v1", score: 1, metadata: { label: "x-axis" } }],
      limit: 1,
    });
  });

  it("fails to search a deleted index", async () => {
    await client.insertData("docs", { id: 1, body: "hello" });
    const index = await client.createVectorIndex("docs", "body");
    await index.deleteIndex();

    await expect(index.search([1, 0])).rejects.toThrow(
      `Failed to search vector index: Index not found: ${index.id}`
    );
  });

  it("subscribes and unsubscribes", async () => {
    const subscription = await client.subscribeStream("orders");

    expect(subscription.status).toBe("active");
    await expect(subscription.unsubscribe()).resolves.toBeUndefined();
  });

  it("reports health locally", async () => {
    const health = await client.healthCheck();
    expect(health.status).toBe("healthy");
  });
});

describe("openEngine()", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vectra-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the data directory and database file", () => {
    const dataPath = path.join(dir, "nested");
    const engine = openEngine(dataPath);
    engine.insertRows("docs", [{ body: "persisted" }]);
    engine.close();

    expect(fs.existsSync(path.join(dataPath, "vectra.db"))).toBe(true);

    const reopened = openEngine(dataPath);
    expect(reopened.query("SELECT body FROM docs").data).toEqual([{ body: "persisted" }]);
    reopened.close();
  });
});
