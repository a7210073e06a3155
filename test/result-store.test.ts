import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ResultStore } from "../benchmark/src/result-store.js";
import { ValidationError } from "../src/index.js";

describe("ResultStore", () => {
  it("overwrites a result recorded under the same name", () => {
    const store = new ResultStore();
    store.record("connection", { avgMs: 5, samples: 10, extra: {} });
    store.record("connection", { avgMs: 3, samples: 8, extra: {} });

    expect(store.size).toBe(1);
    expect(store.get("connection")?.avgMs).toBe(3);
  });

  it("freezes recorded results", () => {
    const store = new ResultStore();
    store.record("connection", { avgMs: 1, samples: 1, extra: { failures: 0 } });

    expect(Object.isFrozen(store.get("connection"))).toBe(true);
    expect(Object.isFrozen(store.get("connection")?.extra)).toBe(true);
  });

  it("serializes with sorted names and a fixed field order", () => {
    const store = new ResultStore();
    store.record("b", { avgMs: 2, samples: 1, extra: { z: 1, a: "x" } });
    store.record("a", { avgMs: 1, minMs: 0.5, maxMs: 1.5, samples: 2, extra: {} });

    expect(store.serialize()).toBe(
      [
        "{",
        '  "a": {',
        '    "name": "a",',
        '    "avgMs": 1,',
        '    "minMs": 0.5,',
        '    "maxMs": 1.5,',
        '    "samples": 2,',
        '    "extra": {}',
        "  },",
        '  "b": {',
        '    "name": "b",',
        '    "avgMs": 2,',
        '    "samples": 1,',
        '    "extra": {',
        '      "a": "x",',
        '      "z": 1',
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("loads what it serialized", () => {
    const store = new ResultStore();
    store.record("query_1", { avgMs: 1.25, samples: 10, extra: { query: "SELECT 1", failures: 0 } });
    store.record("memory_usage", {
      avgMs: 0,
      samples: 0,
      extra: { testDataSizeMb: 1, status: "failed" },
    });

    const loaded = ResultStore.load(store.serialize());

    expect(loaded.toJSON()).toEqual(store.toJSON());
  });

  it("rejects text that is not JSON", () => {
    expect(() => ResultStore.load("{")).toThrow(ValidationError);
    expect(() => ResultStore.load("{")).toThrow("Results are not valid JSON");
  });

  it("rejects malformed results", () => {
    const text = JSON.stringify({ connection: { name: "connection", avgMs: -1, samples: 1 } });

    expect(() => ResultStore.load(text)).toThrow(ValidationError);
  });

  it("rejects a result stored under another name", () => {
    const text = JSON.stringify({ a: { name: "b", avgMs: 1, samples: 1, extra: {} } });

    expect(() => ResultStore.load(text)).toThrow("Result stored under 'a' is named 'b'");
  });

  describe("files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "vectra-results-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("saves into missing directories and loads back", () => {
      const file = path.join(dir, "runs", "latest.json");
      const store = new ResultStore();
      store.record("connection", { avgMs: 2, minMs: 1, maxMs: 3, samples: 10, extra: {} });

      store.save(file);

      expect(ResultStore.loadFile(file).get("connection")).toEqual({
        name: "connection",
        avgMs: 2,
        minMs: 1,
        maxMs: 3,
        samples: 10,
        extra: {},
      });
    });
  });

  describe("summarize()", () => {
    it("reports when there is nothing to summarize", () => {
      expect(new ResultStore().summarize()).toEqual(["No test results available."]);
    });

    it("orders known families and omits the rest", () => {
      const store = new ResultStore();
      store.record("stress_large_data", { avgMs: 12.5, samples: 10, extra: { dataSizeKb: 100 } });
      store.record("concurrent_20", { avgMs: 1, samples: 20, extra: { throughputOpsPerSec: 100 } });
      store.record("vector_search_50", { avgMs: 3, samples: 10, extra: { limit: 50 } });
      store.record("vector_search_5", { avgMs: 2, samples: 10, extra: { limit: 5 } });
      store.record("query_10", { avgMs: 4, samples: 10, extra: {} });
      store.record("query_2", { avgMs: 1.5, samples: 10, extra: {} });
      store.record("data_insertion_1000b", { avgMs: 4, samples: 10, extra: { throughputKbs: 244.140625 } });
      store.record("data_insertion_100b", { avgMs: 2, samples: 10, extra: { throughputKbs: 48.828125 } });
      store.record("stress_rapid_operations", { avgMs: 0.5, samples: 50, extra: {} });
      store.record("table_creation", { avgMs: 2, samples: 5, extra: {} });
      store.record("connection", { avgMs: 1.25, samples: 10, extra: {} });
      store.record("memory_usage", { avgMs: 0, samples: 0, extra: { status: "completed" } });
      store.record("warmup", { avgMs: 9, samples: 1, extra: {} });

      expect(store.summarize()).toEqual([
        "Connection: 1.25ms avg",
        "Table Creation: 2.00ms avg",
        "100B Data Insertion: 2.00ms avg, 48.83 KB/s",
        "1000B Data Insertion: 4.00ms avg, 244.14 KB/s",
        "Query 2: 1.50ms avg",
        "Query 10: 4.00ms avg",
        "Vector Search (limit 5): 2.00ms avg",
        "Vector Search (limit 50): 3.00ms avg",
        "Concurrent 20: 100.00 ops/sec",
        "Rapid Operations: 0.50ms avg",
        "Large Data (100KB): 12.50ms avg",
      ]);
    });
  });
});
