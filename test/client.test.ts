import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  createClient,
  IndexHandle,
  PlaceholderTransport,
  resolveConfig,
  TransportClient,
  TransportError,
  UnavailableTransportError,
  ValidationError,
} from "../src/index.js";
import type { SearchResultPayload } from "../src/index.js";

class OfflineIndexTransport extends PlaceholderTransport {
  async searchIndex(): Promise<SearchResultPayload> {
    throw new Error("offline");
  }
}

class CountingTransport extends PlaceholderTransport {
  unsubscribeCalls = 0;

  async unsubscribe(subscriptionId: string): Promise<void> {
    this.unsubscribeCalls++;
    return super.unsubscribe(subscriptionId);
  }
}

describe("TransportClient", () => {
  describe("placeholder mode", () => {
    let client: TransportClient;
    let logs: string[];

    beforeEach(async () => {
      logs = [];
      client = await createClient({ mode: "placeholder", log: (message) => logs.push(message) });
    });

    afterEach(() => {
      client.close();
    });

    it("reports its mode and address", () => {
      expect(client.mode).toBe("placeholder");
      expect(client.baseAddress).toBe(`http://${client.config.host}:${client.config.port}`);
      expect(Object.isFrozen(client.config)).toBe(true);
    });

    it("reports health with the status the server uses", async () => {
      const health = await client.healthCheck();

      expect(health.status).toBe("healthy");
      expect(health.timestamp).toBeDefined();
    });

    it("returns a canned query payload", async () => {
      const result = await client.executeQuery("SELECT 1");

      expect(result).toEqual({
        rows: 1,
        data: [{ result: "Query executed successfully", sql: "SELECT 1" }],
      });
    });

    it("caps sample hits at the limit", async () => {
      const result = await client.vectorSearch("anything", 1);

      expect(result).toEqual({
        results: [{ id: 1, score: 0.95, metadata: { text: "Sample result" } }],
        query: "anything",
        limit: 1,
      });
    });

    it("defaults the search limit to 10", async () => {
      const result = await client.vectorSearch("anything");

      expect(result.limit).toBe(10);
      expect(result.results).toHaveLength(2);
    });

    it("returns a subscription handle", async () => {
      const subscription = await client.subscribeStream("events");

      expect(subscription.id).toMatch(/^sub_[0-9a-f]{8}$/);
      expect(subscription.topic).toBe("events");
      expect(subscription.status).toBe("active");
      expect(logs).toEqual([`Subscribing to topic 'events' as ${subscription.id}`]);
    });

    it("returns an index handle that searches through the client", async () => {
      const index = await client.createVectorIndex("docs", "body");

      expect(index.id).toBe("docs.body");
      expect(index.table).toBe("docs");
      expect(index.column).toBe("body");
      expect(index.status).toBe("ready");

      const result = await index.search([0.1, 0.2, 0.3], 5);
      expect(result.limit).toBe(5);
      expect(result.results.length).toBeGreaterThan(0);
      expect(result.results.length).toBeLessThanOrEqual(5);
    });

    it("defaults the index search limit to 10", async () => {
      const index = await client.createVectorIndex("docs", "body");

      const result = await index.search([0.1]);

      expect(result.limit).toBe(10);
    });

    it("logs administrative calls", async () => {
      await client.createTable("docs", "id INTEGER");
      await client.insertData("docs", { id: 1 });
      const index = await client.createVectorIndex("docs", "body");
      await index.insertVector("v1", [1, 0]);
      await index.deleteIndex();

      expect(logs).toEqual([
        "Creating table 'docs' with schema: id INTEGER",
        "Inserting 1 row(s) into table 'docs'",
        "Creating vector index on docs.body",
        "Inserting vector v1 into index docs.body",
        "Deleting index docs.body",
      ]);
    });

    it("answers table info with sample data", async () => {
      expect(await client.getTableInfo("orders")).toEqual({
        name: "orders",
        rows: 1000,
        sizeBytes: 1024000,
        createdAt: "2024-01-01T00:00:00Z",
      });
    });

    it("rejects empty names", async () => {
      await expect(client.createTable("  ", "id INTEGER")).rejects.toThrow(ValidationError);
      await expect(client.subscribeStream("")).rejects.toThrow("Topic must not be empty");
      await expect(client.createVectorIndex("docs", "")).rejects.toThrow(
        "Column name must not be empty"
      );
    });
  });

  describe("resource handles", () => {
    it("unsubscribes only once", async () => {
      const transport = new CountingTransport(() => {});
      const client = new TransportClient(resolveConfig({ mode: "placeholder" }), transport);

      const subscription = await client.subscribeStream("events");
      await subscription.unsubscribe();
      await subscription.unsubscribe();

      expect(transport.unsubscribeCalls).toBe(1);
    });

    it("propagates transport errors unchanged", async () => {
      const client = new TransportClient(
        resolveConfig({ mode: "placeholder" }),
        new OfflineIndexTransport(() => {})
      );
      const index = new IndexHandle(client, "idx_1", "docs", "body", "ready");

      const err = await index.search([1, 0]).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      if (!(err instanceof TransportError)) return;
      expect(err.message).toBe("Failed to search vector index: offline");
      expect(err.operation).toBe("searchIndex");
    });
  });

  describe("embedded mode", () => {
    it("fails when the engine is unavailable", async () => {
      await expect(
        createClient({ mode: "embedded", embeddedAvailable: false })
      ).rejects.toThrow(UnavailableTransportError);
    });
  });
});
