// VectraEdge - Placeholder Transport
// Never leaves the process: administrative calls only emit a log line and
// reads answer with fixed sample data.

import { randomUUID } from "crypto";
import type {
  HealthStatus,
  IndexAck,
  Logger,
  ResultPayload,
  Row,
  SearchHit,
  SearchResultPayload,
  StorageStats,
  SubscriptionAck,
  TableInfo,
  Transport,
} from "./types.js";

const SAMPLE_HITS: readonly SearchHit[] = [
  { id: 1, score: 0.95, metadata: { text: "Sample result" } },
  { id: 2, score: 0.87, metadata: { text: "Another result" } },
];

const SAMPLE_TABLES = ["docs", "users", "products"];

/**
 * Transport for demonstrations and unit tests.
 *
 * `createTable`, `insertData`, `deleteIndex` and `unsubscribe` change no state
 * anywhere: each succeeds after writing one diagnostic line to `log`. Callers
 * must not read success as evidence that data was stored.
 */
export class PlaceholderTransport implements Transport {
  readonly kind = "placeholder" as const;

  constructor(private readonly log: Logger = console.log) {}

  async executeQuery(sql: string): Promise<ResultPayload> {
    return {
      rows: 1,
      data: [{ result: "Query executed successfully", sql }],
    };
  }

  async vectorSearch(query: string, limit: number): Promise<SearchResultPayload> {
    return { results: sampleHits(limit), query, limit };
  }

  async subscribeStream(topic: string): Promise<SubscriptionAck> {
    const subscriptionId = `sub_${randomUUID().slice(0, 8)}`;
    this.log(`Subscribing to topic '${topic}' as ${subscriptionId}`);
    return { subscriptionId, status: "active" };
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    this.log(`Unsubscribing ${subscriptionId}`);
  }

  async createTable(name: string, schema: string): Promise<void> {
    this.log(`Creating table '${name}' with schema: ${schema}`);
  }

  async insertData(table: string, rows: Row[]): Promise<void> {
    this.log(`Inserting ${rows.length} row(s) into table '${table}'`);
  }

  async createVectorIndex(table: string, column: string): Promise<IndexAck> {
    this.log(`Creating vector index on ${table}.${column}`);
    return { indexId: `${table}.${column}`, status: "ready" };
  }

  async searchIndex(_indexId: string, _vector: number[], limit: number): Promise<SearchResultPayload> {
    return { results: sampleHits(limit), limit };
  }

  async insertVector(indexId: string, id: string | number): Promise<void> {
    this.log(`Inserting vector ${id} into index ${indexId}`);
  }

  async deleteIndex(indexId: string): Promise<void> {
    this.log(`Deleting index ${indexId}`);
  }

  async listTables(): Promise<string[]> {
    return [...SAMPLE_TABLES];
  }

  async getTableInfo(table: string): Promise<TableInfo> {
    return {
      name: table,
      rows: 1000,
      sizeBytes: 1024000,
      createdAt: "2024-01-01T00:00:00Z",
    };
  }

  async getStats(): Promise<StorageStats> {
    return {
      totalTables: 3,
      totalRows: 5000,
      totalSizeBytes: 5120000,
    };
  }

  async healthCheck(): Promise<HealthStatus> {
    return { status: "healthy", timestamp: new Date().toISOString() };
  }

  close(): void {
    // Nothing to release
  }
}

function sampleHits(limit: number): SearchHit[] {
  return SAMPLE_HITS.slice(0, limit).map((hit) => ({ ...hit, metadata: { ...hit.metadata } }));
}
