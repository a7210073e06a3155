// VectraEdge - Embedded Transport
// Uses the SQLite engine directly without HTTP

import * as fs from "fs";
import * as path from "path";
import { EmbeddedEngine } from "./engine.js";
import type {
  HealthStatus,
  IndexAck,
  ResultPayload,
  Row,
  SearchResultPayload,
  StorageStats,
  SubscriptionAck,
  TableInfo,
  Transport,
} from "./types.js";

/**
 * Open the embedded engine for `dataPath`: ':memory:' or a directory that
 * will hold `vectra.db`.
 */
export function openEngine(dataPath: string): EmbeddedEngine {
  if (dataPath === ":memory:") {
    return new EmbeddedEngine(":memory:");
  }
  if (!fs.existsSync(dataPath)) {
    fs.mkdirSync(dataPath, { recursive: true });
  }
  return new EmbeddedEngine(path.join(dataPath, "vectra.db"));
}

export class EmbeddedTransport implements Transport {
  readonly kind = "embedded" as const;

  constructor(private readonly engine: EmbeddedEngine) {}

  async executeQuery(sql: string): Promise<ResultPayload> {
    return this.engine.query(sql);
  }

  async vectorSearch(query: string, limit: number): Promise<SearchResultPayload> {
    return { results: this.engine.search(query, limit), query, limit };
  }

  async subscribeStream(topic: string): Promise<SubscriptionAck> {
    const subscription = this.engine.subscribe(topic);
    return { subscriptionId: subscription.id, status: subscription.status };
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    this.engine.unsubscribe(subscriptionId);
  }

  async createTable(name: string, schema: string): Promise<void> {
    this.engine.createTable(name, schema);
  }

  async insertData(table: string, rows: Row[]): Promise<void> {
    this.engine.insertRows(table, rows);
  }

  async createVectorIndex(table: string, column: string): Promise<IndexAck> {
    return { indexId: this.engine.createIndex(table, column), status: "ready" };
  }

  async searchIndex(indexId: string, vector: number[], limit: number): Promise<SearchResultPayload> {
    return { results: this.engine.searchIndex(indexId, vector, limit), limit };
  }

  async insertVector(
    indexId: string,
    id: string | number,
    vector: number[],
    metadata: Record<string, unknown>
  ): Promise<void> {
    this.engine.insertVector(indexId, id, vector, metadata);
  }

  async deleteIndex(indexId: string): Promise<void> {
    this.engine.dropIndex(indexId);
  }

  async listTables(): Promise<string[]> {
    return this.engine.listTables();
  }

  async getTableInfo(table: string): Promise<TableInfo> {
    return this.engine.tableInfo(table);
  }

  async getStats(): Promise<StorageStats> {
    return this.engine.stats();
  }

  async healthCheck(): Promise<HealthStatus> {
    return { status: "healthy", timestamp: new Date().toISOString() };
  }

  close(): void {
    this.engine.close();
  }
}
