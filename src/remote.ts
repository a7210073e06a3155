// VectraEdge - Remote HTTP Transport
// Talks to a VectraEdge server over JSON/HTTP

import { z } from "zod";
import { baseAddress } from "./config.js";
import { PlaceholderTransport } from "./placeholder.js";
import type {
  ClientConfig,
  HealthStatus,
  IndexAck,
  Logger,
  ResultPayload,
  Row,
  SearchResultPayload,
  StorageStats,
  SubscriptionAck,
  TableInfo,
  Transport,
} from "./types.js";
import { HttpStatusError } from "./types.js";

export const REQUEST_TIMEOUT_MS = 30_000;
export const HEALTH_TIMEOUT_MS = 10_000;

// ============================================================================
// Response Schemas
// ============================================================================

const resultSchema = z.record(z.unknown());

const searchResultSchema = z.object({
  results: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      metadata: z.record(z.unknown()).default({}),
    })
  ),
  query: z.string().optional(),
  limit: z.number().int(),
});

// The reference server answers with snake_case keys
const subscriptionSchema = z.object({
  subscriptionId: z.string().optional(),
  subscription_id: z.string().optional(),
  status: z.string().default("unknown"),
});

const indexSchema = z.object({
  indexId: z.string(),
  status: z.string().default("ready"),
});

const tablesSchema = z.object({ tables: z.array(z.string()) });

const tableInfoSchema = z.object({
  name: z.string(),
  rows: z.number(),
  sizeBytes: z.number(),
  createdAt: z.string().nullable().default(null),
  columns: z.array(z.string()).optional(),
});

const statsSchema = z.object({
  totalTables: z.number(),
  totalRows: z.number(),
  totalSizeBytes: z.number(),
});

const healthSchema = z
  .object({
    status: z.string(),
    version: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

const anySchema = z.unknown();

type HttpMethod = "GET" | "POST" | "DELETE";

// ============================================================================
// Transport
// ============================================================================

/**
 * Transport that marshals every operation over HTTP.
 *
 * Only `/query`, `/vector/search`, `/stream/subscribe` and `/health` exist on
 * every server. The administrative routes are used when `config.adminApi` is
 * set; otherwise those operations are served by a `PlaceholderTransport` and
 * make no network call.
 */
export class RemoteTransport implements Transport {
  readonly kind = "remote" as const;
  private readonly url: string;
  private readonly placeholder: PlaceholderTransport | null;

  constructor(config: ClientConfig, log: Logger = console.log) {
    this.url = baseAddress(config);
    this.placeholder = config.adminApi ? null : new PlaceholderTransport(log);
  }

  async executeQuery(sql: string): Promise<ResultPayload> {
    return this.request("POST", "/query", resultSchema, { query: sql });
  }

  async vectorSearch(query: string, limit: number): Promise<SearchResultPayload> {
    return this.request("POST", "/vector/search", searchResultSchema, { query, limit });
  }

  async subscribeStream(topic: string): Promise<SubscriptionAck> {
    const data = await this.request("POST", "/stream/subscribe", subscriptionSchema, { topic });
    const subscriptionId = data.subscriptionId ?? data.subscription_id;
    if (!subscriptionId) {
      throw new Error("Server did not acknowledge the subscription");
    }
    return { subscriptionId, status: data.status };
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    if (this.placeholder) return this.placeholder.unsubscribe(subscriptionId);
    await this.request(
      "DELETE",
      `/stream/subscriptions/${encodeURIComponent(subscriptionId)}`,
      anySchema
    );
  }

  async createTable(name: string, schema: string): Promise<void> {
    if (this.placeholder) return this.placeholder.createTable(name, schema);
    await this.request("POST", "/tables", anySchema, { name, schema });
  }

  async insertData(table: string, rows: Row[]): Promise<void> {
    if (this.placeholder) return this.placeholder.insertData(table, rows);
    await this.request("POST", `/tables/${encodeURIComponent(table)}/rows`, anySchema, { rows });
  }

  async createVectorIndex(table: string, column: string): Promise<IndexAck> {
    if (this.placeholder) return this.placeholder.createVectorIndex(table, column);
    return this.request("POST", "/vector/indexes", indexSchema, { table, column });
  }

  async searchIndex(indexId: string, vector: number[], limit: number): Promise<SearchResultPayload> {
    if (this.placeholder) return this.placeholder.searchIndex(indexId, vector, limit);
    return this.request(
      "POST",
      `/vector/indexes/${encodeURIComponent(indexId)}/search`,
      searchResultSchema,
      { vector, limit }
    );
  }

  async insertVector(
    indexId: string,
    id: string | number,
    vector: number[],
    metadata: Record<string, unknown>
  ): Promise<void> {
    if (this.placeholder) return this.placeholder.insertVector(indexId, id);
    await this.request(
      "POST",
      `/vector/indexes/${encodeURIComponent(indexId)}/vectors`,
      anySchema,
      { id, vector, metadata }
    );
  }

  async deleteIndex(indexId: string): Promise<void> {
    if (this.placeholder) return this.placeholder.deleteIndex(indexId);
    await this.request("DELETE", `/vector/indexes/${encodeURIComponent(indexId)}`, anySchema);
  }

  async listTables(): Promise<string[]> {
    if (this.placeholder) return this.placeholder.listTables();
    const data = await this.request("GET", "/tables", tablesSchema);
    return data.tables;
  }

  async getTableInfo(table: string): Promise<TableInfo> {
    if (this.placeholder) return this.placeholder.getTableInfo(table);
    return this.request("GET", `/tables/${encodeURIComponent(table)}`, tableInfoSchema);
  }

  async getStats(): Promise<StorageStats> {
    if (this.placeholder) return this.placeholder.getStats();
    return this.request("GET", "/stats", statsSchema);
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.request("GET", "/health", healthSchema, undefined, HEALTH_TIMEOUT_MS);
  }

  close(): void {
    // No-op for remote transport (no resources to release)
  }

  /**
   * One HTTP round trip. Non-success statuses, timeouts and bodies that do not
   * match `schema` all throw.
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
    timeoutMs: number = REQUEST_TIMEOUT_MS
  ): Promise<T> {
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const response = await fetch(`${this.url}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new HttpStatusError(response.status, response.statusText, detail.slice(0, 200));
    }

    const data: unknown = await response.json();
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Malformed response from ${method} ${path}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid body"}`
      );
    }
    return parsed.data;
  }
}
