// VectraEdge - Transport Client
// One caller-facing API over whichever transport was selected at construction

import { baseAddress } from "./config.js";
import { IndexHandle, SubscriptionHandle } from "./handles.js";
import type { HandleOwner } from "./handles.js";
import { PlaceholderTransport } from "./placeholder.js";
import { RemoteTransport } from "./remote.js";
import type {
  ClientConfig,
  HealthStatus,
  Logger,
  Operation,
  ResultPayload,
  Row,
  SearchResultPayload,
  StorageStats,
  TableInfo,
  Transport,
  TransportMode,
} from "./types.js";
import { TransportError, UnavailableTransportError, ValidationError } from "./types.js";

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Build the transport matching `config.transportMode`.
 *
 * Embedded mode loads better-sqlite3 lazily so remote and placeholder clients
 * never require it. When the engine is unavailable this throws
 * `UnavailableTransportError` rather than falling back to another mode.
 */
export async function createTransport(
  config: ClientConfig,
  log: Logger = console.log
): Promise<Transport> {
  switch (config.transportMode) {
    case "remote":
      return new RemoteTransport(config, log);
    case "placeholder":
      return new PlaceholderTransport(log);
    case "embedded": {
      if (!config.embeddedAvailable) {
        throw new UnavailableTransportError(
          "Embedded mode requires better-sqlite3. Install it with: npm install better-sqlite3\n" +
            "Or use remote mode instead."
        );
      }
      try {
        const { EmbeddedTransport, openEngine } = await import("./embedded.js");
        return new EmbeddedTransport(openEngine(config.dataPath));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new UnavailableTransportError(`Embedded engine could not be opened: ${reason}`, {
          cause: err,
        });
      }
    }
  }
}

export class TransportClient implements HandleOwner {
  readonly config: ClientConfig;
  private readonly transport: Transport;

  constructor(config: ClientConfig, transport: Transport) {
    this.config = Object.isFrozen(config) ? config : Object.freeze({ ...config });
    this.transport = transport;
  }

  get baseAddress(): string {
    return baseAddress(this.config);
  }

  /**
   * The transport actually in use.
   */
  get mode(): TransportMode {
    return this.transport.kind;
  }

  // ==========================================================================
  // Queries and Search
  // ==========================================================================

  /**
   * Execute a SQL statement.
   * @throws TransportError "Failed to execute query: ..."
   */
  async executeQuery(sql: string): Promise<ResultPayload> {
    return this.call("executeQuery", () => this.transport.executeQuery(sql));
  }

  /**
   * Text similarity search. The returned `limit` echoes the argument.
   * @throws ValidationError if limit is not a positive integer
   * @throws TransportError "Failed to perform vector search: ..."
   */
  async vectorSearch(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<SearchResultPayload> {
    assertLimit(limit);
    return this.call("vectorSearch", () => this.transport.vectorSearch(query, limit));
  }

  // ==========================================================================
  // Streams
  // ==========================================================================

  async subscribeStream(topic: string): Promise<SubscriptionHandle> {
    assertName(topic, "Topic");
    const ack = await this.call("subscribeStream", () => this.transport.subscribeStream(topic));
    return new SubscriptionHandle(this, ack.subscriptionId, topic, ack.status);
  }

  async unsubscribe(subscriptionId: string): Promise<void> {
    return this.call("unsubscribe", () => this.transport.unsubscribe(subscriptionId));
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  /**
   * Create a table. With a remote transport whose admin API is disabled this
   * only logs the request.
   */
  async createTable(name: string, schema: string): Promise<void> {
    assertName(name, "Table name");
    return this.call("createTable", () => this.transport.createTable(name, schema));
  }

  /**
   * Insert one row or several. Same placeholder caveat as `createTable`.
   */
  async insertData(table: string, payload: Row | Row[]): Promise<void> {
    assertName(table, "Table name");
    const rows = Array.isArray(payload) ? payload : [payload];
    return this.call("insertData", () => this.transport.insertData(table, rows));
  }

  async createVectorIndex(table: string, column: string): Promise<IndexHandle> {
    assertName(table, "Table name");
    assertName(column, "Column name");
    const ack = await this.call("createVectorIndex", () =>
      this.transport.createVectorIndex(table, column)
    );
    return new IndexHandle(this, ack.indexId, table, column, ack.status);
  }

  async searchIndex(
    indexId: string,
    vector: number[],
    limit: number = DEFAULT_SEARCH_LIMIT
  ): Promise<SearchResultPayload> {
    assertLimit(limit);
    return this.call("searchIndex", () => this.transport.searchIndex(indexId, vector, limit));
  }

  async insertVector(
    indexId: string,
    id: string | number,
    vector: number[],
    metadata: Record<string, unknown> = {}
  ): Promise<void> {
    return this.call("insertVector", () =>
      this.transport.insertVector(indexId, id, vector, metadata)
    );
  }

  async deleteIndex(indexId: string): Promise<void> {
    return this.call("deleteIndex", () => this.transport.deleteIndex(indexId));
  }

  async listTables(): Promise<string[]> {
    return this.call("listTables", () => this.transport.listTables());
  }

  async getTableInfo(table: string): Promise<TableInfo> {
    return this.call("getTableInfo", () => this.transport.getTableInfo(table));
  }

  async getStats(): Promise<StorageStats> {
    return this.call("getStats", () => this.transport.getStats());
  }

  /**
   * Remote: always a real request to /health with a 10 second timeout.
   */
  async healthCheck(): Promise<HealthStatus> {
    return this.call("healthCheck", () => this.transport.healthCheck());
  }

  /**
   * Close the client and release resources.
   */
  close(): void {
    this.transport.close();
  }

  private async call<T>(operation: Operation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(operation, err);
    }
  }
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Limit must be a positive integer, got ${limit}`);
  }
}

function assertName(value: string, label: string): void {
  if (!value.trim()) {
    throw new ValidationError(`${label} must not be empty`);
  }
}
