// VectraEdge - Shared Types

// ============================================================================
// Configuration Options
// ============================================================================

/**
 * How a client reaches the engine.
 * - embedded: in-process SQLite engine
 * - remote: HTTP connection to a VectraEdge server
 * - placeholder: no server interaction at all (demos and tests)
 */
export type TransportMode = "embedded" | "remote" | "placeholder";

export type Logger = (message: string) => void;

/**
 * Options for creating a VectraEdge client.
 */
export interface ClientOptions {
  /**
   * Server host. Only used in remote mode.
   * @default VECTRA_HOST env var or '127.0.0.1'
   */
  host?: string;

  /**
   * Server port. Only used in remote mode.
   * @default VECTRA_PORT env var or 8080
   */
  port?: number;

  /**
   * @default VECTRA_MODE env var or 'remote'
   */
  mode?: TransportMode;

  /**
   * Result of `detectEmbeddedCapability()`, probed once at startup.
   * When false, requesting embedded mode fails instead of downgrading.
   * @default true
   */
  embeddedAvailable?: boolean;

  /**
   * Directory for the embedded database file, or ':memory:'.
   * @default VECTRA_DATA_PATH env var or ':memory:'
   */
  dataPath?: string;

  /**
   * Whether the server exposes the administrative routes
   * (tables, indexes, stats, subscription removal).
   * @default VECTRA_ADMIN_API env var or false
   */
  adminApi?: boolean;

  /**
   * Sink for the diagnostic lines emitted by placeholder operations.
   * @default console.log
   */
  log?: Logger;
}

/**
 * Fully resolved client configuration. Frozen once the client exists.
 */
export interface ClientConfig {
  readonly host: string;
  readonly port: number;
  readonly transportMode: TransportMode;
  readonly embeddedAvailable: boolean;
  readonly dataPath: string;
  readonly adminApi: boolean;
}

// ============================================================================
// Payload Types
// ============================================================================

export type Row = Record<string, unknown>;

/**
 * Result of a query. The engine decides its shape; it is passed through as-is.
 */
export type ResultPayload = Record<string, unknown>;

export interface SearchHit {
  id: string | number;
  score: number;
  metadata: Record<string, unknown>;
}

export interface SearchResultPayload {
  results: SearchHit[];
  /** Present for text searches, absent for searches by raw vector. */
  query?: string;
  limit: number;
}

export interface TableInfo {
  name: string;
  rows: number;
  sizeBytes: number;
  createdAt: string | null;
  columns?: string[];
}

export interface StorageStats {
  totalTables: number;
  totalRows: number;
  totalSizeBytes: number;
}

export interface HealthStatus {
  status: string;
  version?: string;
  timestamp?: string;
}

export interface SubscriptionAck {
  subscriptionId: string;
  status: string;
}

export interface IndexAck {
  indexId: string;
  status: string;
}

// ============================================================================
// Transport Interface
// ============================================================================

/**
 * One way of reaching the engine. Implementations throw plain errors;
 * `TransportClient` turns every failure into a `TransportError`.
 */
export interface Transport {
  readonly kind: TransportMode;

  executeQuery(sql: string): Promise<ResultPayload>;
  vectorSearch(query: string, limit: number): Promise<SearchResultPayload>;
  subscribeStream(topic: string): Promise<SubscriptionAck>;
  unsubscribe(subscriptionId: string): Promise<void>;

  createTable(name: string, schema: string): Promise<void>;
  insertData(table: string, rows: Row[]): Promise<void>;

  createVectorIndex(table: string, column: string): Promise<IndexAck>;
  searchIndex(indexId: string, vector: number[], limit: number): Promise<SearchResultPayload>;
  insertVector(
    indexId: string,
    id: string | number,
    vector: number[],
    metadata: Record<string, unknown>
  ): Promise<void>;
  deleteIndex(indexId: string): Promise<void>;

  listTables(): Promise<string[]>;
  getTableInfo(table: string): Promise<TableInfo>;
  getStats(): Promise<StorageStats>;
  healthCheck(): Promise<HealthStatus>;

  /**
   * Release resources. No-op for transports that hold none.
   */
  close(): void;
}

export type Operation =
  | "executeQuery"
  | "vectorSearch"
  | "subscribeStream"
  | "unsubscribe"
  | "createTable"
  | "insertData"
  | "createVectorIndex"
  | "searchIndex"
  | "insertVector"
  | "deleteIndex"
  | "listTables"
  | "getTableInfo"
  | "getStats"
  | "healthCheck";

const OPERATION_PHRASES: Record<Operation, string> = {
  executeQuery: "Failed to execute query",
  vectorSearch: "Failed to perform vector search",
  subscribeStream: "Failed to subscribe to stream",
  unsubscribe: "Failed to unsubscribe from stream",
  createTable: "Failed to create table",
  insertData: "Failed to insert data",
  createVectorIndex: "Failed to create vector index",
  searchIndex: "Failed to search vector index",
  insertVector: "Failed to insert vector",
  deleteIndex: "Failed to delete vector index",
  listTables: "Failed to list tables",
  getTableInfo: "Failed to get table info",
  getStats: "Failed to get stats",
  healthCheck: "Health check failed",
};

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class of every error raised by VectraEdge.
 */
export class VectraError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VectraError";
  }
}

/**
 * A call to the engine could not complete: connection failure, non-success
 * status, timeout or malformed response.
 */
export class TransportError extends VectraError {
  public readonly operation: Operation;
  public readonly status?: number;

  constructor(operation: Operation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${OPERATION_PHRASES[operation]}: ${reason}`, { cause });
    this.name = "TransportError";
    this.operation = operation;
    this.status = cause instanceof HttpStatusError ? cause.status : undefined;
  }
}

/**
 * Embedded mode was requested but the in-process engine cannot be used.
 * Raised at client construction only.
 */
export class UnavailableTransportError extends VectraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UnavailableTransportError";
  }
}

/**
 * Malformed input: bad limits, concurrency levels or benchmark reports.
 */
export class ValidationError extends VectraError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Non-success HTTP status from the server.
 */
export class HttpStatusError extends Error {
  public readonly status: number;

  constructor(status: number, statusText: string, detail?: string) {
    super(`HTTP ${status} ${statusText}${detail ? ` - ${detail}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}
