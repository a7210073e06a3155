// VectraEdge - Client Package
// SQL, vector search and streaming against a VectraEdge engine, embedded or remote.

import { TransportClient, createTransport } from "./client.js";
import { resolveConfig } from "./config.js";
import type { ClientOptions } from "./types.js";

// ============================================================================
// Re-export Types
// ============================================================================

export type {
  ClientConfig,
  ClientOptions,
  HealthStatus,
  IndexAck,
  Logger,
  Operation,
  ResultPayload,
  Row,
  SearchHit,
  SearchResultPayload,
  StorageStats,
  SubscriptionAck,
  TableInfo,
  Transport,
  TransportMode,
} from "./types.js";

export {
  HttpStatusError,
  TransportError,
  UnavailableTransportError,
  ValidationError,
  VectraError,
} from "./types.js";

// ============================================================================
// Re-export Components (for advanced usage)
// ============================================================================

export { TransportClient, createTransport, DEFAULT_SEARCH_LIMIT } from "./client.js";
export { IndexHandle, SubscriptionHandle } from "./handles.js";
export type { HandleOwner } from "./handles.js";
export { resolveConfig, baseAddress, parsePort } from "./config.js";
export { detectEmbeddedCapability } from "./capability.js";
export { RemoteTransport, REQUEST_TIMEOUT_MS, HEALTH_TIMEOUT_MS } from "./remote.js";
export { PlaceholderTransport } from "./placeholder.js";
export { VERSION } from "./version.js";

// ============================================================================
// Main Factory Function
// ============================================================================

/**
 * Create a VectraEdge client.
 *
 * All options support environment variable defaults:
 * - `host`: VECTRA_HOST (default: '127.0.0.1')
 * - `port`: VECTRA_PORT (default: 8080)
 * - `mode`: VECTRA_MODE (default: 'remote')
 * - `dataPath`: VECTRA_DATA_PATH (default: ':memory:')
 * - `adminApi`: VECTRA_ADMIN_API (default: false)
 *
 * **Embedded Mode**: runs the engine in-process on SQLite. Probe with
 * `detectEmbeddedCapability()` first and pass the result as
 * `embeddedAvailable`; an unavailable engine fails here with
 * `UnavailableTransportError`.
 *
 * **Remote Mode**: connects to a server via HTTP.
 *
 * @example
 * ```typescript
 * import { createClient } from 'vectraedge';
 *
 * const client = await createClient({ host: 'localhost', port: 8080 });
 *
 * const rows = await client.executeQuery('SELECT * FROM docs LIMIT 5');
 * const hits = await client.vectorSearch('machine learning', 10);
 *
 * const subscription = await client.subscribeStream('events');
 * await subscription.unsubscribe();
 *
 * client.close();
 * ```
 */
export async function createClient(options: ClientOptions = {}): Promise<TransportClient> {
  const config = resolveConfig(options);
  const transport = await createTransport(config, options.log);
  return new TransportClient(config, transport);
}

export default createClient;
