import type { TransportClient } from "../../src/index.js";

export type Phase =
  | "connection"
  | "table_ops"
  | "insertion"
  | "query"
  | "vector_search"
  | "concurrency"
  | "memory"
  | "stress";

export type ExtraValue = string | number | boolean | null;

export interface TimingStats {
  min: number;
  max: number;
  mean: number;
  samples: number;
}

/**
 * One named measurement. Frozen once recorded.
 */
export interface BenchmarkResult {
  name: string;
  avgMs: number;
  minMs?: number;
  maxMs?: number;
  samples: number;
  extra: Record<string, ExtraValue>;
}

export type ResultSet = Record<string, BenchmarkResult>;

/**
 * The client operations the harness drives.
 */
export type BenchmarkTarget = Pick<
  TransportClient,
  "healthCheck" | "createTable" | "insertData" | "executeQuery" | "vectorSearch" | "getStats"
>;

export interface ConcurrencyOutcome {
  level: number;
  completed: number;
  failed: number;
  elapsedSeconds: number;
  throughput: number;
}

export interface HarnessOptions {
  connectionChecks?: number;
  tableCount?: number;
  insertionSizes?: number[];
  repetitions?: number;
  queries?: string[];
  searchLimits?: number[];
  concurrencyLevels?: number[];
  memoryBatchSize?: number;
  memoryInsertCount?: number;
  rapidOperations?: number;
  largePayloadBytes?: number;
  largeRepetitions?: number;
  skip?: Phase[];
  log?: (message: string) => void;
}
