import type { Phase } from "./types.js";

export const PHASES: readonly Phase[] = [
  "connection",
  "table_ops",
  "insertion",
  "query",
  "vector_search",
  "concurrency",
  "memory",
  "stress",
];

export const BENCHMARK_CONFIG = {
  // Health checks in the connection phase
  connectionChecks: 10,

  // Tables created as perf_test_table_{i}
  tableCount: 5,
  tableSchema: "id INT, name TEXT, data TEXT",

  // Payload sizes in bytes; JSON structure takes roughly payloadOverhead of each
  insertionSizes: [100, 1000, 10000],
  payloadOverhead: 50,
  perfTable: "perf_test_table",

  // Repetitions per insertion size, query and search limit
  repetitions: 10,

  queries: [
    "SELECT * FROM perf_test_table LIMIT 10",
    "SELECT COUNT(*) FROM perf_test_table",
    "SELECT * FROM perf_test_table WHERE id > 5",
  ],

  searchQuery: "test query",
  searchLimits: [5, 10, 20, 50],

  concurrencyLevels: [5, 10, 20],

  // Memory pressure: items of 1 KB text plus a 384-dimension vector
  memoryBatchSize: 1000,
  memoryInsertCount: 100,
  memoryItemBytes: 1000,
  memoryVectorDimensions: 384,
  memoryTable: "memory_test_table",

  rapidOperations: 50,
  largePayloadBytes: 100_000,
  largeRepetitions: 10,
  stressTable: "stress_test_table",
} as const;

export const DEFAULT_OUTPUT = "performance_results.json";
