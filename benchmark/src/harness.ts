import { BENCHMARK_CONFIG, PHASES } from "./config.js";
import { ConcurrentLoadGenerator } from "./load-generator.js";
import { calculateStats, formatSeconds, timeCall } from "./measure.js";
import { ResultStore } from "./result-store.js";
import type { BenchmarkTarget, ExtraValue, HarnessOptions, Phase } from "./types.js";

type Settings = Required<Omit<HarnessOptions, "skip" | "log">>;

interface Samples {
  times: number[];
  failures: number;
}

/**
 * Payload whose JSON form is close to `sizeBytes`, leaving `overhead` bytes
 * for the structure around the padded field.
 */
export function generateTestPayload(
  sizeBytes: number,
  overhead: number = BENCHMARK_CONFIG.payloadOverhead
): Record<string, string | number> {
  const target = sizeBytes - overhead;
  if (target <= 0) {
    return { id: 1, data: "small" };
  }
  return { id: 1, data: "x".repeat(target), timestamp: "2024-01-01T00:00:00Z" };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives a target through the measurement phases in order, recording into a
 * ResultStore. A phase that throws records nothing and the run moves on.
 */
export class BenchmarkHarness {
  readonly results: ResultStore;
  private readonly settings: Settings;
  private readonly skip: ReadonlySet<Phase>;
  private readonly log: (message: string) => void;
  private readonly loadGenerator: ConcurrentLoadGenerator;

  constructor(
    private readonly target: BenchmarkTarget,
    options: HarnessOptions = {},
    results: ResultStore = new ResultStore()
  ) {
    this.results = results;
    this.skip = new Set(options.skip ?? []);
    this.log = options.log ?? console.log;
    this.loadGenerator = new ConcurrentLoadGenerator(target);
    this.settings = {
      connectionChecks: options.connectionChecks ?? BENCHMARK_CONFIG.connectionChecks,
      tableCount: options.tableCount ?? BENCHMARK_CONFIG.tableCount,
      insertionSizes: options.insertionSizes ?? [...BENCHMARK_CONFIG.insertionSizes],
      repetitions: options.repetitions ?? BENCHMARK_CONFIG.repetitions,
      queries: options.queries ?? [...BENCHMARK_CONFIG.queries],
      searchLimits: options.searchLimits ?? [...BENCHMARK_CONFIG.searchLimits],
      concurrencyLevels: options.concurrencyLevels ?? [...BENCHMARK_CONFIG.concurrencyLevels],
      memoryBatchSize: options.memoryBatchSize ?? BENCHMARK_CONFIG.memoryBatchSize,
      memoryInsertCount: options.memoryInsertCount ?? BENCHMARK_CONFIG.memoryInsertCount,
      rapidOperations: options.rapidOperations ?? BENCHMARK_CONFIG.rapidOperations,
      largePayloadBytes: options.largePayloadBytes ?? BENCHMARK_CONFIG.largePayloadBytes,
      largeRepetitions: options.largeRepetitions ?? BENCHMARK_CONFIG.largeRepetitions,
    };
  }

  /**
   * Run every phase not skipped. Once `signal` aborts, the phase in flight
   * finishes and no further phase starts.
   */
  async runAll(signal?: AbortSignal): Promise<ResultStore> {
    const start = performance.now();
    for (const phase of PHASES) {
      if (signal?.aborted) {
        this.log(`Interrupted before ${phase}`);
        break;
      }
      if (this.skip.has(phase)) {
        this.log(`\nSkipping ${phase}`);
        continue;
      }
      await this.runPhase(phase);
    }
    this.log(`\nFinished in ${formatSeconds((performance.now() - start) / 1000)}`);
    return this.results;
  }

  async runPhase(phase: Phase): Promise<void> {
    try {
      switch (phase) {
        case "connection":
          return await this.testConnection();
        case "table_ops":
          return await this.testTableOperations();
        case "insertion":
          return await this.testDataInsertion();
        case "query":
          return await this.testQueries();
        case "vector_search":
          return await this.testVectorSearch();
        case "concurrency":
          return await this.testConcurrency();
        case "memory":
          return await this.testMemoryUsage();
        case "stress":
          return await this.testStress();
      }
    } catch (err) {
      this.log(`  Phase ${phase} failed: ${errorMessage(err)}`);
    }
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  async testConnection(): Promise<void> {
    this.log("\nTesting connection...");
    const samples = await this.sample("Connection", this.settings.connectionChecks, () =>
      this.target.healthCheck()
    );
    const recorded = this.recordSamples("connection", samples, {}, true);
    if (recorded !== null) {
      this.log(`  Average: ${recorded.toFixed(2)}ms`);
    }
  }

  async testTableOperations(): Promise<void> {
    this.log("\nTesting table operations...");
    const samples = await this.sample("Table creation", this.settings.tableCount, (i) =>
      this.target.createTable(`perf_test_table_${i}`, BENCHMARK_CONFIG.tableSchema)
    );
    const recorded = this.recordSamples("table_creation", samples, {});
    if (recorded !== null) {
      this.log(`  Average table creation: ${recorded.toFixed(2)}ms`);
    }
  }

  async testDataInsertion(): Promise<void> {
    this.log("\nTesting data insertion...");
    for (const size of this.settings.insertionSizes) {
      const payload = generateTestPayload(size);
      const samples = await this.sample("Data insertion", this.settings.repetitions, () =>
        this.target.insertData(BENCHMARK_CONFIG.perfTable, payload)
      );
      if (samples.times.length === 0) continue;

      const avgMs = calculateStats(samples.times).mean;
      const throughputKbs = avgMs > 0 ? size / 1024 / (avgMs / 1000) : 0;
      this.recordSamples(`data_insertion_${size}b`, samples, { throughputKbs });
      this.log(`  ${size}B: ${avgMs.toFixed(2)}ms avg, ${throughputKbs.toFixed(2)} KB/s`);
    }
  }

  async testQueries(): Promise<void> {
    this.log("\nTesting queries...");
    const { queries, repetitions } = this.settings;
    for (let i = 0; i < queries.length; i++) {
      const query = queries[i];
      const samples = await this.sample(`Query ${i + 1}`, repetitions, () =>
        this.target.executeQuery(query)
      );
      const recorded = this.recordSamples(`query_${i + 1}`, samples, { query });
      if (recorded !== null) {
        this.log(`  Query ${i + 1}: ${recorded.toFixed(2)}ms avg`);
      }
    }
  }

  async testVectorSearch(): Promise<void> {
    this.log("\nTesting vector search...");
    for (const limit of this.settings.searchLimits) {
      const samples = await this.sample("Vector search", this.settings.repetitions, () =>
        this.target.vectorSearch(BENCHMARK_CONFIG.searchQuery, limit)
      );
      const recorded = this.recordSamples(`vector_search_${limit}`, samples, { limit });
      if (recorded !== null) {
        this.log(`  Limit ${limit}: ${recorded.toFixed(2)}ms avg`);
      }
    }
  }

  async testConcurrency(): Promise<void> {
    this.log("\nTesting concurrent operations...");
    for (const level of this.settings.concurrencyLevels) {
      this.log(`  ${level} concurrent operations...`);
      const outcome = await this.loadGenerator.run(level);
      this.results.record(`concurrent_${level}`, {
        avgMs: (outcome.elapsedSeconds * 1000) / level,
        samples: level,
        extra: {
          concurrencyLevel: level,
          totalTimeS: outcome.elapsedSeconds,
          completedOperations: outcome.completed,
          failedOperations: outcome.failed,
          throughputOpsPerSec: outcome.throughput,
        },
      });
      this.log(`    Completed: ${outcome.completed}/${level} operations`);
      this.log(`    Throughput: ${outcome.throughput.toFixed(2)} ops/sec`);
    }
  }

  /**
   * Builds a batch of items in memory, inserts the first few and drops the
   * batch. Always records a summary, even when every insert failed.
   */
  async testMemoryUsage(): Promise<void> {
    this.log("\nTesting memory usage...");
    let batch: Record<string, unknown>[] = [];
    for (let i = 0; i < this.settings.memoryBatchSize; i++) {
      batch.push({
        id: i,
        data: "x".repeat(BENCHMARK_CONFIG.memoryItemBytes),
        vector: new Array<number>(BENCHMARK_CONFIG.memoryVectorDimensions).fill(0.1),
      });
    }

    const items = batch.slice(0, this.settings.memoryInsertCount);
    const samples = await this.sample("Memory insert", items.length, (i) =>
      this.target.insertData(BENCHMARK_CONFIG.memoryTable, items[i])
    );
    batch = [];

    const stats = calculateStats(samples.times);
    this.results.record("memory_usage", {
      avgMs: stats.mean,
      samples: stats.samples,
      extra: {
        testDataSizeMb: 1,
        status: samples.failures === 0 ? "completed" : "failed",
        failures: samples.failures,
        batchSize: this.settings.memoryBatchSize,
      },
    });
    this.log("  Memory usage test completed");
  }

  async testStress(): Promise<void> {
    this.log("\nTesting stress scenarios...");

    this.log("  Rapid successive operations...");
    const rapid = await this.sample("Rapid operation", this.settings.rapidOperations, () =>
      this.target.getStats()
    );
    const rapidAvg = this.recordSamples("stress_rapid_operations", rapid, {});
    if (rapidAvg !== null) {
      this.log(`    Average: ${rapidAvg.toFixed(2)}ms`);
    }

    this.log("  Large data operations...");
    const bytes = this.settings.largePayloadBytes;
    const payload = { data: "x".repeat(bytes) };
    const large = await this.sample("Large data operation", this.settings.largeRepetitions, () =>
      this.target.insertData(BENCHMARK_CONFIG.stressTable, payload)
    );
    const largeAvg = this.recordSamples("stress_large_data", large, {
      dataSizeKb: Math.round(bytes / 1000),
    });
    if (largeAvg !== null) {
      this.log(`    Average: ${largeAvg.toFixed(2)}ms`);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Time `count` sequential calls. Failures are logged and counted; only
   * successful calls contribute a sample.
   */
  private async sample(
    label: string,
    count: number,
    fn: (i: number) => Promise<unknown>
  ): Promise<Samples> {
    const times: number[] = [];
    let failures = 0;
    for (let i = 0; i < count; i++) {
      try {
        times.push(await timeCall(() => fn(i)));
      } catch (err) {
        failures++;
        this.log(`  ${label} ${i + 1} failed: ${errorMessage(err)}`);
      }
    }
    return { times, failures };
  }

  /**
   * Record mean latency under `name`. Returns the mean, or null when there
   * was no successful sample and nothing was recorded.
   */
  private recordSamples(
    name: string,
    samples: Samples,
    extra: Record<string, ExtraValue>,
    withRange: boolean = false
  ): number | null {
    if (samples.times.length === 0) {
      this.log(`  ${name}: no successful runs`);
      return null;
    }
    const stats = calculateStats(samples.times);
    this.results.record(name, {
      avgMs: stats.mean,
      minMs: withRange ? stats.min : undefined,
      maxMs: withRange ? stats.max : undefined,
      samples: stats.samples,
      extra: { ...extra, failures: samples.failures },
    });
    return stats.mean;
  }
}
