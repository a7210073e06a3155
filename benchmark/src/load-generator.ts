import { ValidationError } from "../../src/index.js";
import type { BenchmarkTarget, ConcurrencyOutcome } from "./types.js";

export const CONCURRENT_QUERY = "SELECT * FROM perf_test_table LIMIT 1";

/**
 * Runs one operation per worker, all dispatched before any is awaited.
 * Each worker settles into its own slot of the `allSettled` array and the
 * counts are taken from that array after the join.
 */
export class ConcurrentLoadGenerator {
  constructor(private readonly target: BenchmarkTarget) {}

  async run(level: number): Promise<ConcurrencyOutcome> {
    if (!Number.isInteger(level) || level < 1) {
      throw new ValidationError(`Concurrency level must be a positive integer, got ${level}`);
    }

    const start = performance.now();
    const workers: Promise<unknown>[] = [];
    for (let i = 0; i < level; i++) {
      workers.push(this.dispatch(i));
    }
    const outcomes = await Promise.allSettled(workers);
    const elapsedSeconds = (performance.now() - start) / 1000;

    const completed = outcomes.filter((o) => o.status === "fulfilled").length;
    return {
      level,
      completed,
      failed: level - completed,
      elapsedSeconds,
      throughput: elapsedSeconds > 0 ? completed / elapsedSeconds : 0,
    };
  }

  private async dispatch(worker: number): Promise<unknown> {
    switch (worker % 3) {
      case 0:
        return this.target.executeQuery(CONCURRENT_QUERY);
      case 1:
        return this.target.vectorSearch("test", 5);
      default:
        return this.target.getStats();
    }
  }
}
