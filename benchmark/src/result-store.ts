import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ValidationError } from "../../src/index.js";
import type { BenchmarkResult, ExtraValue, ResultSet } from "./types.js";

const resultSchema = z.object({
  name: z.string().min(1),
  avgMs: z.number().nonnegative(),
  minMs: z.number().nonnegative().optional(),
  maxMs: z.number().nonnegative().optional(),
  samples: z.number().int().nonnegative(),
  extra: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

const resultSetSchema = z.record(resultSchema);

/**
 * Named benchmark results. Recording under an existing name replaces it.
 */
export class ResultStore {
  private readonly results = new Map<string, BenchmarkResult>();

  record(name: string, result: Omit<BenchmarkResult, "name">): void {
    this.results.set(
      name,
      Object.freeze({ ...result, name, extra: Object.freeze({ ...result.extra }) })
    );
  }

  get(name: string): BenchmarkResult | undefined {
    return this.results.get(name);
  }

  has(name: string): boolean {
    return this.results.has(name);
  }

  names(): string[] {
    return [...this.results.keys()].sort();
  }

  get size(): number {
    return this.results.size;
  }

  toJSON(): ResultSet {
    const set: ResultSet = {};
    for (const name of this.names()) {
      const result = this.results.get(name);
      if (!result) continue;
      const extra: Record<string, ExtraValue> = {};
      for (const key of Object.keys(result.extra).sort()) {
        extra[key] = result.extra[key];
      }
      set[name] = {
        name: result.name,
        avgMs: result.avgMs,
        minMs: result.minMs,
        maxMs: result.maxMs,
        samples: result.samples,
        extra,
      };
    }
    return set;
  }

  /**
   * JSON with two-space indent, results sorted by name and fields in a fixed
   * order, so two runs diff line by line.
   */
  serialize(): string {
    return JSON.stringify(this.toJSON(), null, 2) + "\n";
  }

  save(filePath: string): void {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, this.serialize());
  }

  static load(text: string): ResultStore {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ValidationError("Results are not valid JSON");
    }

    const parsed = resultSetSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        issue ? `Invalid result '${issue.path.join(".")}': ${issue.message}` : "Invalid results"
      );
    }

    const store = new ResultStore();
    for (const [key, result] of Object.entries(parsed.data)) {
      if (key !== result.name) {
        throw new ValidationError(`Result stored under '${key}' is named '${result.name}'`);
      }
      store.record(key, result);
    }
    return store;
  }

  static loadFile(filePath: string): ResultStore {
    return ResultStore.load(fs.readFileSync(filePath, "utf-8"));
  }

  /**
   * Display lines for the known result families in a fixed order. Results
   * under other names are left out.
   */
  summarize(): string[] {
    if (this.results.size === 0) return ["No test results available."];

    const lines: string[] = [];
    const connection = this.results.get("connection");
    if (connection) lines.push(`Connection: ${ms(connection.avgMs)} avg`);

    const tables = this.results.get("table_creation");
    if (tables) lines.push(`Table Creation: ${ms(tables.avgMs)} avg`);

    for (const [size, r] of this.family(/^data_insertion_(\d+)b$/)) {
      lines.push(`${size}B Data Insertion: ${ms(r.avgMs)} avg, ${num(r.extra.throughputKbs)} KB/s`);
    }
    for (const [index, r] of this.family(/^query_(\d+)$/)) {
      lines.push(`Query ${index}: ${ms(r.avgMs)} avg`);
    }
    for (const [limit, r] of this.family(/^vector_search_(\d+)$/)) {
      lines.push(`Vector Search (limit ${limit}): ${ms(r.avgMs)} avg`);
    }
    for (const [level, r] of this.family(/^concurrent_(\d+)$/)) {
      lines.push(`Concurrent ${level}: ${num(r.extra.throughputOpsPerSec)} ops/sec`);
    }

    const rapid = this.results.get("stress_rapid_operations");
    if (rapid) lines.push(`Rapid Operations: ${ms(rapid.avgMs)} avg`);

    const large = this.results.get("stress_large_data");
    if (large) lines.push(`Large Data (${large.extra.dataSizeKb}KB): ${ms(large.avgMs)} avg`);

    return lines;
  }

  private family(pattern: RegExp): [number, BenchmarkResult][] {
    const members: [number, BenchmarkResult][] = [];
    for (const [name, result] of this.results) {
      const match = pattern.exec(name);
      if (match) members.push([Number(match[1]), result]);
    }
    return members.sort((a, b) => a[0] - b[0]);
  }
}

function ms(value: number): string {
  return `${value.toFixed(2)}ms`;
}

function num(value: ExtraValue | undefined): string {
  return typeof value === "number" ? value.toFixed(2) : "n/a";
}
