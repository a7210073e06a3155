#!/usr/bin/env node

import { parseArgs } from "util";
import { createClient, detectEmbeddedCapability } from "../../src/index.js";
import type { TransportClient } from "../../src/index.js";
import { DEFAULT_OUTPUT, PHASES } from "./config.js";
import { BenchmarkHarness } from "./harness.js";
import { resolveDriverOptions } from "./options.js";

const EXIT_INTERRUPTED = 130;

// Parse CLI arguments
const { values } = parseArgs({
  options: {
    host: { type: "string", default: "127.0.0.1" },
    port: { type: "string", short: "p", default: "8080" },
    embedded: { type: "boolean", default: false },
    placeholder: { type: "boolean", default: false },
    output: { type: "string", short: "o", default: DEFAULT_OUTPUT },
    skip: { type: "string", multiple: true, default: [] },
    help: { type: "boolean", short: "h" },
  },
});

if (values.help) {
  console.log(`
VectraEdge Performance Benchmark

Usage: npm run benchmark -- [options]

Options:
  --host <host>           Server host (default: 127.0.0.1)
  -p, --port <port>       Server port (default: 8080)
  --embedded              Benchmark the in-process embedded engine
  --placeholder           Benchmark the placeholder transport (no server)
  -o, --output <file>     Output file for results JSON (default: ${DEFAULT_OUTPUT})
  --skip <phase>          Skip a phase; repeat for several
  -h, --help              Show this help

Phases: ${PHASES.join(", ")}

Examples:
  npm run benchmark -- --embedded
  npm run benchmark -- --host 10.0.0.5 --skip stress --skip memory
`);
  process.exit(0);
}

const controller = new AbortController();
process.on("SIGINT", () => {
  if (controller.signal.aborted) process.exit(EXIT_INTERRUPTED);
  console.log("\nInterrupted, finishing the current phase...");
  controller.abort();
});

async function runBenchmark(): Promise<BenchmarkHarness> {
  const options = resolveDriverOptions(values);

  const client: TransportClient = await createClient({
    host: options.host,
    port: options.port,
    mode: options.mode,
    embeddedAvailable: options.mode === "embedded" ? await detectEmbeddedCapability() : undefined,
  });

  console.log("=".repeat(60));
  console.log("VectraEdge Performance Benchmark");
  console.log("=".repeat(60));
  console.log(`Mode: ${client.mode}`);
  if (client.mode === "remote") console.log(`Server: ${client.baseAddress}`);
  console.log("=".repeat(60));

  const harness = new BenchmarkHarness(client, { skip: options.skip });
  try {
    await harness.runAll(controller.signal);
  } finally {
    client.close();
  }
  return harness;
}

// Main execution
runBenchmark()
  .then((harness) => {
    console.log();
    console.log("=".repeat(60));
    console.log("Performance Summary");
    console.log("=".repeat(60));
    for (const line of harness.results.summarize()) {
      console.log(`  ${line}`);
    }

    harness.results.save(values.output);
    console.log();
    console.log(`Results saved to ${values.output}`);

    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
  })
  .catch((err: unknown) => {
    console.error("Benchmark failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
