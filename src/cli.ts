#!/usr/bin/env node

import { Command } from "commander";
import { serve } from "@hono/node-server";
import * as fs from "fs";
import * as readline from "readline/promises";
import { pathToFileURL } from "url";
import { detectEmbeddedCapability } from "./capability.js";
import { TransportClient, createTransport } from "./client.js";
import { parsePort, resolveConfig } from "./config.js";
import type { TransportMode } from "./types.js";
import { UnavailableTransportError } from "./types.js";
import { VERSION } from "./version.js";
import {
  INTERACTIVE_HELP,
  extractRows,
  formatBytes,
  interpretLine,
  parseLimit,
  parseRows,
  renderTable,
} from "./cli-helpers.js";

interface GlobalOptions {
  host?: string;
  port?: number;
  embedded: boolean;
  placeholder: boolean;
  data?: string;
  adminApi: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function fail(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
}

async function openClient(options: GlobalOptions): Promise<TransportClient> {
  let mode: TransportMode | undefined;
  if (options.embedded) mode = "embedded";
  if (options.placeholder) mode = "placeholder";

  const config = resolveConfig({
    host: options.host,
    port: options.port,
    mode,
    dataPath: options.data,
    adminApi: options.adminApi || undefined,
    embeddedAvailable: mode === "embedded" ? await detectEmbeddedCapability() : undefined,
  });
  return new TransportClient(config, await createTransport(config));
}

// ============================================================================
// Program
// ============================================================================

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("vectra")
    .description("VectraEdge - SQL, vector search and streaming client")
    .version(VERSION)
    .option("-H, --host <host>", "Server host (default: VECTRA_HOST or 127.0.0.1)")
    .option("-p, --port <port>", "Server port (default: VECTRA_PORT or 8080)", parsePort)
    .option("--embedded", "Use the in-process embedded engine", false)
    .option("--placeholder", "Use placeholder responses, no server interaction", false)
    .option("-d, --data <path>", "Data directory for the embedded engine (default: :memory:)")
    .option("--admin-api", "Send administrative operations to the server", false);

  /**
   * Run an action against a client built from the global options. The client
   * is always closed, and failures become `Error: <message>` with exit code 1.
   */
  const withClient = async (fn: (client: TransportClient) => Promise<void>): Promise<void> => {
    let client: TransportClient | undefined;
    try {
      client = await openClient(program.opts<GlobalOptions>());
      await fn(client);
    } catch (err) {
      fail(err);
    } finally {
      client?.close();
    }
  };

  // ==========================================================================
  // query - Execute a SQL statement
  // ==========================================================================

  program
    .command("query <sql>")
    .description("Execute a SQL query")
    .option("--json", "Output as JSON", false)
    .action((sql: string, options: { json: boolean }) =>
      withClient(async (client) => {
        const start = performance.now();
        const result = await client.executeQuery(sql);
        const elapsed = (performance.now() - start).toFixed(2);

        const rows = extractRows(result);
        if (options.json || !rows) {
          printJson(result);
          return;
        }
        console.log(`\nResults (${rows.length} rows, ${elapsed}ms):\n`);
        printLines(renderTable(rows));
      })
    );

  // ==========================================================================
  // search - Vector similarity search
  // ==========================================================================

  program
    .command("search <query>")
    .description("Run a vector similarity search")
    .option("-l, --limit <n>", "Maximum number of results", parseLimit, 10)
    .action((query: string, options: { limit: number }) =>
      withClient(async (client) => {
        const result = await client.vectorSearch(query, options.limit);
        console.log(`\nSearch results for '${query}' (limit ${result.limit}):\n`);
        printLines(
          renderTable(
            result.results.map((hit) => ({
              id: hit.id,
              score: hit.score.toFixed(4),
              metadata: hit.metadata,
            }))
          )
        );
      })
    );

  // ==========================================================================
  // subscribe - Subscribe to a topic
  // ==========================================================================

  program
    .command("subscribe <topic>")
    .description("Subscribe to a stream topic")
    .action((topic: string) =>
      withClient(async (client) => {
        const subscription = await client.subscribeStream(topic);
        console.log(`Subscribed to '${subscription.topic}'`);
        console.log(`  ID:     ${subscription.id}`);
        console.log(`  Status: ${subscription.status}`);
      })
    );

  // ==========================================================================
  // Administration
  // ==========================================================================

  program
    .command("create-table <table> <schema>")
    .description("Create a table, e.g. create-table docs \"id INTEGER, text TEXT\"")
    .action((table: string, schema: string) =>
      withClient(async (client) => {
        await client.createTable(table, schema);
        console.log(`Table '${table}' created.`);
      })
    );

  program
    .command("insert <table> <json>")
    .description("Insert a JSON object or an array of objects into a table")
    .action((table: string, json: string) =>
      withClient(async (client) => {
        const rows = parseRows(json);
        await client.insertData(table, rows);
        console.log(`Inserted ${rows.length} row(s) into '${table}'.`);
      })
    );

  program
    .command("create-index <table> <column>")
    .description("Create a vector index over a table column")
    .action((table: string, column: string) =>
      withClient(async (client) => {
        const index = await client.createVectorIndex(table, column);
        console.log(`Index '${index.id}' on ${table}.${column} (${index.status})`);
      })
    );

  program
    .command("list-tables")
    .description("List all tables")
    .action(() =>
      withClient(async (client) => {
        const tables = await client.listTables();
        if (tables.length === 0) {
          console.log("No tables found.");
          return;
        }
        console.log(`\nTables (${tables.length}):\n`);
        for (const table of tables) {
          console.log(`  ${table}`);
        }
      })
    );

  program
    .command("table-info <table>")
    .description("Show row count and size of a table")
    .action((table: string) =>
      withClient(async (client) => {
        const info = await client.getTableInfo(table);
        console.log(`\nTable: ${info.name}\n`);
        console.log(`  Rows:     ${info.rows}`);
        console.log(`  Size:     ${formatBytes(info.sizeBytes)}`);
        console.log(`  Created:  ${info.createdAt ?? "unknown"}`);
        if (info.columns && info.columns.length > 0) {
          console.log(`  Columns:  ${info.columns.join(", ")}`);
        }
      })
    );

  program
    .command("stats")
    .description("Show storage statistics")
    .action(() =>
      withClient(async (client) => {
        const stats = await client.getStats();
        console.log(`\nStorage statistics:\n`);
        console.log(`  Tables: ${stats.totalTables}`);
        console.log(`  Rows:   ${stats.totalRows}`);
        console.log(`  Size:   ${formatBytes(stats.totalSizeBytes)}`);
      })
    );

  program
    .command("health")
    .description("Check server health")
    .action(() =>
      withClient(async (client) => {
        printJson(await client.healthCheck());
      })
    );

  // ==========================================================================
  // interactive - Read statements from a prompt
  // ==========================================================================

  program
    .command("interactive")
    .description("Start an interactive SQL prompt")
    .action(() =>
      withClient(async (client) => {
        const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        console.log("VectraEdge interactive mode. Type 'help' for commands, 'quit' to exit.");
        rl.setPrompt("vectra> ");
        rl.prompt();

        try {
          for await (const line of rl) {
            const command = interpretLine(line);
            if (command.kind === "quit") break;

            switch (command.kind) {
              case "help":
                printLines(INTERACTIVE_HELP);
                break;
              case "statement":
                try {
                  printJson(await client.executeQuery(command.sql));
                } catch (err) {
                  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
                }
                break;
              case "unknown":
                console.log(`Unknown command: ${command.input}. Type 'help' for available commands.`);
                break;
              case "empty":
                break;
            }
            rl.prompt();
          }
        } finally {
          rl.close();
        }
        console.log("Goodbye!");
      })
    );

  // ==========================================================================
  // serve - Start the development server
  // ==========================================================================

  program
    .command("serve")
    .description("Serve an embedded engine over HTTP")
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const host = options.host ?? process.env.VECTRA_HOST ?? "127.0.0.1";
      const port = options.port ?? parsePort(process.env.VECTRA_PORT ?? "8080");
      const dataPath = options.data ?? process.env.VECTRA_DATA_PATH ?? ":memory:";

      if (!(await detectEmbeddedCapability())) {
        fail(
          new UnavailableTransportError(
            "The server requires better-sqlite3. Install it with: npm install better-sqlite3"
          )
        );
        return;
      }
      // The engine pulls in better-sqlite3, so load it only once the probe passed
      const { createServer } = await import("./routes.js");
      const { app, engine } = createServer({ port, dataPath });

      console.log(`
VectraEdge Server v${VERSION}
  Endpoint:  http://${host}:${port}
  Data:      ${dataPath}

  Routes:
    POST /query                 - Execute SQL
    POST /vector/search         - Vector similarity search
    POST /stream/subscribe      - Subscribe to a topic
    GET  /health                - Health check
    /tables, /stats, /vector/indexes, /stream/subscriptions - Administration
`);

      serve({
        fetch: app.fetch,
        port,
        hostname: host,
      });

      const shutdown = () => {
        console.log("\nShutting down...");
        engine.close();
        process.exit(0);
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    });

  return program;
}

// Run when executed directly (also through the npm bin symlink)
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href) {
  buildProgram()
    .parseAsync()
    .catch((err: unknown) => fail(err));
}
