// HTTP Routes using Hono
// Serves an embedded engine over the VectraEdge wire protocol. Published as
// `vectraedge/server`, apart from the client entry, since it needs better-sqlite3.

import { Hono } from "hono";
import type { Context } from "hono";
import { z } from "zod";
import { EmbeddedEngine, NotFoundError } from "./engine.js";
import { openEngine } from "./embedded.js";
import { VERSION } from "./version.js";

// ============================================================================
// Request Schemas
// ============================================================================

const querySchema = z.object({ query: z.string().min(1) });

const searchSchema = z.object({
  query: z.string(),
  limit: z.number().int().positive().default(10),
});

const subscribeSchema = z.object({ topic: z.string().min(1) });

const createTableSchema = z.object({ name: z.string().min(1), schema: z.string().min(1) });

const insertSchema = z.object({ rows: z.array(z.record(z.unknown())) });

const createIndexSchema = z.object({ table: z.string().min(1), column: z.string().min(1) });

const indexSearchSchema = z.object({
  vector: z.array(z.number()).min(1),
  limit: z.number().int().positive().default(10),
});

const insertVectorSchema = z.object({
  id: z.union([z.string(), z.number()]),
  vector: z.array(z.number()).min(1),
  metadata: z.record(z.unknown()).default({}),
});

class BadRequestError extends Error {}

async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new BadRequestError("Invalid JSON body");
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BadRequestError(
      issue ? `Invalid '${issue.path.join(".")}' field: ${issue.message}` : "Invalid request body"
    );
  }
  return parsed.data;
}

// ============================================================================
// Create App
// ============================================================================

export function createApp(engine: EmbeddedEngine): Hono {
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message }, 404);
    }
    return c.json({ error: err.message }, 400);
  });

  app.get("/", (c) => c.text("VectraEdge - AI-Native OLAP Engine\n"));

  app.get("/health", (c) => {
    return c.json({ status: "healthy", version: VERSION, timestamp: new Date().toISOString() });
  });

  // ============================================================================
  // Core Endpoints
  // ============================================================================

  app.post("/query", async (c) => {
    const body = await readBody(c, querySchema);
    return c.json(engine.query(body.query));
  });

  app.post("/vector/search", async (c) => {
    const body = await readBody(c, searchSchema);
    return c.json({
      results: engine.search(body.query, body.limit),
      query: body.query,
      limit: body.limit,
    });
  });

  app.post("/stream/subscribe", async (c) => {
    const body = await readBody(c, subscribeSchema);
    const subscription = engine.subscribe(body.topic);
    return c.json({
      subscriptionId: subscription.id,
      topic: body.topic,
      status: subscription.status,
    });
  });

  // ============================================================================
  // Admin Endpoints
  // ============================================================================

  app.delete("/stream/subscriptions/:id", (c) => {
    engine.unsubscribe(c.req.param("id"));
    return c.json({ status: "cancelled" });
  });

  app.get("/tables", (c) => c.json({ tables: engine.listTables() }));

  app.post("/tables", async (c) => {
    const body = await readBody(c, createTableSchema);
    engine.createTable(body.name, body.schema);
    return c.json({ name: body.name }, 201);
  });

  app.get("/tables/:name", (c) => c.json(engine.tableInfo(c.req.param("name"))));

  app.post("/tables/:name/rows", async (c) => {
    const body = await readBody(c, insertSchema);
    const inserted = engine.insertRows(c.req.param("name"), body.rows);
    return c.json({ inserted });
  });

  app.get("/stats", (c) => c.json(engine.stats()));

  app.post("/vector/indexes", async (c) => {
    const body = await readBody(c, createIndexSchema);
    const indexId = engine.createIndex(body.table, body.column);
    return c.json({ indexId, status: "ready" }, 201);
  });

  app.post("/vector/indexes/:id/search", async (c) => {
    const body = await readBody(c, indexSearchSchema);
    return c.json({
      results: engine.searchIndex(c.req.param("id"), body.vector, body.limit),
      limit: body.limit,
    });
  });

  app.post("/vector/indexes/:id/vectors", async (c) => {
    const body = await readBody(c, insertVectorSchema);
    engine.insertVector(c.req.param("id"), body.id, body.vector, body.metadata);
    return c.json({ inserted: 1 });
  });

  app.delete("/vector/indexes/:id", (c) => {
    return c.json({ deleted: engine.dropIndex(c.req.param("id")) });
  });

  return app;
}

// ============================================================================
// Server Factory
// ============================================================================

export interface ServerOptions {
  port?: number;
  dataPath?: string;
}

export function createServer(options: ServerOptions = {}) {
  const { port = 8080, dataPath = ":memory:" } = options;

  const engine = openEngine(dataPath);
  const app = createApp(engine);

  return {
    app,
    engine,
    port,
    fetch: app.fetch,
  };
}
