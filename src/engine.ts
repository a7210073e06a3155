// Embedded Engine on SQLite

import Database from "better-sqlite3";
import { randomUUID } from "crypto";
import { cosineSimilarity, embedText } from "./embedding.js";
import type { Row, SearchHit, StorageStats, TableInfo } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export type QueryResult = {
  data: Row[];
  meta: {
    count: number;
    changes: number;
    timeMs: number;
  };
};

interface VectorRow {
  index_id: string;
  item_id: string;
  vector: string; // JSON array
  metadata: string; // JSON object
}

interface IndexRow {
  id: string;
  table_name: string;
  column_name: string;
}

type SqlValue = string | number | bigint | Buffer | null;

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
CREATE TABLE IF NOT EXISTS _vectra_tables (
    name TEXT PRIMARY KEY,
    schema TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS _vectra_indexes (
    id TEXT PRIMARY KEY,
    table_name TEXT NOT NULL,
    column_name TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS _vectra_vectors (
    index_id TEXT NOT NULL,
    item_id TEXT NOT NULL,
    vector JSON NOT NULL,
    metadata JSON DEFAULT '{}',
    PRIMARY KEY (index_id, item_id),
    FOREIGN KEY (index_id) REFERENCES _vectra_indexes(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS _vectra_subscriptions (
    id TEXT PRIMARY KEY,
    topic TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_vectors_index ON _vectra_vectors(index_id);
CREATE INDEX IF NOT EXISTS idx_indexes_table ON _vectra_indexes(table_name);
`;

/**
 * A table, index or subscription that does not exist.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_PREFIXES = ["_vectra_", "sqlite_"];

// ============================================================================
// Engine
// ============================================================================

/**
 * In-process engine: SQL over SQLite, schemaless row insertion, vector
 * indexes over table columns and stream subscriptions.
 */
export class EmbeddedEngine {
  private db: Database.Database;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  /**
   * Run one SQL statement. Readers return their rows, writers their change count.
   */
  query(sql: string): QueryResult {
    const start = performance.now();
    const stmt = this.db.prepare<unknown[], Row>(sql);

    if (stmt.reader) {
      const rows = stmt.all();
      return {
        data: rows,
        meta: { count: rows.length, changes: 0, timeMs: performance.now() - start },
      };
    }

    const result = stmt.run();
    return {
      data: [],
      meta: { count: 0, changes: result.changes, timeMs: performance.now() - start },
    };
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  /**
   * Create a table from a column definition list. Existing tables are left as they are.
   */
  createTable(name: string, schema: string): void {
    assertTableName(name);
    if (!schema.trim()) {
      throw new Error("Schema must not be empty");
    }

    this.db.transaction(() => {
      this.db.exec(`CREATE TABLE IF NOT EXISTS ${quote(name)} (${schema})`);
      this.register(name, schema);
    })();
  }

  /**
   * Insert rows, creating the table or adding columns for keys it lacks.
   * Objects and arrays are stored as JSON, booleans as 0/1.
   * @returns number of rows inserted
   */
  insertRows(table: string, rows: Row[]): number {
    assertTableName(table);
    if (rows.length === 0) return 0;

    const keys = [...new Set(rows.flatMap((row) => Object.keys(row)))];
    for (const key of keys) {
      assertIdentifier(key, "column");
    }

    const insertAll = this.db.transaction(() => {
      const existing = this.columns(table);
      if (existing.length === 0) {
        if (keys.length === 0) {
          throw new Error(`Cannot create table '${table}' from rows without columns`);
        }
        const schema = keys.map(quote).join(", ");
        this.db.exec(`CREATE TABLE ${quote(table)} (${schema})`);
        this.register(table, keys.join(", "));
      } else {
        for (const key of keys.filter((k) => !existing.includes(k))) {
          this.db.exec(`ALTER TABLE ${quote(table)} ADD COLUMN ${quote(key)}`);
        }
      }

      const indexes = this.indexesFor(table);
      const statements = new Map<string, Database.Statement<SqlValue[]>>();

      for (const row of rows) {
        const columns = Object.keys(row);
        const signature = columns.join(",");
        let stmt = statements.get(signature);
        if (!stmt) {
          const sql =
            columns.length === 0
              ? `INSERT INTO ${quote(table)} DEFAULT VALUES`
              : `INSERT INTO ${quote(table)} (${columns.map(quote).join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`;
          stmt = this.db.prepare<SqlValue[]>(sql);
          statements.set(signature, stmt);
        }

        const result = stmt.run(...columns.map((c) => toSqlValue(row[c])));
        for (const index of indexes) {
          this.indexValue(index, String(result.lastInsertRowid), row[index.column_name]);
        }
      }
    });

    insertAll();
    return rows.length;
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite!_%' ESCAPE '!' AND name NOT LIKE '!_vectra!_%' ESCAPE '!' ORDER BY name"
      )
      .all()
      .map((row) => row.name);
  }

  tableInfo(table: string): TableInfo {
    const columns = this.columns(table);
    if (columns.length === 0) {
      throw new NotFoundError(`Table not found: ${table}`);
    }

    const count = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quote(table)}`)
      .get();
    const lengths = columns
      .map((c) => `COALESCE(LENGTH(CAST(${quote(c)} AS BLOB)), 0)`)
      .join(" + ");
    const size = this.db
      .prepare<[], { size: number }>(`SELECT COALESCE(SUM(${lengths}), 0) AS size FROM ${quote(table)}`)
      .get();
    const registered = this.db
      .prepare<[string], { created_at: string }>("SELECT created_at FROM _vectra_tables WHERE name = ?")
      .get(table);

    return {
      name: table,
      rows: count?.count ?? 0,
      sizeBytes: size?.size ?? 0,
      createdAt: registered?.created_at ?? null,
      columns,
    };
  }

  stats(): StorageStats {
    const infos = this.listTables().map((t) => this.tableInfo(t));
    return {
      totalTables: infos.length,
      totalRows: infos.reduce((sum, info) => sum + info.rows, 0),
      totalSizeBytes: infos.reduce((sum, info) => sum + info.sizeBytes, 0),
    };
  }

  // ==========================================================================
  // Vector Indexes
  // ==========================================================================

  /**
   * Index a column. Existing rows are embedded now, later inserts as they arrive.
   * Text is embedded with `embedText`; JSON number arrays are used as vectors.
   */
  createIndex(table: string, column: string): string {
    const columns = this.columns(table);
    if (columns.length === 0) {
      throw new NotFoundError(`Table not found: ${table}`);
    }
    if (!columns.includes(column)) {
      throw new Error(`Column not found: ${table}.${column}`);
    }

    const id = `idx_${randomUUID()}`;
    this.db.transaction(() => {
      this.db
        .prepare("INSERT INTO _vectra_indexes (id, table_name, column_name, created_at) VALUES (?, ?, ?, ?)")
        .run(id, table, column, new Date().toISOString());

      const index: IndexRow = { id, table_name: table, column_name: column };
      const rows = this.db
        .prepare<[], { rid: number; value: unknown }>(
          `SELECT rowid AS rid, ${quote(column)} AS value FROM ${quote(table)} WHERE ${quote(column)} IS NOT NULL`
        )
        .all();
      for (const row of rows) {
        this.indexValue(index, String(row.rid), row.value);
      }
    })();

    return id;
  }

  insertVector(
    indexId: string,
    itemId: string | number,
    vector: number[],
    metadata: Record<string, unknown> = {}
  ): void {
    this.requireIndex(indexId);
    this.db
      .prepare("INSERT OR REPLACE INTO _vectra_vectors (index_id, item_id, vector, metadata) VALUES (?, ?, ?, ?)")
      .run(indexId, String(itemId), JSON.stringify(vector), JSON.stringify(metadata));
  }

  /**
   * Nearest neighbours of `vector` in one index. Stored vectors of another
   * dimension are skipped.
   */
  searchIndex(indexId: string, vector: number[], limit: number): SearchHit[] {
    this.requireIndex(indexId);
    const rows = this.db
      .prepare<[string], VectorRow>("SELECT * FROM _vectra_vectors WHERE index_id = ?")
      .all(indexId);
    return rank(rows, vector, limit);
  }

  /**
   * Text search across every index.
   */
  search(text: string, limit: number): SearchHit[] {
    const rows = this.db.prepare<[], VectorRow>("SELECT * FROM _vectra_vectors").all();
    return rank(rows, embedText(text), limit);
  }

  /**
   * @returns whether an index was removed
   */
  dropIndex(indexId: string): boolean {
    const result = this.db.prepare("DELETE FROM _vectra_indexes WHERE id = ?").run(indexId);
    return result.changes > 0;
  }

  // ==========================================================================
  // Streams
  // ==========================================================================

  subscribe(topic: string): { id: string; status: string } {
    const id = `sub_${randomUUID()}`;
    this.db
      .prepare("INSERT INTO _vectra_subscriptions (id, topic, status, created_at) VALUES (?, ?, 'active', ?)")
      .run(id, topic, new Date().toISOString());
    return { id, status: "active" };
  }

  /**
   * Cancel a subscription. Cancelling twice is allowed.
   */
  unsubscribe(subscriptionId: string): void {
    const result = this.db
      .prepare("UPDATE _vectra_subscriptions SET status = 'cancelled' WHERE id = ?")
      .run(subscriptionId);
    if (result.changes === 0) {
      throw new NotFoundError(`Subscription not found: ${subscriptionId}`);
    }
  }

  subscriptionStatus(subscriptionId: string): string | null {
    const row = this.db
      .prepare<[string], { status: string }>("SELECT status FROM _vectra_subscriptions WHERE id = ?")
      .get(subscriptionId);
    return row?.status ?? null;
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private columns(table: string): string[] {
    return this.db
      .prepare<[], { name: string }>(`PRAGMA table_info(${quote(table)})`)
      .all()
      .map((c) => c.name);
  }

  private register(name: string, schema: string): void {
    this.db
      .prepare("INSERT OR IGNORE INTO _vectra_tables (name, schema, created_at) VALUES (?, ?, ?)")
      .run(name, schema, new Date().toISOString());
  }

  private indexesFor(table: string): IndexRow[] {
    return this.db
      .prepare<[string], IndexRow>("SELECT id, table_name, column_name FROM _vectra_indexes WHERE table_name = ?")
      .all(table);
  }

  private requireIndex(indexId: string): void {
    const found = this.db
      .prepare<[string], { id: string }>("SELECT id FROM _vectra_indexes WHERE id = ?")
      .get(indexId);
    if (!found) {
      throw new NotFoundError(`Index not found: ${indexId}`);
    }
  }

  private indexValue(index: IndexRow, itemId: string, value: unknown): void {
    const vector = toVector(value);
    if (!vector) return;

    const metadata: Record<string, unknown> = { table: index.table_name, index: index.id };
    if (typeof value === "string" && !Array.isArray(parseJson(value))) {
      metadata.text = value.slice(0, 200);
    }
    this.db
      .prepare("INSERT OR REPLACE INTO _vectra_vectors (index_id, item_id, vector, metadata) VALUES (?, ?, ?, ?)")
      .run(index.id, itemId, JSON.stringify(vector), JSON.stringify(metadata));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function rank(rows: VectorRow[], query: number[], limit: number): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const row of rows) {
    const vector = toNumberArray(parseJson(row.vector));
    if (!vector || vector.length !== query.length) continue;
    const metadata = parseJson(row.metadata);
    hits.push({
      id: row.item_id,
      score: cosineSimilarity(query, vector),
      metadata: isRecord(metadata) ? metadata : {},
    });
  }
  return hits.sort((a, b) => b.score - a.score).slice(0, limit);
}

function toVector(value: unknown): number[] | null {
  if (Array.isArray(value)) return toNumberArray(value);
  if (typeof value !== "string" || value.length === 0) return null;
  return toNumberArray(parseJson(value)) ?? embedText(value);
}

function toNumberArray(value: unknown): number[] | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") return null;
    numbers.push(item);
  }
  return numbers;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }
  if (Buffer.isBuffer(value)) return value;
  return JSON.stringify(value);
}

function quote(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

function assertIdentifier(name: string, kind: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid ${kind} name: ${name}`);
  }
}

function assertTableName(name: string): void {
  assertIdentifier(name, "table");
  if (RESERVED_PREFIXES.some((prefix) => name.startsWith(prefix))) {
    throw new Error(`Table name is reserved: ${name}`);
  }
}
