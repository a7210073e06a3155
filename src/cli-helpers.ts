// CLI Helper Functions

import type { Row } from "./types.js";
import { ValidationError } from "./types.js";

// ============================================================================
// Formatting Helpers
// ============================================================================

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

export function formatValue(val: unknown): string {
  if (val === null) return "null";
  if (val === undefined) return "";
  if (typeof val === "object") return JSON.stringify(val);
  return String(val);
}

// ============================================================================
// Table Formatting
// ============================================================================

export function formatTableRow(
  columns: string[],
  row: Record<string, unknown>,
  widths: Record<string, number>
): string {
  return columns
    .map((col) => {
      const val = formatValue(row[col]);
      return val.slice(0, widths[col]).padEnd(widths[col]);
    })
    .join(" | ");
}

export function calculateColumnWidths(
  columns: string[],
  rows: Record<string, unknown>[],
  maxWidth: number = 40
): Record<string, number> {
  const widths: Record<string, number> = {};

  for (const col of columns) {
    widths[col] = col.length;
  }

  for (const row of rows) {
    for (const col of columns) {
      const val = formatValue(row[col]);
      widths[col] = Math.max(widths[col], val.length);
    }
  }

  // Cap max width
  for (const col of columns) {
    widths[col] = Math.min(widths[col], maxWidth);
  }

  return widths;
}

/**
 * Header, separator and one line per row, each indented by two spaces.
 */
export function renderTable(rows: Record<string, unknown>[]): string[] {
  if (rows.length === 0) return ["  (no results)"];

  const columns = Object.keys(rows[0]);
  const widths = calculateColumnWidths(columns, rows);
  const lines = [
    `  ${columns.map((col) => col.padEnd(widths[col])).join(" | ")}`,
    `  ${columns.map((col) => "-".repeat(widths[col])).join("-+-")}`,
  ];
  for (const row of rows) {
    lines.push(`  ${formatTableRow(columns, row, widths)}`);
  }
  return lines;
}

/**
 * The row array of a query payload, when it has one.
 */
export function extractRows(payload: Record<string, unknown>): Row[] | null {
  const data = payload.data;
  if (!Array.isArray(data)) return null;
  const rows: Row[] = [];
  for (const item of data) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) return null;
    rows.push({ ...item });
  }
  return rows;
}

// ============================================================================
// Input Parsing
// ============================================================================

/**
 * Parse the JSON argument of `insert`: one object or an array of objects.
 */
export function parseRows(json: string): Row[] {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    throw new ValidationError("Invalid JSON data");
  }

  const items = Array.isArray(value) ? value : [value];
  const rows: Row[] = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new ValidationError("Data must be a JSON object or an array of objects");
    }
    rows.push({ ...item });
  }
  return rows;
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Invalid limit: ${value}`);
  }
  return limit;
}

// ============================================================================
// Interactive Mode
// ============================================================================

const STATEMENT_KEYWORDS = ["SELECT", "CREATE", "INSERT", "UPDATE", "DELETE", "WITH", "DROP", "ALTER"];

export type InteractiveCommand =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "help" }
  | { kind: "statement"; sql: string }
  | { kind: "unknown"; input: string };

/**
 * Classify one line typed at the interactive prompt.
 */
export function interpretLine(line: string): InteractiveCommand {
  const input = line.trim();
  if (!input) return { kind: "empty" };

  const lower = input.toLowerCase();
  if (lower === "quit" || lower === "exit") return { kind: "quit" };
  if (lower === "help") return { kind: "help" };

  const keyword = input.split(/\s+/)[0].toUpperCase();
  if (STATEMENT_KEYWORDS.includes(keyword)) {
    return { kind: "statement", sql: input.replace(/;\s*$/, "") };
  }
  return { kind: "unknown", input };
}

export const INTERACTIVE_HELP = [
  "Available commands:",
  `  SQL statements: ${STATEMENT_KEYWORDS.join(", ")}`,
  "  help        - Show this help",
  "  quit/exit   - Exit interactive mode",
];
