/**
 * SQLite access shared by the session and memory stores.
 *
 * Both stores may point at the same file; their table names do not collide.
 */

import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import type { Logger } from "../log.js";

export type SqliteDatabase = Database.Database;

export type OpenDatabaseOptions = {
  /** File path, or ":memory:" */
  path: string;
  /** How long a writer waits on a locked database before SQLITE_BUSY */
  busyTimeoutMs?: number;
  logger?: Logger;
};

export function openDatabase(options: OpenDatabaseOptions): SqliteDatabase {
  if (options.path !== ":memory:") {
    fs.mkdirSync(path.dirname(options.path), { recursive: true });
  }

  const db = new Database(options.path, { timeout: options.busyTimeoutMs ?? 5000 });
  if (options.path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  options.logger?.debug({ path: options.path }, "Database opened");
  return db;
}

/**
 * Add columns that older databases are missing. Additive only.
 */
export function ensureColumns(
  db: SqliteDatabase,
  table: string,
  columns: Record<string, string>,
): void {
  const existing = new Set(
    db
      .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
      .all()
      .map((row) => row.name),
  );

  for (const [name, definition] of Object.entries(columns)) {
    if (existing.has(name)) continue;
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${name} ${definition}`);
  }
}

type SqliteErrorLike = { code: string };

function hasCode(err: unknown): err is SqliteErrorLike {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string";
}

export function isUniqueViolation(err: unknown): boolean {
  return hasCode(err) && (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY");
}

export function isBusy(err: unknown): boolean {
  return hasCode(err) && (err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED");
}
