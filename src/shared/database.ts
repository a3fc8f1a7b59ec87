/**
 * Database Client
 * ===============
 * SQLite through better-sqlite3, queried with drizzle.
 *
 * `DATABASE_URL` accepts `file:<path>`, a bare path, or `:memory:`.
 */

import { mkdirSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";

import * as schema from "./db-schema.js";
import { logger } from "./logger.js";

export type Db = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: Db;
  close: () => void;
};

const SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

export function resolveDatabasePath(url: string): string {
  const trimmed = url.trim();
  if (trimmed === ":memory:" || trimmed === "file::memory:") {return ":memory:";}
  return trimmed.startsWith("file:") ? trimmed.slice("file:".length) : trimmed;
}

export function openDatabase(url: string): DatabaseHandle {
  const path = resolveDatabasePath(url);
  if (path !== ":memory:") {
    mkdirSync(dirname(resolve(path)), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(readFileSync(SCHEMA_PATH, "utf8"));

  logger.debug("Database opened", { path });

  return {
    db: drizzle(sqlite, { schema }),
    close: () => {
      if (sqlite.open) {sqlite.close();}
    },
  };
}

/**
 * Walks an error's `cause` chain for a SQLite unique-constraint failure and
 * returns the offending column (`users.email` -> `email`).
 */
export function findUniqueViolation(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const m = /UNIQUE constraint failed: \w+\.(\w+)/.exec(current.message);
    if (m?.[1]) {return m[1];}
    current = current.cause;
  }
  return null;
}
