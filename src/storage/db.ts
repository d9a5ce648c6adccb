import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type Db = BetterSQLite3Database<typeof schema>;

const schemaSql = readFileSync(new URL("../../sql/schema.sql", import.meta.url), "utf8");

/**
 * Open (or create) the SQLite database and make sure every table exists.
 * Pass ":memory:" for a throwaway database.
 */
export function createDatabase(databasePath: string): Db {
  if (databasePath !== ":memory:") {
    mkdirSync(dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(schemaSql);

  return drizzle(sqlite, { schema });
}
