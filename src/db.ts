import Database from "better-sqlite3";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { config } from "./config.js";

export interface SqliteDb {
  exec(sql: string): void;
  prepare(sql: string): {
    run(...params: unknown[]): unknown;
    get(...params: unknown[]): unknown;
    all(...params: unknown[]): unknown[];
  };
}

const SCHEMA_PATH = fileURLToPath(new URL("../sql/schema.sql", import.meta.url));

export function createDb(dbPath = config.dbPath): SqliteDb {
  return new Database(dbPath);
}

export function initDb(db: SqliteDb): void {
  const schema = fs.readFileSync(SCHEMA_PATH, "utf8");
  db.exec(schema);
}
