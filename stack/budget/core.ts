import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BudgetDb, errorCode } from "./db.js";
import { SCHEMA } from "./schema.js";

const IN_MEMORY = ":memory:";

function openBudgetDb(path: string): BudgetDb {
  let db: BudgetDb;
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
  } catch (cause) {
    throw new Error(
      `Cannot open budget database at ${path} (${errorCode(cause) ?? "unknown error"})`,
      { cause },
    );
  }
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}

async function withBudgetDb<T>(path: string, fn: (db: BudgetDb) => T | Promise<T>): Promise<T> {
  const db = openBudgetDb(path);
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export { IN_MEMORY, openBudgetDb, withBudgetDb };
