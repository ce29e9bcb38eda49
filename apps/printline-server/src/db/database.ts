import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import config from "../config.js";

let db: Database.Database | undefined;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDb() first.");
  }
  return db;
}

/** Open the queue database. Pass ":memory:" for a throwaway database. */
export function initDb(filename?: string): Database.Database {
  let dbPath = filename;
  if (!dbPath) {
    fs.mkdirSync(config.dataDir, { recursive: true });
    dbPath = path.join(config.dataDir, "queue.sqlite");
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      printed INTEGER NOT NULL DEFAULT 0 CHECK(printed IN (0, 1)),
      printed_at INTEGER DEFAULT NULL,
      CHECK ((printed = 0 AND printed_at IS NULL) OR (printed = 1 AND printed_at IS NOT NULL))
    );

    CREATE INDEX IF NOT EXISTS idx_messages_created
      ON messages(created_at);

    -- Oldest-pending lookup must not scan the whole table
    CREATE INDEX IF NOT EXISTS idx_messages_pending
      ON messages(printed, created_at);
  `);
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
