import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { config } from "../shared/config.js";
import { applySchema } from "./schema.js";
import { createLogger } from "../shared/logger.js";

const log = createLogger("db");

const IN_MEMORY = ":memory:";

let _db: Database.Database | null = null;

/**
 * Open a database file with the shared pragmas and bring its schema up to
 * date. The aggregator and the web server open the same file concurrently.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  // In-memory databases stay in "memory" journal mode
  if (path !== IN_MEMORY) db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  applySchema(db);
  return db;
}

/** Process-wide connection, opened on first use at CV_DB_PATH. */
export function getDb(): Database.Database {
  if (!_db) {
    log.info("Opening database", { path: config.dbPath });
    _db = openDatabase(config.dbPath);
  }
  return _db;
}

export function closeDb(): void {
  if (!_db) return;
  _db.close();
  _db = null;
  log.info("Database closed");
}

/** Run fn in a transaction on the shared connection; a throw rolls it back. */
export function inTransaction<T>(fn: (db: Database.Database) => T): T {
  const db = getDb();
  return db.transaction(() => fn(db))();
}
