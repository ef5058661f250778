import type Database from "better-sqlite3";
import { createLogger } from "../shared/logger.js";

const log = createLogger("schema");

/** Current schema version — bump when adding migrations */
export const SCHEMA_VERSION = 2;

const SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS instances (
  id               TEXT PRIMARY KEY,
  role             TEXT NOT NULL DEFAULT 'worker',
  instance_state   TEXT NOT NULL DEFAULT 'pending',
  worker_status    TEXT NOT NULL DEFAULT 'Pending',
  instance_type    TEXT NOT NULL DEFAULT 'Unknown',
  public_ip        TEXT,
  private_ip       TEXT,
  local_hostname   TEXT,
  num_cpus         INTEGER NOT NULL DEFAULT 1,
  load             TEXT NOT NULL DEFAULT '0',
  nfs_data         INTEGER NOT NULL DEFAULT 0,
  nfs_tools        INTEGER NOT NULL DEFAULT 0,
  nfs_indices      INTEGER NOT NULL DEFAULT 0,
  nfs_sge          INTEGER NOT NULL DEFAULT 0,
  get_cert         INTEGER NOT NULL DEFAULT 0,
  sge_started      INTEGER NOT NULL DEFAULT 0,
  is_alive         INTEGER NOT NULL DEFAULT 0,
  node_ready       INTEGER NOT NULL DEFAULT 0,
  last_comm_at     TEXT,
  state_changed_at TEXT NOT NULL,
  seq              INTEGER NOT NULL,
  created_at       TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at       TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS autoscaling (
  id            INTEGER PRIMARY KEY CHECK (id = 1),
  enabled       INTEGER NOT NULL DEFAULT 0,
  min_nodes     INTEGER NOT NULL DEFAULT 0,
  max_nodes     INTEGER NOT NULL DEFAULT 0,
  instance_type TEXT,
  updated_at    TEXT NOT NULL DEFAULT (datetime('now'))
);

INSERT OR IGNORE INTO autoscaling (id) VALUES (1);

CREATE TABLE IF NOT EXISTS events (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  instance_id TEXT,
  type        TEXT NOT NULL,
  payload     TEXT NOT NULL DEFAULT '{}',
  created_at  TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_instances_role_seq ON instances(role, seq);
CREATE INDEX IF NOT EXISTS idx_events_instance ON events(instance_id, id DESC);

CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);
`;

/**
 * Apply schema to the database, running migrations if needed.
 */
export function applySchema(db: Database.Database): void {
  const hasVersionTable = db
    .prepare(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`
    )
    .get();

  if (!hasVersionTable) {
    db.exec(SCHEMA_V1);
    migrateToV2(db);
    db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(
      SCHEMA_VERSION
    );
    log.info("Applied fresh schema", { version: SCHEMA_VERSION });
    return;
  }

  const row = db
    .prepare(`SELECT version FROM schema_version LIMIT 1`)
    .get() as { version: number } | undefined;
  const currentVersion = row?.version ?? 0;

  if (currentVersion < SCHEMA_VERSION) {
    log.info("Migrating schema", { from: currentVersion, to: SCHEMA_VERSION });
    applyMigrations(db, currentVersion);
    db.prepare(`UPDATE schema_version SET version = ?`).run(SCHEMA_VERSION);
  }
}

function applyMigrations(
  db: Database.Database,
  fromVersion: number
): void {
  if (fromVersion < 2) {
    migrateToV2(db);
  }
}

/** v2: transient file system flag reported by newer workers */
function migrateToV2(db: Database.Database): void {
  log.info("Applying migration to v2");

  const cols = getColumnNames(db, "instances");
  if (!cols.includes("nfs_tfs")) {
    db.exec(`ALTER TABLE instances ADD COLUMN nfs_tfs INTEGER NOT NULL DEFAULT 0`);
    log.info("Added instances.nfs_tfs column");
  }

  log.info("Migration to v2 complete");
}

function getColumnNames(
  db: Database.Database,
  table: string
): string[] {
  const rows = db.pragma(`table_info(${table})`) as Array<{
    name: string;
  }>;
  return rows.map((r) => r.name);
}
