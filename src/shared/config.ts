import "dotenv/config";
import { resolve } from "node:path";
import { homedir } from "node:os";

function env(key: string, fallback?: string): string {
  const val = process.env[key] || fallback;
  if (val === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return val;
}

function envInt(key: string, fallback: string, min = 1): number {
  const raw = env(key, fallback);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(
      `Invalid value for ${key}: "${raw}" (expected integer >= ${min})`
    );
  }
  return parsed;
}

const cvHome = resolve(homedir(), ".clusterview");

const webPort = envInt("CV_WEB_PORT", "8042", 1);

export const config = {
  /** SQLite database path (":memory:" for an in-process database) */
  dbPath: env("CV_DB_PATH", resolve(cvHome, "clusterview.db")),

  /** Inventory file the cluster manager writes with the machine state of every instance */
  inventoryPath: env("CV_INVENTORY_PATH", resolve(cvHome, "inventory.json")),

  /** Aggregator poll interval in ms */
  pollIntervalMs: envInt("CV_POLL_INTERVAL_MS", "10000", 500),

  /** Web console port */
  webPort,

  /** Base URL the terminal console polls */
  feedUrl: env("CV_FEED_URL", `http://localhost:${webPort}`).replace(/\/+$/, ""),

  /** Terminal console refresh interval in ms */
  refreshMs: envInt("CV_REFRESH_MS", "10000", 1000),
} as const;
