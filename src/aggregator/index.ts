import { getDb, closeDb } from "../db/index.js";
import { config } from "../shared/config.js";
import { createLogger } from "../shared/logger.js";
import { FileInventorySource } from "./inventory.js";
import { Aggregator } from "./sync.js";

const log = createLogger("aggregator");

async function main(): Promise<void> {
  getDb();
  log.info("Status aggregator started", {
    pid: process.pid,
    inventory: config.inventoryPath,
  });

  const aggregator = new Aggregator({
    source: new FileInventorySource(config.inventoryPath),
    intervalMs: config.pollIntervalMs,
  });
  aggregator.start();

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    log.info("Shutting down status aggregator");
    await aggregator.stop();
    closeDb();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  log.error("Status aggregator failed to start", { error: String(err) });
  closeDb();
  process.exit(1);
});
