import { inTransaction } from "../db/index.js";
import {
  addEvent,
  deleteInstance,
  insertInstance,
  listInstances,
  updateCloudFields,
  updateMachineState,
} from "../db/queries.js";
import { createLogger } from "../shared/logger.js";
import type { CloudInstance } from "../shared/types.js";
import type { InstanceSource } from "./inventory.js";

const log = createLogger("sync");

export interface SyncResult {
  added: number;
  updated: number;
  removed: number;
}

/**
 * Reconcile the stored instance records with the inventory. Instances the
 * inventory no longer lists are dropped.
 */
export function syncInventory(cloud: CloudInstance[], now: Date = new Date()): SyncResult {
  return inTransaction(() => {
    const result: SyncResult = { added: 0, updated: 0, removed: 0 };
    const known = new Map(listInstances().map((row) => [row.id, row]));

    for (const inst of cloud) {
      const existing = known.get(inst.id);
      if (!existing) {
        insertInstance(inst, now);
        addEvent(inst.id, "instance_added", { state: inst.state, role: inst.role });
        result.added++;
        continue;
      }
      known.delete(inst.id);
      updateCloudFields(inst.id, inst);
      if (existing.instance_state !== inst.state) {
        updateMachineState(inst.id, inst.state, now);
        addEvent(inst.id, "state_changed", {
          from: existing.instance_state,
          to: inst.state,
        });
        result.updated++;
      }
    }

    for (const gone of known.values()) {
      deleteInstance(gone.id);
      addEvent(gone.id, "instance_removed", { lastState: gone.instance_state });
      result.removed++;
    }

    return result;
  });
}

export interface AggregatorOptions {
  source: InstanceSource;
  intervalMs: number;
  now?: () => Date;
}

/**
 * Polls the instance source on a fixed interval. A failed tick is logged
 * and the loop keeps going.
 */
export class Aggregator {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly now: () => Date;

  constructor(private readonly opts: AggregatorOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    log.info("Aggregator started", { intervalMs: this.opts.intervalMs });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.opts.intervalMs);
    void this.tick();
  }

  /** Run one poll; overlapping calls share the in-flight one. */
  tick(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.poll().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("Aggregator stopped");
    }
    if (this.inFlight) await this.inFlight;
  }

  private async poll(): Promise<void> {
    try {
      const cloud = await this.opts.source.listInstances();
      const result = syncInventory(cloud, this.now());
      if (result.added || result.updated || result.removed) {
        log.info("Inventory synced", { ...result, total: cloud.length });
      } else {
        log.debug("Inventory unchanged", { total: cloud.length });
      }
    } catch (err) {
      log.error("Inventory sync failed", { error: String(err) });
    }
  }
}
