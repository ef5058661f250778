import { closeDb, getDb } from "../../db/index.js";
import type { CloudInstance, InstanceState } from "../../shared/types.js";

export const T0 = new Date("2024-01-01T00:00:00.000Z");

export function secondsAfter(base: Date, seconds: number): Date {
  return new Date(base.getTime() + seconds * 1000);
}

/** Fresh in-memory database per test */
export function resetDb(): void {
  closeDb();
  getDb();
}

export function worker(id: string, state: InstanceState = "running", extra: Partial<CloudInstance> = {}): CloudInstance {
  return { id, role: "worker", state, ...extra };
}

export function master(id: string, extra: Partial<CloudInstance> = {}): CloudInstance {
  return { id, role: "master", state: "running", type: "m5.large", ...extra };
}
