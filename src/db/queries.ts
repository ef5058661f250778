import { getDb } from "./index.js";
import type {
  AutoscalingRow,
  CloudInstance,
  EventRow,
  EventType,
  InstanceRow,
  InstanceState,
  Readiness,
} from "../shared/types.js";

// --- Instances ---

/** Columns a worker message may overwrite */
export interface WorkerFields {
  worker_status: string;
  instance_type: string;
  public_ip: string | null;
  private_ip: string | null;
  local_hostname: string | null;
  num_cpus: number;
  load: string;
  nfs_data: Readiness;
  nfs_tools: Readiness;
  nfs_indices: Readiness;
  nfs_sge: Readiness;
  nfs_tfs: Readiness;
  get_cert: Readiness;
  sge_started: Readiness;
  is_alive: number;
  node_ready: number;
}

const WORKER_FIELD_COLUMNS: ReadonlyArray<keyof WorkerFields> = [
  "worker_status",
  "instance_type",
  "public_ip",
  "private_ip",
  "local_hostname",
  "num_cpus",
  "load",
  "nfs_data",
  "nfs_tools",
  "nfs_indices",
  "nfs_sge",
  "nfs_tfs",
  "get_cert",
  "sge_started",
  "is_alive",
  "node_ready",
];

export function getInstance(id: string): InstanceRow | undefined {
  return getDb()
    .prepare(`SELECT * FROM instances WHERE id = ?`)
    .get(id) as InstanceRow | undefined;
}

/** Masters first, then workers in the order they joined. */
export function listInstances(): InstanceRow[] {
  return getDb()
    .prepare(
      `SELECT * FROM instances
       ORDER BY CASE role WHEN 'master' THEN 0 ELSE 1 END, seq ASC`
    )
    .all() as InstanceRow[];
}

export function insertInstance(cloud: CloudInstance, now: Date): void {
  const db = getDb();
  const next = db
    .prepare(`SELECT COALESCE(MAX(seq), 0) + 1 AS seq FROM instances`)
    .get() as { seq: number };
  db.prepare(
    `INSERT INTO instances
       (id, role, instance_state, worker_status, instance_type, public_ip, private_ip, state_changed_at, seq)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    cloud.id,
    cloud.role,
    cloud.state,
    cloud.role === "master" ? "Ready" : "Pending",
    cloud.type ?? "Unknown",
    cloud.publicIp ?? null,
    cloud.privateIp ?? null,
    now.toISOString(),
    next.seq
  );
}

export function updateMachineState(
  id: string,
  state: InstanceState,
  now: Date
): void {
  getDb()
    .prepare(
      `UPDATE instances
       SET instance_state = ?, state_changed_at = ?, updated_at = datetime('now')
       WHERE id = ?`
    )
    .run(state, now.toISOString(), id);
}

export function updateCloudFields(id: string, cloud: CloudInstance): void {
  getDb()
    .prepare(
      `UPDATE instances
       SET role = ?,
           instance_type = COALESCE(?, instance_type),
           public_ip = COALESCE(?, public_ip),
           private_ip = COALESCE(?, private_ip),
           updated_at = datetime('now')
       WHERE id = ?`
    )
    .run(
      cloud.role,
      cloud.type ?? null,
      cloud.publicIp ?? null,
      cloud.privateIp ?? null,
      id
    );
}

export function updateWorkerFields(
  id: string,
  patch: Partial<WorkerFields>
): void {
  const columns = WORKER_FIELD_COLUMNS.filter((col) => patch[col] !== undefined);
  if (columns.length === 0) return;
  const assignments = columns.map((col) => `${col} = ?`).join(", ");
  const values = columns.map((col) => patch[col] ?? null);
  getDb()
    .prepare(
      `UPDATE instances SET ${assignments}, updated_at = datetime('now') WHERE id = ?`
    )
    .run(...values, id);
}

export function recordWorkerContact(id: string, now: Date): void {
  getDb()
    .prepare(
      `UPDATE instances SET is_alive = 1, last_comm_at = ?, updated_at = datetime('now') WHERE id = ?`
    )
    .run(now.toISOString(), id);
}

export function deleteInstance(id: string): void {
  getDb().prepare(`DELETE FROM instances WHERE id = ?`).run(id);
}

// --- Autoscaling ---

export function getAutoscalingRow(): AutoscalingRow {
  const db = getDb();
  const row = db
    .prepare(`SELECT * FROM autoscaling WHERE id = 1`)
    .get() as AutoscalingRow | undefined;
  if (row) return row;
  db.prepare(`INSERT OR IGNORE INTO autoscaling (id) VALUES (1)`).run();
  return db
    .prepare(`SELECT * FROM autoscaling WHERE id = 1`)
    .get() as AutoscalingRow;
}

export function saveAutoscaling(opts: {
  enabled: boolean;
  min: number;
  max: number;
  instanceType: string | null;
}): void {
  getDb()
    .prepare(
      `UPDATE autoscaling
       SET enabled = ?, min_nodes = ?, max_nodes = ?, instance_type = ?, updated_at = datetime('now')
       WHERE id = 1`
    )
    .run(opts.enabled ? 1 : 0, opts.min, opts.max, opts.instanceType);
}

// --- Events ---

export function addEvent(
  instanceId: string | null,
  type: EventType,
  payload: Record<string, unknown> = {}
): number {
  const result = getDb()
    .prepare(
      `INSERT INTO events (instance_id, type, payload) VALUES (?, ?, ?)`
    )
    .run(instanceId, type, JSON.stringify(payload));
  return Number(result.lastInsertRowid);
}

export function getRecentEvents(limit = 50): EventRow[] {
  return getDb()
    .prepare(`SELECT * FROM events ORDER BY id DESC LIMIT ?`)
    .all(limit) as EventRow[];
}
