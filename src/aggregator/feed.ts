import { getRecentEvents, listInstances } from "../db/queries.js";
import { formatSeconds, normalizeLoad } from "../shared/format.js";
import type {
  ClusterEvent,
  ClusterSummary,
  InstanceFeed,
  InstanceRow,
  InstanceStatus,
} from "../shared/types.js";
import { getAutoscaling } from "./autoscaling.js";

export function toInstanceStatus(row: InstanceRow, now: Date): InstanceStatus {
  return {
    id: row.id,
    role: row.role,
    instance_state: row.instance_state,
    worker_status: row.worker_status,
    time_in_state: formatSeconds(new Date(row.state_changed_at), now),
    nfs_data: row.nfs_data,
    nfs_tools: row.nfs_tools,
    nfs_indices: row.nfs_indices,
    nfs_sge: row.nfs_sge,
    nfs_tfs: row.nfs_tfs,
    get_cert: row.get_cert,
    sge_started: row.sge_started,
    ld: normalizeLoad(row.load, row.num_cpus),
    instance_type: row.instance_type,
    public_ip: row.public_ip,
  };
}

/** Snapshot served to the consoles: masters first, then workers. */
export function getInstanceFeed(now: Date = new Date()): InstanceFeed {
  return {
    instances: listInstances().map((row) => toInstanceStatus(row, now)),
  };
}

export function getClusterSummary(): ClusterSummary {
  const rows = listInstances();
  const workers = rows.filter((r) => r.role === "worker");
  return {
    total: rows.length,
    workers: workers.length,
    ready: workers.filter((w) => w.node_ready === 1).length,
    pending: workers.filter((w) => w.worker_status === "Pending").length,
    error: workers.filter((w) => w.worker_status === "Error").length,
    autoscaling: getAutoscaling(),
  };
}

function parsePayload(payload: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(payload);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // fall through to the raw text
  }
  return { raw: payload };
}

export function listEvents(limit = 50): ClusterEvent[] {
  return getRecentEvents(limit).map((e) => ({
    id: e.id,
    instanceId: e.instance_id,
    type: e.type,
    payload: parsePayload(e.payload),
    createdAt: e.created_at,
  }));
}
