// --- Domain enums ---

/** Machine states the cloud inventory reports */
export const INSTANCE_STATES = [
  "pending",
  "starting",
  "running",
  "shutting-down",
  "stopping",
  "stopped",
  "terminated",
  "error",
] as const;

export type InstanceState = (typeof INSTANCE_STATES)[number];

export type InstanceRole = "master" | "worker";

/**
 * Bootstrap/readiness label a worker reports about itself. Workers may
 * send labels outside this list; those are stored verbatim.
 */
export type KnownWorkerStatus =
  | "Pending"
  | "Starting"
  | "Ready"
  | "Error"
  | "Shutdown"
  | "Stopping";

/** -1 failed, 0 not yet, 1 done */
export type Readiness = -1 | 0 | 1;

export type EventType =
  | "instance_added"
  | "instance_removed"
  | "state_changed"
  | "worker_message"
  | "autoscaling_changed";

// --- Database row types ---

export interface InstanceRow {
  id: string;
  role: InstanceRole;
  instance_state: InstanceState;
  worker_status: string;
  instance_type: string;
  public_ip: string | null;
  private_ip: string | null;
  local_hostname: string | null;
  num_cpus: number;
  load: string; // "0" until reported, then "1m 5m 15m"
  nfs_data: Readiness;
  nfs_tools: Readiness;
  nfs_indices: Readiness;
  nfs_sge: Readiness;
  nfs_tfs: Readiness;
  get_cert: Readiness;
  sge_started: Readiness;
  is_alive: number;
  node_ready: number;
  last_comm_at: string | null;
  state_changed_at: string;
  created_at: string;
  updated_at: string;
}

export interface AutoscalingRow {
  id: number;
  enabled: number;
  min_nodes: number;
  max_nodes: number;
  instance_type: string | null;
  updated_at: string;
}

export interface EventRow {
  id: number;
  instance_id: string | null;
  type: EventType;
  payload: string; // JSON
  created_at: string;
}

// --- Wire types ---

/** One entry of the instance feed served to the consoles */
export interface InstanceStatus {
  id: string;
  role: InstanceRole;
  instance_state: InstanceState;
  worker_status: string;
  time_in_state: string;
  nfs_data: Readiness;
  nfs_tools: Readiness;
  nfs_indices: Readiness;
  nfs_sge: Readiness;
  nfs_tfs: Readiness;
  get_cert: Readiness;
  sge_started: Readiness;
  ld: string;
  instance_type: string;
  public_ip: string | null;
}

export interface InstanceFeed {
  instances: InstanceStatus[];
}

export interface AutoscalingSettings {
  enabled: boolean;
  min: number;
  max: number;
  instanceType: string | null;
}

export interface ClusterSummary {
  total: number;
  workers: number;
  ready: number;
  pending: number;
  error: number;
  autoscaling: AutoscalingSettings;
}

export interface ClusterEvent {
  id: number;
  instanceId: string | null;
  type: EventType;
  payload: Record<string, unknown>;
  createdAt: string;
}

/** Machine-state record read from the inventory */
export interface CloudInstance {
  id: string;
  role: InstanceRole;
  state: InstanceState;
  type?: string;
  publicIp?: string;
  privateIp?: string;
}
