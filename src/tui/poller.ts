import { z } from "zod";
import { formatZodIssues } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import {
  INSTANCE_STATES,
  type ClusterEvent,
  type ClusterSummary,
  type InstanceStatus,
} from "../shared/types.js";

const log = createLogger("poller");

const readiness = z.union([z.literal(-1), z.literal(0), z.literal(1)]);

const instanceStatusSchema = z.object({
  id: z.string(),
  role: z.enum(["master", "worker"]),
  instance_state: z.enum(INSTANCE_STATES),
  worker_status: z.string(),
  time_in_state: z.string(),
  nfs_data: readiness,
  nfs_tools: readiness,
  nfs_indices: readiness,
  nfs_sge: readiness,
  nfs_tfs: readiness,
  get_cert: readiness,
  sge_started: readiness,
  ld: z.string(),
  instance_type: z.string(),
  public_ip: z.string().nullable(),
});

const feedSchema = z.object({ instances: z.array(instanceStatusSchema) });

const autoscalingSchema = z.object({
  enabled: z.boolean(),
  min: z.number(),
  max: z.number(),
  instanceType: z.string().nullable(),
});

const summarySchema = z.object({
  total: z.number(),
  workers: z.number(),
  ready: z.number(),
  pending: z.number(),
  error: z.number(),
  autoscaling: autoscalingSchema,
});

const eventsSchema = z.object({
  events: z.array(
    z.object({
      id: z.number(),
      instanceId: z.string().nullable(),
      type: z.enum([
        "instance_added",
        "instance_removed",
        "state_changed",
        "worker_message",
        "autoscaling_changed",
      ]),
      payload: z.record(z.unknown()),
      createdAt: z.string(),
    })
  ),
});

export interface FeedSnapshot {
  instances: InstanceStatus[];
  /** Counts and autoscaling settings as the server computes them */
  summary: ClusterSummary | null;
  events: ClusterEvent[];
  error: string | null;
  updatedAt: Date | null;
}

export const EMPTY_SNAPSHOT: FeedSnapshot = {
  instances: [],
  summary: null,
  events: [],
  error: null,
  updatedAt: null,
};

interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string) => Promise<FetchResponse>;

/** Schedules fn after ms; returns a cancel function */
export type Schedule = (fn: () => Promise<void>, ms: number) => () => void;

const defaultSchedule: Schedule = (fn, ms) => {
  const timer = setTimeout(() => {
    void fn();
  }, ms);
  return () => clearTimeout(timer);
};

export interface FeedPollerOptions {
  baseUrl: string;
  intervalMs: number;
  eventLimit?: number;
  fetch?: FetchLike;
  schedule?: Schedule;
  now?: () => Date;
  onUpdate: (snapshot: FeedSnapshot) => void;
}

async function getJson<T>(fetchFn: FetchLike, url: string, schema: z.ZodType<T>): Promise<T> {
  const res = await fetchFn(url);
  if (!res.ok) {
    throw new Error(`GET ${url} returned ${res.status}`);
  }
  const data = await res.json();
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`GET ${url} returned an unexpected body: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Polls the status feed on a fixed interval. The next poll is scheduled
 * only after the previous one settles; a failed poll empties the view.
 */
export class FeedPoller {
  private cancelNext: (() => void) | null = null;
  private stopped = true;
  private readonly fetchFn: FetchLike;
  private readonly schedule: Schedule;
  private readonly now: () => Date;

  constructor(private readonly opts: FeedPollerOptions) {
    this.fetchFn = opts.fetch ?? ((url) => fetch(url));
    this.schedule = opts.schedule ?? defaultSchedule;
    this.now = opts.now ?? (() => new Date());
  }

  start(): Promise<void> {
    this.stopped = false;
    return this.cycle();
  }

  stop(): void {
    this.stopped = true;
    this.cancelNext?.();
    this.cancelNext = null;
  }

  /** Fetch once and publish the result. Never rejects. */
  async refresh(): Promise<FeedSnapshot> {
    const base = this.opts.baseUrl;
    let snapshot: FeedSnapshot;
    try {
      const [feed, summary, events] = await Promise.all([
        getJson(this.fetchFn, `${base}/api/instances`, feedSchema),
        getJson(this.fetchFn, `${base}/api/summary`, summarySchema),
        getJson(this.fetchFn, `${base}/api/events?limit=${this.opts.eventLimit ?? 20}`, eventsSchema),
      ]);
      snapshot = {
        instances: feed.instances,
        summary,
        events: events.events,
        error: null,
        updatedAt: this.now(),
      };
    } catch (err) {
      log.debug("Status feed poll failed", { error: String(err) });
      snapshot = {
        ...EMPTY_SNAPSHOT,
        error: err instanceof Error ? err.message : String(err),
        updatedAt: this.now(),
      };
    }
    this.opts.onUpdate(snapshot);
    return snapshot;
  }

  private async cycle(): Promise<void> {
    this.cancelNext = null;
    await this.refresh();
    if (!this.stopped) {
      this.cancelNext = this.schedule(() => this.cycle(), this.opts.intervalMs);
    }
  }
}
