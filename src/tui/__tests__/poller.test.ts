import { describe, it, expect, vi } from "vitest";
import { FeedPoller, type FeedSnapshot, type FetchLike, type Schedule } from "../poller.js";

const BASE = "http://cluster.test";
const NOW = new Date("2024-01-01T00:00:00.000Z");

const INSTANCE = {
  id: "w1",
  role: "worker",
  instance_state: "running",
  worker_status: "Ready",
  time_in_state: "12",
  nfs_data: 1,
  nfs_tools: 1,
  nfs_indices: 1,
  nfs_sge: 1,
  nfs_tfs: 0,
  get_cert: 1,
  sge_started: 1,
  ld: "0.1 0.2 0.3",
  instance_type: "m5.large",
  public_ip: null,
};

const SUMMARY = {
  total: 1,
  workers: 1,
  ready: 1,
  pending: 0,
  error: 0,
  autoscaling: { enabled: false, min: 0, max: 0, instanceType: null },
};

function fakeFetch(routes: Record<string, { status?: number; body: unknown }>): FetchLike {
  return async (url) => {
    const route = routes[url];
    if (!route) throw new Error(`connect ECONNREFUSED ${url}`);
    const status = route.status ?? 200;
    return { ok: status < 400, status, json: async () => route.body };
  };
}

const HEALTHY = {
  [`${BASE}/api/instances`]: { body: { instances: [INSTANCE] } },
  [`${BASE}/api/summary`]: { body: SUMMARY },
  [`${BASE}/api/events?limit=20`]: { body: { events: [] } },
};

function manualSchedule() {
  const pending: Array<{ fn: () => Promise<void>; ms: number; cancelled: boolean }> = [];
  const schedule: Schedule = (fn, ms) => {
    const entry = { fn, ms, cancelled: false };
    pending.push(entry);
    return () => {
      entry.cancelled = true;
    };
  };
  /** Run the polls that are due and not cancelled */
  const runDue = async () => {
    for (const entry of pending.splice(0)) {
      if (!entry.cancelled) await entry.fn();
    }
  };
  return { pending, schedule, runDue };
}

describe("FeedPoller", () => {
  it("publishes the feed and schedules the next poll", async () => {
    const updates: FeedSnapshot[] = [];
    const { pending, schedule } = manualSchedule();
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 10_000,
      fetch: fakeFetch(HEALTHY),
      schedule,
      now: () => NOW,
      onUpdate: (s) => updates.push(s),
    });

    await poller.start();

    expect(updates).toEqual([
      { instances: [INSTANCE], summary: SUMMARY, events: [], error: null, updatedAt: NOW },
    ]);
    expect(pending).toHaveLength(1);
    expect(pending[0].ms).toBe(10_000);

    await pending[0].fn();
    expect(updates).toHaveLength(2);
    expect(pending).toHaveLength(2);

    poller.stop();
    expect(pending[1].cancelled).toBe(true);
  });

  it("runs no further polls once stopped", async () => {
    const onUpdate = vi.fn();
    const { pending, schedule, runDue } = manualSchedule();
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 10_000,
      fetch: fakeFetch(HEALTHY),
      schedule,
      now: () => NOW,
      onUpdate,
    });

    await poller.start();
    poller.stop();
    expect(pending[0].cancelled).toBe(true);

    await runDue();
    expect(onUpdate).toHaveBeenCalledTimes(1);
  });

  it("does not schedule after a poll that was in flight when stopped", async () => {
    const onUpdate = vi.fn();
    const { pending, schedule } = manualSchedule();
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 10_000,
      fetch: fakeFetch(HEALTHY),
      schedule,
      now: () => NOW,
      onUpdate,
    });

    const first = poller.start();
    poller.stop();
    await first;

    expect(onUpdate).toHaveBeenCalledTimes(1);
    expect(pending).toHaveLength(0);
  });

  it("empties the view when the server answers with an error", async () => {
    const onUpdate = vi.fn();
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 10_000,
      fetch: fakeFetch({ ...HEALTHY, [`${BASE}/api/instances`]: { status: 500, body: {} } }),
      schedule: manualSchedule().schedule,
      now: () => NOW,
      onUpdate,
    });

    const snapshot = await poller.refresh();

    expect(snapshot).toEqual({
      instances: [],
      summary: null,
      events: [],
      error: `GET ${BASE}/api/instances returned 500`,
      updatedAt: NOW,
    });
    expect(onUpdate).toHaveBeenCalledWith(snapshot);
  });

  it("rejects feeds with an unexpected shape", async () => {
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 10_000,
      fetch: fakeFetch({ ...HEALTHY, [`${BASE}/api/summary`]: { body: { ...SUMMARY, ready: "1" } } }),
      now: () => NOW,
      onUpdate: () => {},
    });

    const snapshot = await poller.refresh();

    expect(snapshot.instances).toEqual([]);
    expect(snapshot.error).toBe(
      `GET ${BASE}/api/summary returned an unexpected body: ready: Expected number, received string`
    );
  });

  it("keeps polling after the server goes away", async () => {
    const { pending, schedule } = manualSchedule();
    const onUpdate = vi.fn();
    const poller = new FeedPoller({
      baseUrl: BASE,
      intervalMs: 5_000,
      fetch: fakeFetch({}),
      schedule,
      now: () => NOW,
      onUpdate,
    });

    await poller.start();

    expect(onUpdate).toHaveBeenCalledTimes(1);
    expect(onUpdate.mock.calls[0][0].error).toMatch(/^connect ECONNREFUSED /);
    expect(pending).toHaveLength(1);
    poller.stop();
  });
});
