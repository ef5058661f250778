import { describe, it, expect, beforeEach } from "vitest";
import { getInstance } from "../../db/queries.js";
import { HttpError } from "../../shared/errors.js";
import { getClusterSummary, getInstanceFeed } from "../feed.js";
import { syncInventory } from "../sync.js";
import { applyWorkerMessage } from "../worker.js";
import { T0, master, resetDb, secondsAfter, worker } from "./test-utils.js";

describe("applyWorkerMessage", () => {
  beforeEach(() => {
    resetDb();
    syncInventory([master("m1"), worker("w1")], T0);
  });

  it("records ALIVE details and marks the worker starting", () => {
    const t1 = secondsAfter(T0, 5);
    applyWorkerMessage("w1", "ALIVE | 10.0.0.5 | 54.1.2.3 | zone-a | m5.xlarge | ami-1 | host-1", t1);

    const row = getInstance("w1");
    expect(row?.worker_status).toBe("Starting");
    expect(row?.private_ip).toBe("10.0.0.5");
    expect(row?.public_ip).toBe("54.1.2.3");
    expect(row?.instance_type).toBe("m5.xlarge");
    expect(row?.local_hostname).toBe("host-1");
    expect(row?.is_alive).toBe(1);
    expect(row?.last_comm_at).toBe(t1.toISOString());
  });

  it("marks the node ready and records its CPU count", () => {
    applyWorkerMessage("w1", "NODE_READY | 10.0.0.5 | 4", T0);

    const row = getInstance("w1");
    expect(row?.node_ready).toBe(1);
    expect(row?.worker_status).toBe("Ready");
    expect(row?.num_cpus).toBe(4);
  });

  it("serves the reported load divided by the CPU count", () => {
    applyWorkerMessage("w1", "NODE_READY | 10.0.0.5 | 4", T0);
    applyWorkerMessage("w1", "NODE_STATUS | 1 | 1 | 1 | 1 | 1 | -1 | 0.8 0.4 2.0 | Ready", T0);

    const [, w1] = getInstanceFeed(T0).instances;
    expect(w1.ld).toBe("0.2 0.1 0.5");
    expect(w1.nfs_data).toBe(1);
    expect(w1.get_cert).toBe(1);
    expect(w1.sge_started).toBe(-1);
  });

  it("counts unknown messages as contact only", () => {
    const msg = applyWorkerMessage("w1", "HELLO", T0);

    expect(msg.type).toBe("unknown");
    const row = getInstance("w1");
    expect(row?.is_alive).toBe(1);
    expect(row?.worker_status).toBe("Pending");
  });

  it("rejects messages for instances outside the cluster", () => {
    const send = () => applyWorkerMessage("w9", "NODE_READY | x | 2", T0);
    expect(send).toThrowError(HttpError);
    expect(send).toThrowError("Instance 'w9' is not part of the cluster");
  });
});

describe("getInstanceFeed", () => {
  beforeEach(() => {
    resetDb();
  });

  it("returns an empty list for an empty cluster", () => {
    expect(getInstanceFeed(T0)).toEqual({ instances: [] });
  });

  it("reports how long each instance has been in its state", () => {
    syncInventory([worker("w1")], T0);

    expect(getInstanceFeed(secondsAfter(T0, 90))).toEqual({
      instances: [
        {
          id: "w1",
          role: "worker",
          instance_state: "running",
          worker_status: "Pending",
          time_in_state: "90",
          nfs_data: 0,
          nfs_tools: 0,
          nfs_indices: 0,
          nfs_sge: 0,
          nfs_tfs: 0,
          get_cert: 0,
          sge_started: 0,
          ld: "0",
          instance_type: "Unknown",
          public_ip: null,
        },
      ],
    });
  });
});

describe("getClusterSummary", () => {
  beforeEach(() => {
    resetDb();
  });

  it("counts workers by readiness", () => {
    syncInventory([master("m1"), worker("w1"), worker("w2"), worker("w3")], T0);
    applyWorkerMessage("w1", "NODE_READY | x | 2", T0);
    applyWorkerMessage("w2", "NODE_STATUS | 0 | 0 | 0 | 0 | 0 | 0 | 0 | Error", T0);

    expect(getClusterSummary()).toEqual({
      total: 4,
      workers: 3,
      ready: 1,
      pending: 1,
      error: 1,
      autoscaling: { enabled: false, min: 0, max: 0, instanceType: null },
    });
  });
});
