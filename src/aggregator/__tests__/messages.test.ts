import { describe, it, expect } from "vitest";
import { parseReadiness, parseWorkerMessage } from "../messages.js";

describe("parseWorkerMessage", () => {
  it("parses ALIVE with a hostname", () => {
    expect(
      parseWorkerMessage("ALIVE | 10.0.0.5 | 54.1.2.3 | zone-a | m5.large | ami-123 | ip-10-0-0-5")
    ).toEqual({
      type: "ALIVE",
      privateIp: "10.0.0.5",
      publicIp: "54.1.2.3",
      zone: "zone-a",
      instanceType: "m5.large",
      ami: "ami-123",
      hostname: "ip-10-0-0-5",
    });
  });

  it("falls back to the public IP when ALIVE has no hostname", () => {
    const msg = parseWorkerMessage("ALIVE | 10.0.0.5 | 54.1.2.3 | zone-a | m5.large | ami-123");
    expect(msg.type === "ALIVE" && msg.hostname).toBe("54.1.2.3");
  });

  it("parses NODE_STATUS without the transient file system flag", () => {
    expect(
      parseWorkerMessage("NODE_STATUS | 1 | 1 | 0 | -1 | 1 | 0 | 0.5 0.4 0.3 | Ready")
    ).toEqual({
      type: "NODE_STATUS",
      nfsData: 1,
      nfsTools: 1,
      nfsIndices: 0,
      nfsSge: -1,
      getCert: 1,
      sgeStarted: 0,
      load: "0.5 0.4 0.3",
      workerStatus: "Ready",
      nfsTfs: 0,
    });
  });

  it("reads the transient file system flag when present", () => {
    const msg = parseWorkerMessage("NODE_STATUS | 1 | 1 | 1 | 1 | 1 | 1 | 0 | Ready | 1");
    expect(msg.type === "NODE_STATUS" && msg.nfsTfs).toBe(1);
  });

  it("treats a truncated NODE_STATUS as unknown", () => {
    expect(parseWorkerMessage("NODE_STATUS | 1 | 1")).toEqual({
      type: "unknown",
      raw: "NODE_STATUS | 1 | 1",
    });
  });

  it("parses the CPU count of NODE_READY", () => {
    expect(parseWorkerMessage("NODE_READY | 10.0.0.5 | 4")).toEqual({ type: "NODE_READY", numCpus: 4 });
    expect(parseWorkerMessage("NODE_READY | 10.0.0.5 | four")).toEqual({ type: "NODE_READY", numCpus: null });
    expect(parseWorkerMessage("NODE_READY")).toEqual({ type: "NODE_READY", numCpus: null });
  });

  it("parses the remaining message types", () => {
    expect(parseWorkerMessage("NODE_SHUTTING_DOWN | Shutdown")).toEqual({
      type: "NODE_SHUTTING_DOWN",
      workerStatus: "Shutdown",
    });
    expect(parseWorkerMessage("WORKER_H_CERT | ssh-rsa placeholder")).toEqual({
      type: "WORKER_H_CERT",
      cert: "ssh-rsa placeholder",
    });
    expect(parseWorkerMessage("MOUNT_DONE")).toEqual({ type: "MOUNT_DONE" });
    expect(parseWorkerMessage("GET_MOUNTPOINTS")).toEqual({ type: "GET_MOUNTPOINTS" });
  });

  it("reports anything else as unknown", () => {
    expect(parseWorkerMessage("HELLO")).toEqual({ type: "unknown", raw: "HELLO" });
  });
});

describe("parseReadiness", () => {
  it("maps 1 and -1 and defaults to 0", () => {
    expect(parseReadiness("1")).toBe(1);
    expect(parseReadiness(" -1 ")).toBe(-1);
    expect(parseReadiness("2")).toBe(0);
    expect(parseReadiness(undefined)).toBe(0);
  });
});
