import type { Readiness } from "../shared/types.js";

/** Field separator used by workers when reporting to the master */
export const MESSAGE_SEPARATOR = " | ";

export type WorkerMessage =
  | {
      type: "ALIVE";
      privateIp: string;
      publicIp: string;
      zone: string;
      instanceType: string;
      ami: string;
      hostname: string;
    }
  | { type: "GET_MOUNTPOINTS" }
  | { type: "MOUNT_DONE" }
  | { type: "WORKER_H_CERT"; cert: string }
  | { type: "NODE_READY"; numCpus: number | null }
  | {
      type: "NODE_STATUS";
      nfsData: Readiness;
      nfsTools: Readiness;
      nfsIndices: Readiness;
      nfsSge: Readiness;
      getCert: Readiness;
      sgeStarted: Readiness;
      load: string;
      workerStatus: string;
      nfsTfs: Readiness;
    }
  | { type: "NODE_SHUTTING_DOWN"; workerStatus: string }
  | { type: "unknown"; raw: string };

export type WorkerMessageType = WorkerMessage["type"];

export function parseReadiness(raw: string | undefined): Readiness {
  switch (raw?.trim()) {
    case "1":
      return 1;
    case "-1":
      return -1;
    default:
      return 0;
  }
}

function parseCpuCount(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : null;
}

/**
 * Parse a "TYPE | field | field" status message. Short messages are
 * treated as unknown rather than partially applied.
 */
export function parseWorkerMessage(raw: string): WorkerMessage {
  const parts = raw.split(MESSAGE_SEPARATOR);
  const fields = parts.map((p) => p.trim());
  const type = fields[0];

  switch (type) {
    case "ALIVE": {
      if (fields.length < 6) break;
      const [, privateIp, publicIp, zone, instanceType, ami, hostname] = fields;
      return {
        type: "ALIVE",
        privateIp,
        publicIp,
        zone,
        instanceType,
        ami,
        // Older workers omit the hostname
        hostname: hostname || publicIp,
      };
    }
    case "GET_MOUNTPOINTS":
      return { type: "GET_MOUNTPOINTS" };
    case "MOUNT_DONE":
      return { type: "MOUNT_DONE" };
    case "WORKER_H_CERT":
      if (fields.length < 2) break;
      return { type: "WORKER_H_CERT", cert: parts.slice(1).join(MESSAGE_SEPARATOR) };
    case "NODE_READY":
      return { type: "NODE_READY", numCpus: parseCpuCount(fields[2]) };
    case "NODE_STATUS": {
      if (fields.length < 9) break;
      return {
        type: "NODE_STATUS",
        nfsData: parseReadiness(fields[1]),
        nfsTools: parseReadiness(fields[2]),
        nfsIndices: parseReadiness(fields[3]),
        nfsSge: parseReadiness(fields[4]),
        getCert: parseReadiness(fields[5]),
        sgeStarted: parseReadiness(fields[6]),
        load: fields[7],
        workerStatus: fields[8],
        nfsTfs: parseReadiness(fields[9]),
      };
    }
    case "NODE_SHUTTING_DOWN":
      if (fields.length < 2) break;
      return { type: "NODE_SHUTTING_DOWN", workerStatus: fields[1] };
  }

  return { type: "unknown", raw };
}
