import { inTransaction } from "../db/index.js";
import {
  addEvent,
  getInstance,
  recordWorkerContact,
  updateWorkerFields,
  type WorkerFields,
} from "../db/queries.js";
import { notFound } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { parseWorkerMessage, type WorkerMessage } from "./messages.js";

const log = createLogger("worker");

function fieldsFor(msg: WorkerMessage): Partial<WorkerFields> {
  switch (msg.type) {
    case "ALIVE":
      return {
        worker_status: "Starting",
        private_ip: msg.privateIp,
        public_ip: msg.publicIp,
        instance_type: msg.instanceType,
        local_hostname: msg.hostname,
      };
    case "NODE_READY":
      return {
        node_ready: 1,
        worker_status: "Ready",
        ...(msg.numCpus !== null ? { num_cpus: msg.numCpus } : {}),
      };
    case "NODE_STATUS":
      return {
        nfs_data: msg.nfsData,
        nfs_tools: msg.nfsTools,
        nfs_indices: msg.nfsIndices,
        nfs_sge: msg.nfsSge,
        get_cert: msg.getCert,
        sge_started: msg.sgeStarted,
        load: msg.load,
        worker_status: msg.workerStatus,
        nfs_tfs: msg.nfsTfs,
      };
    case "NODE_SHUTTING_DOWN":
      return { worker_status: msg.workerStatus };
    case "WORKER_H_CERT":
    case "GET_MOUNTPOINTS":
    case "MOUNT_DONE":
    case "unknown":
      return {};
  }
}

/**
 * Apply a status message a worker sent about itself. Every message counts
 * as contact, even ones that change nothing else.
 */
export function applyWorkerMessage(
  instanceId: string,
  raw: string,
  now: Date = new Date()
): WorkerMessage {
  const msg = parseWorkerMessage(raw);

  inTransaction(() => {
    if (!getInstance(instanceId)) {
      throw notFound(`Instance '${instanceId}' is not part of the cluster`);
    }
    recordWorkerContact(instanceId, now);
    updateWorkerFields(instanceId, fieldsFor(msg));
    addEvent(instanceId, "worker_message", { type: msg.type });
  });

  if (msg.type === "unknown") {
    log.debug("Unknown worker message", { instanceId, raw });
  } else {
    log.debug("Worker message applied", { instanceId, type: msg.type });
  }
  return msg;
}
