import { readFile } from "node:fs/promises";
import { z } from "zod";
import { formatZodIssues } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { INSTANCE_STATES, type CloudInstance, type InstanceState } from "../shared/types.js";

const log = createLogger("inventory");

/** Where the aggregator learns which instances exist and their machine state */
export interface InstanceSource {
  listInstances(): Promise<CloudInstance[]>;
}

const STATE_ALIASES: Record<string, InstanceState> = {
  shutting_down: "shutting-down",
};

const stateSchema = z
  .string()
  .transform((raw) => raw.trim().toLowerCase())
  .transform((raw) => STATE_ALIASES[raw] ?? raw)
  .pipe(z.enum(INSTANCE_STATES));

const inventoryEntrySchema = z.object({
  id: z.string().min(1),
  state: stateSchema,
  role: z.enum(["master", "worker"]).default("worker"),
  type: z.string().min(1).optional(),
  publicIp: z.string().min(1).optional(),
  privateIp: z.string().min(1).optional(),
});

export const inventorySchema = z.object({
  instances: z.array(inventoryEntrySchema),
});

export type Inventory = z.infer<typeof inventorySchema>;

export function parseInventory(data: unknown): CloudInstance[] {
  const result = inventorySchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid inventory: ${formatZodIssues(result.error)}`);
  }
  const seen = new Set<string>();
  const instances: CloudInstance[] = [];
  for (const entry of result.data.instances) {
    if (seen.has(entry.id)) {
      log.warn("Duplicate instance in inventory; keeping the first entry", { id: entry.id });
      continue;
    }
    seen.add(entry.id);
    instances.push(entry);
  }
  return instances;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads the inventory JSON the cluster manager maintains. A missing file
 * means nothing has been provisioned yet.
 */
export class FileInventorySource implements InstanceSource {
  constructor(private readonly path: string) {}

  async listInstances(): Promise<CloudInstance[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        log.debug("Inventory file not found", { path: this.path });
        return [];
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new Error(`Inventory ${this.path} is not valid JSON: ${String(err)}`);
    }
    return parseInventory(data);
  }
}
