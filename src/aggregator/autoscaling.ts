import { z } from "zod";
import { inTransaction } from "../db/index.js";
import { addEvent, getAutoscalingRow, saveAutoscaling } from "../db/queries.js";
import { badRequest, conflict } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { AutoscalingSettings } from "../shared/types.js";

const log = createLogger("autoscaling");

/** A non-negative integer, or its decimal digits as sent by form posts */
const limit = z.preprocess(
  (raw) => (typeof raw === "string" && /^\d+$/.test(raw) ? Number(raw) : raw),
  z.number().int().min(0)
);

export const toggleRequestSchema = z.object({
  min: limit.optional(),
  max: limit.optional(),
  instanceType: z.string().min(1).optional(),
});

export const adjustRequestSchema = z.object({
  min: limit,
  max: limit,
});

export type ToggleRequest = z.infer<typeof toggleRequestSchema>;
export type AdjustRequest = z.infer<typeof adjustRequestSchema>;

export function getAutoscaling(): AutoscalingSettings {
  const row = getAutoscalingRow();
  return {
    enabled: row.enabled === 1,
    min: row.min_nodes,
    max: row.max_nodes,
    instanceType: row.instance_type,
  };
}

function checkLimits(min: number, max: number): void {
  if (min > max) {
    throw badRequest(`Min nodes (${min}) cannot exceed max nodes (${max})`);
  }
}

/**
 * Turn autoscaling off when it is on (limits are kept), or on with the
 * given limits when it is off.
 */
export function toggleAutoscaling(req: ToggleRequest): AutoscalingSettings {
  return inTransaction(() => {
    const current = getAutoscaling();
    let next: AutoscalingSettings;

    if (current.enabled) {
      next = { ...current, enabled: false };
    } else {
      if (req.min === undefined || req.max === undefined) {
        throw badRequest("Min and max nodes are required to turn autoscaling on");
      }
      checkLimits(req.min, req.max);
      next = {
        enabled: true,
        min: req.min,
        max: req.max,
        instanceType: req.instanceType ?? current.instanceType,
      };
    }

    saveAutoscaling(next);
    addEvent(null, "autoscaling_changed", { ...next });
    log.info(next.enabled ? "Autoscaling turned on" : "Autoscaling turned off", {
      min: next.min,
      max: next.max,
    });
    return next;
  });
}

export function adjustAutoscaling(req: AdjustRequest): AutoscalingSettings {
  return inTransaction(() => {
    const current = getAutoscaling();
    if (!current.enabled) {
      throw conflict("Cannot adjust autoscaling because autoscaling is not on");
    }
    checkLimits(req.min, req.max);
    const next = { ...current, min: req.min, max: req.max };
    saveAutoscaling(next);
    addEvent(null, "autoscaling_changed", { ...next });
    log.info("Adjusted autoscaling limits", { min: next.min, max: next.max });
    return next;
  });
}
