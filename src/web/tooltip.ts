import { formatDelta } from "../shared/format.js";
import type { AutoscalingSettings, InstanceStatus, Readiness } from "../shared/types.js";

export type IndicatorLevel = "red" | "nodata" | "green" | "yellow";

/** Indexed by readiness + 1, where 2 means "mixed" */
const LEVELS: readonly IndicatorLevel[] = ["red", "nodata", "green", "yellow"];

export interface Indicator {
  label: "Filesystems" | "Permissions" | "Scheduler";
  level: IndicatorLevel;
}

export type TooltipContent =
  | { kind: "master"; id: string; alive: string; type: string }
  | { kind: "worker"; id: string; state: string; alive: string; indicators: Indicator[] }
  | { kind: "autoscaling"; enabled: boolean; min: number; max: number };

type MountFlags = Pick<InstanceStatus, "nfs_data" | "nfs_tools" | "nfs_indices" | "nfs_sge">;

/** Combined state of the shared mounts: the common value, or 2 when they differ. */
export function mountState(inst: MountFlags): Readiness | 2 {
  const flags = [inst.nfs_data, inst.nfs_tools, inst.nfs_indices, inst.nfs_sge];
  const first = flags[0];
  return flags.every((f) => f === first) ? first : 2;
}

export function indicatorLevel(value: Readiness | 2): IndicatorLevel {
  return LEVELS[value + 1] ?? "nodata";
}

function formatAlive(timeInState: string): string {
  const seconds = Number(timeInState);
  return Number.isFinite(seconds) ? formatDelta(seconds) : timeInState;
}

/**
 * What the info panel shows: the selected instance, or the autoscaling
 * controls when nothing (or something no longer present) is selected.
 */
export function buildTooltip(
  instances: readonly InstanceStatus[],
  selected: number,
  autoscaling: AutoscalingSettings
): TooltipContent {
  const inst = selected >= 0 ? instances[selected] : undefined;
  if (!inst) {
    return {
      kind: "autoscaling",
      enabled: autoscaling.enabled,
      min: autoscaling.min,
      max: autoscaling.max,
    };
  }

  const alive = formatAlive(inst.time_in_state);
  if (inst.role === "master") {
    return { kind: "master", id: inst.id, alive, type: inst.instance_type };
  }
  return {
    kind: "worker",
    id: inst.id,
    state: inst.worker_status,
    alive,
    indicators: [
      { label: "Filesystems", level: indicatorLevel(mountState(inst)) },
      { label: "Permissions", level: indicatorLevel(inst.get_cert) },
      { label: "Scheduler", level: indicatorLevel(inst.sge_started) },
    ],
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderTooltipHtml(content: TooltipContent): string {
  switch (content.kind) {
    case "master":
      return [
        "<ul>",
        "<li><b>Master Node</b></li>",
        "<li>&nbsp;</li>",
        `<li><b>${escapeHtml(content.id)}</b></li>`,
        `<li>Alive: ${escapeHtml(content.alive)}</li>`,
        `<li>Type: ${escapeHtml(content.type)}</li>`,
        "</ul>",
      ].join("");
    case "worker":
      return [
        "<ul>",
        `<li><b>${escapeHtml(content.id)}</b></li>`,
        `<li>State: ${escapeHtml(content.state)}</li>`,
        `<li>Alive: ${escapeHtml(content.alive)}</li>`,
        `<li class="spacer"></li>`,
        ...content.indicators.map(
          (ind) => `<li><div class="status_${ind.level}">&nbsp;</div>${ind.label}</li>`
        ),
        "</ul>",
      ].join("");
    case "autoscaling":
      if (!content.enabled) {
        return `<p>Autoscaling is <span class="as-off">off</span>. Turn <a id="toggle_autoscaling_link">on</a>?</p>`;
      }
      return [
        `<p>Autoscaling is <span class="as-on">on</span>. Turn <a id="toggle_autoscaling_link">off</a>?</p>`,
        `<p>Min nodes: ${content.min}<br/>Max nodes: ${content.max}<br/>`,
        `<a id="adjust_autoscaling_link">Adjust limits?</a></p>`,
      ].join("");
  }
}

export interface TooltipLine {
  text: string;
  level?: IndicatorLevel;
  bold?: boolean;
}

/** Same content as plain lines, for the terminal console. */
export function renderTooltipLines(content: TooltipContent): TooltipLine[] {
  switch (content.kind) {
    case "master":
      return [
        { text: "Master Node", bold: true },
        { text: "" },
        { text: content.id, bold: true },
        { text: `Alive: ${content.alive}` },
        { text: `Type: ${content.type}` },
      ];
    case "worker":
      return [
        { text: content.id, bold: true },
        { text: `State: ${content.state}` },
        { text: `Alive: ${content.alive}` },
        { text: "" },
        ...content.indicators.map((ind) => ({ text: ind.label, level: ind.level })),
      ];
    case "autoscaling":
      return content.enabled
        ? [
            { text: "Autoscaling is on", bold: true },
            { text: `Min nodes: ${content.min}` },
            { text: `Max nodes: ${content.max}` },
          ]
        : [{ text: "Autoscaling is off", bold: true }];
  }
}
