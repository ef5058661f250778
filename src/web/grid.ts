import { parseLoad } from "../shared/format.js";
import type { InstanceStatus } from "../shared/types.js";

export const GRID = {
  columns: 5,
  minRows: 4,
  tileWidth: 25,
  tileHeight: 25,
  spacing: 5,
  offsetX: 2,
  offsetY: 2,
  cornerRadius: 5,
  shadowOffset: 2,
  barHeight: 23,
  barTopPadding: 1,
  barInset: 3,
  selectedStroke: 1.5,
  minCanvasWidth: 200,
  minCanvasHeight: 200,
} as const;

/** Bar widths per load window; the longest window is drawn first, widest. */
const BAR_WIDTHS = { "15m": 10, "5m": 6, "1m": 3 } as const;

export const TILE_COLORS = {
  shadow: "rgb(230, 230, 230)",
  empty: "rgb(220, 220, 220)",
  transition: "#FFDC40",
  error: "#DF594B",
  ready: "#66BB67",
  pending: "#5CBBFF",
  shutdown: "#575757",
  unknown: "#FFDC40",
  loadBar: "#575757",
} as const;

export type TileColor = (typeof TILE_COLORS)[keyof typeof TILE_COLORS];

export type TileInput = Pick<
  InstanceStatus,
  "role" | "instance_state" | "worker_status" | "ld"
>;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LoadBar extends Rect {
  window: keyof typeof BAR_WIDTHS;
}

export interface Tile {
  index: number;
  id: string;
  rect: Rect;
  shadow: Rect;
  fill: TileColor;
  bars: LoadBar[];
  selected: boolean;
}

export interface EmptySlot {
  rect: Rect;
  shadow: Rect;
}

export interface GridScene {
  width: number;
  height: number;
  rows: number;
  columns: number;
  cornerRadius: number;
  selectedStroke: number;
  colors: {
    shadow: string;
    empty: string;
    loadBar: string;
  };
  tiles: Tile[];
  empty: EmptySlot[];
}

const TRANSITION_STATES = new Set<string>(["shutting-down", "shutting_down", "starting"]);
const READY_STATUSES = new Set(["Ready", "Running", "running"]);
const PENDING_STATUSES = new Set(["Pending", "pending"]);
const SHUTDOWN_STATUSES = new Set(["Shutdown", "shutting down"]);

/** Fill color of a tile; depends only on the instance's state fields. */
export function tileColor(inst: TileInput): TileColor {
  if (TRANSITION_STATES.has(inst.instance_state)) return TILE_COLORS.transition;
  if (inst.worker_status === "Error") return TILE_COLORS.error;
  if (READY_STATUSES.has(inst.worker_status) || inst.role === "master") {
    return TILE_COLORS.ready;
  }
  if (PENDING_STATUSES.has(inst.worker_status)) return TILE_COLORS.pending;
  if (SHUTDOWN_STATUSES.has(inst.worker_status)) return TILE_COLORS.shutdown;
  return TILE_COLORS.unknown;
}

export function slotRect(slot: number): Rect {
  const col = slot % GRID.columns;
  const row = Math.floor(slot / GRID.columns);
  return {
    x: GRID.offsetX + col * (GRID.tileWidth + GRID.spacing),
    y: GRID.offsetY + row * (GRID.tileHeight + GRID.spacing),
    width: GRID.tileWidth,
    height: GRID.tileHeight,
  };
}

function shadowOf(rect: Rect): Rect {
  return { ...rect, x: rect.x + GRID.shadowOffset, y: rect.y + GRID.shadowOffset };
}

function clampLoad(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/** Bars for the 15, 5 and 1 minute loads, capped at 1 and bottom-aligned. */
export function loadBars(rect: Rect, ld: string | number): LoadBar[] {
  const load = parseLoad(ld);
  if (!load) return [];
  const [ld1, ld5, ld15] = load.map(clampLoad);

  const bar = (window: LoadBar["window"], x: number, value: number): LoadBar => {
    const height = GRID.barHeight * value;
    return {
      window,
      x,
      y: rect.y + (GRID.barHeight - height) + GRID.barTopPadding,
      width: BAR_WIDTHS[window],
      height,
    };
  };

  const x15 = rect.x + GRID.barInset;
  const x5 = x15 + BAR_WIDTHS["15m"];
  const x1 = x5 + BAR_WIDTHS["5m"];
  return [bar("15m", x15, ld15), bar("5m", x5, ld5), bar("1m", x1, ld1)];
}

export function gridRows(count: number): number {
  return Math.max(GRID.minRows, Math.ceil(count / GRID.columns));
}

/**
 * Lay out one tile per instance in feed order, padded with empty slots to
 * whole rows. The grid grows by rows past 20 instances.
 */
export function buildScene(
  instances: ReadonlyArray<TileInput & { id: string }>,
  selected = -1
): GridScene {
  const rows = gridRows(instances.length);
  const slots = rows * GRID.columns;

  const tiles = instances.map((inst, index): Tile => {
    const rect = slotRect(index);
    return {
      index,
      id: inst.id,
      rect,
      shadow: shadowOf(rect),
      fill: tileColor(inst),
      bars: loadBars(rect, inst.ld),
      selected: index === selected,
    };
  });

  const empty: EmptySlot[] = [];
  for (let slot = instances.length; slot < slots; slot++) {
    const rect = slotRect(slot);
    empty.push({ rect, shadow: shadowOf(rect) });
  }

  const last = slotRect(slots - 1);
  return {
    width: Math.max(GRID.minCanvasWidth, last.x + last.width + GRID.shadowOffset),
    height: Math.max(GRID.minCanvasHeight, last.y + last.height + GRID.shadowOffset),
    rows,
    columns: GRID.columns,
    cornerRadius: GRID.cornerRadius,
    selectedStroke: GRID.selectedStroke,
    colors: {
      shadow: TILE_COLORS.shadow,
      empty: TILE_COLORS.empty,
      loadBar: TILE_COLORS.loadBar,
    },
    tiles,
    empty,
  };
}

/**
 * Index of the tile under a canvas point, or -1. The page script embeds
 * this function's source, so it must not reference anything outside it.
 */
export function hitTest(scene: Pick<GridScene, "tiles">, x: number, y: number): number {
  const tile = scene.tiles.find(
    (t) =>
      x >= t.rect.x &&
      x <= t.rect.x + t.rect.width &&
      y >= t.rect.y &&
      y <= t.rect.y + t.rect.height
  );
  return tile ? tile.index : -1;
}
