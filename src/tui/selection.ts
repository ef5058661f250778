import { GRID } from "../web/grid.js";

export type Direction = "left" | "right" | "up" | "down";

/** Move a grid selection; -1 (nothing selected) starts at the first tile. */
export function moveSelection(
  selected: number,
  count: number,
  direction: Direction
): number {
  if (count === 0) return -1;
  if (selected < 0 || selected >= count) return 0;
  const step = {
    left: -1,
    right: 1,
    up: -GRID.columns,
    down: GRID.columns,
  }[direction];
  const next = selected + step;
  return next >= 0 && next < count ? next : selected;
}
