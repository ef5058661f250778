import React from "react";
import { Box, Text } from "ink";
import { GRID, gridRows, tileColor } from "../web/grid.js";
import type { InstanceStatus } from "../shared/types.js";

const TILE = "██";
const EMPTY_TILE = "░░";

interface GridViewProps {
  instances: InstanceStatus[];
  selected: number;
}

/** Terminal rendition of the tile grid: one colored block per instance. */
export function GridView({ instances, selected }: GridViewProps): React.ReactElement {
  const rows = gridRows(instances.length);

  return React.createElement(
    Box,
    { flexDirection: "column", paddingX: 1 },
    ...Array.from({ length: rows }, (_, row) =>
      React.createElement(
        Box,
        { key: row },
        ...Array.from({ length: GRID.columns }, (_, col) => {
          const index = row * GRID.columns + col;
          const inst = instances[index];
          if (!inst) {
            return React.createElement(Text, { key: col, color: "gray" }, ` ${EMPTY_TILE} `);
          }
          const isSelected = index === selected;
          return React.createElement(
            Text,
            { key: col, color: tileColor(inst) },
            isSelected ? `[${TILE}]` : ` ${TILE} `
          );
        })
      )
    )
  );
}
