import React from "react";
import { Box, Text } from "ink";
import type { IndicatorLevel, TooltipLine } from "../web/tooltip.js";

const LEVEL_COLOR: Record<IndicatorLevel, string> = {
  red: "red",
  nodata: "gray",
  green: "green",
  yellow: "yellow",
};

interface DetailViewProps {
  title: string;
  lines: TooltipLine[];
}

export function DetailView({ title, lines }: DetailViewProps): React.ReactElement {
  return React.createElement(
    Box,
    { flexDirection: "column", padding: 1 },
    React.createElement(
      Text,
      { bold: true, underline: true },
      title
    ),
    React.createElement(Text, null, ""),
    ...lines.map((line, i) =>
      line.level
        ? React.createElement(
            Box,
            { key: i },
            React.createElement(Text, { color: LEVEL_COLOR[line.level] }, "■ "),
            React.createElement(Text, null, line.text)
          )
        : React.createElement(Text, { key: i, bold: line.bold }, line.text)
    )
  );
}
