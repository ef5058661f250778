import React from "react";
import { Box, Text } from "ink";
import type { ClusterEvent, EventType } from "../shared/types.js";

interface LogViewProps {
  events: ClusterEvent[];
  maxLines: number;
}

const TYPE_COLOR: Record<EventType, string> = {
  instance_added: "green",
  instance_removed: "red",
  state_changed: "blue",
  worker_message: "gray",
  autoscaling_changed: "yellow",
};

function describe(event: ClusterEvent): string {
  const p = event.payload;
  switch (event.type) {
    case "state_changed":
      return `${String(p.from)} -> ${String(p.to)}`;
    case "worker_message":
      return String(p.type ?? "");
    case "autoscaling_changed":
      return p.enabled ? `on ${String(p.min)}-${String(p.max)}` : "off";
    default:
      return "";
  }
}

export function LogView({ events, maxLines }: LogViewProps): React.ReactElement {
  // Events arrive newest first; show oldest first
  const displayEvents = events.slice(0, maxLines).reverse();

  return React.createElement(
    Box,
    { flexDirection: "column", padding: 1 },
    React.createElement(
      Text,
      { bold: true, underline: true },
      "Events"
    ),
    ...displayEvents.map((event) =>
      React.createElement(
        Box,
        { key: event.id },
        React.createElement(
          Text,
          { color: "gray" },
          `${event.createdAt.slice(11, 19)} `
        ),
        React.createElement(
          Text,
          { color: TYPE_COLOR[event.type] },
          `[${event.type}] `
        ),
        React.createElement(
          Text,
          null,
          `${event.instanceId ?? ""} ${describe(event)}`.trim()
        )
      )
    )
  );
}
