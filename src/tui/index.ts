import React, { useState, useEffect, useRef } from "react";
import { render, Box, Text, useApp, useInput } from "ink";
import { config } from "../shared/config.js";
import { buildTooltip, renderTooltipLines } from "../web/tooltip.js";
import { DetailView } from "./detail-view.js";
import { GridView } from "./grid-view.js";
import { moveSelection } from "./selection.js";
import { LogView } from "./log-view.js";
import { EMPTY_SNAPSHOT, FeedPoller, type FeedSnapshot } from "./poller.js";
import type { AutoscalingSettings } from "../shared/types.js";

const AUTOSCALING_UNKNOWN: AutoscalingSettings = {
  enabled: false,
  min: 0,
  max: 0,
  instanceType: null,
};

interface AppProps {
  feedUrl: string;
  refreshMs: number;
}

function App({ feedUrl, refreshMs }: AppProps): React.ReactElement {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<FeedSnapshot>(EMPTY_SNAPSHOT);
  const [selected, setSelected] = useState(-1);
  const pollerRef = useRef<FeedPoller | null>(null);

  useEffect(() => {
    const poller = new FeedPoller({
      baseUrl: feedUrl,
      intervalMs: refreshMs,
      onUpdate: setSnapshot,
    });
    pollerRef.current = poller;
    void poller.start();
    return () => poller.stop();
  }, [feedUrl, refreshMs]);

  const { instances } = snapshot;

  useInput((input, key) => {
    if (input === "q") {
      exit();
      return;
    }
    if (input === "r") {
      void pollerRef.current?.refresh();
      return;
    }
    if (key.escape) {
      setSelected(-1);
      return;
    }
    const direction =
      input === "h" || key.leftArrow
        ? "left"
        : input === "l" || key.rightArrow
          ? "right"
          : input === "k" || key.upArrow
            ? "up"
            : input === "j" || key.downArrow
              ? "down"
              : null;
    if (direction) {
      setSelected((prev) => moveSelection(prev, instances.length, direction));
    }
  });

  const tooltip = buildTooltip(
    instances,
    selected,
    snapshot.summary?.autoscaling ?? AUTOSCALING_UNKNOWN
  );
  const selectedInstance = selected >= 0 ? instances[selected] : undefined;
  const detailTitle = selectedInstance ? "Instance" : "Autoscaling";

  const ready = snapshot.summary?.ready ?? 0;
  const workers = snapshot.summary?.workers ?? 0;

  const statusText = snapshot.error
    ? `feed unavailable: ${snapshot.error}`
    : snapshot.updatedAt
      ? `updated ${snapshot.updatedAt.toLocaleTimeString()}`
      : "connecting...";

  return React.createElement(
    Box,
    { flexDirection: "column", width: "100%" },
    // Header
    React.createElement(
      Box,
      { borderStyle: "single", paddingX: 1 },
      React.createElement(Text, { bold: true }, "CLUSTER STATUS"),
      React.createElement(
        Text,
        { color: "gray" },
        `  ${instances.length} instance(s)  ${ready}/${workers} worker(s) ready`
      )
    ),
    // Main content
    React.createElement(
      Box,
      { flexDirection: "row", flexGrow: 1 },
      React.createElement(
        Box,
        { flexDirection: "column", width: "50%", borderStyle: "single" },
        React.createElement(
          Box,
          { paddingX: 1 },
          React.createElement(Text, { bold: true, underline: true }, "Instances")
        ),
        React.createElement(GridView, { instances, selected }),
        React.createElement(DetailView, {
          title: detailTitle,
          lines: renderTooltipLines(tooltip),
        })
      ),
      React.createElement(
        Box,
        { flexDirection: "column", width: "50%", borderStyle: "single" },
        React.createElement(LogView, { events: snapshot.events, maxLines: 20 })
      )
    ),
    // Footer
    React.createElement(
      Box,
      { paddingX: 1 },
      React.createElement(
        Text,
        { color: "gray" },
        "[h/j/k/l] select  [esc] clear  [r]efresh  [q]uit"
      ),
      React.createElement(
        Text,
        { color: snapshot.error ? "red" : "gray" },
        `  ${statusText}`
      )
    )
  );
}

function main(): void {
  const feedUrl = process.argv[2] ?? config.feedUrl;

  const { unmount } = render(
    React.createElement(App, { feedUrl, refreshMs: config.refreshMs })
  );

  process.on("SIGINT", () => {
    unmount();
    process.exit(0);
  });
}

main();
