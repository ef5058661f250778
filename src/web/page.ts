import { config } from "../shared/config.js";
import { buildScene, hitTest } from "./grid.js";

export function getPageHtml(refreshMs: number = config.refreshMs): string {
  // Drawn whenever the feed cannot be fetched
  const emptyScene = JSON.stringify(buildScene([])).replace(/</g, "\\u003c");

  return /* html */ `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>Cluster Status</title>
  <style>
    :root {
      --bg: #0a0e17;
      --surface: #111827;
      --border: #1e293b;
      --text: #e2e8f0;
      --text-muted: #64748b;
      --green: #66BB67;
      --red: #DF594B;
      --amber: #FFDC40;
      --mono: 'JetBrains Mono', 'Fira Code', 'SF Mono', monospace;
      --sans: 'DM Sans', 'Segoe UI', system-ui, sans-serif;
    }
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { background: var(--bg); color: var(--text); font-family: var(--sans); padding: 24px; }
    h1 { font-size: 16px; font-weight: 700; letter-spacing: 0.5px; margin-bottom: 16px; }
    .panel { display: flex; gap: 24px; align-items: flex-start; }
    #cluster_canvas { background: var(--surface); border: 1px solid var(--border); border-radius: 6px; cursor: pointer; }
    #cluster_view_tooltip { min-width: 220px; font-size: 13px; line-height: 1.6; }
    #cluster_view_tooltip ul { list-style: none; }
    #cluster_view_tooltip li.spacer { height: 6px; }
    #cluster_view_tooltip a { text-decoration: underline; cursor: pointer; color: var(--text); }
    .as-on { color: var(--green); }
    .as-off { color: var(--red); }
    [class^="status_"] { display: inline-block; width: 10px; height: 10px; border-radius: 2px; margin-right: 6px; }
    .status_green { background: var(--green); }
    .status_red { background: var(--red); }
    .status_yellow { background: var(--amber); }
    .status_nodata { background: var(--text-muted); }
    #feed_status { margin-top: 12px; font-family: var(--mono); font-size: 11px; color: var(--text-muted); }
  </style>
</head>
<body>
  <h1>Cluster Status</h1>
  <div class="panel">
    <canvas id="cluster_canvas" width="200" height="200"></canvas>
    <div id="cluster_view_tooltip"></div>
  </div>
  <div id="feed_status"></div>
  <script>
const REFRESH_MS = ${refreshMs};
const EMPTY_SCENE = ${emptyScene};
${hitTest.toString()}

const canvas = document.getElementById("cluster_canvas");
const ctx = canvas.getContext("2d");
const tooltipEl = document.getElementById("cluster_view_tooltip");
const statusEl = document.getElementById("feed_status");

let view = { scene: EMPTY_SCENE, tooltips: [], idleTooltip: "", autoscaling: null };
let selected = -1;

function roundedBox(r, rad, stroke) {
  const { x, y, width: w, height: h } = r;
  ctx.beginPath();
  ctx.moveTo(x, y + rad);
  ctx.quadraticCurveTo(x, y, x + rad, y);
  ctx.lineTo(x + w - rad, y);
  ctx.quadraticCurveTo(x + w, y, x + w, y + rad);
  ctx.lineTo(x + w, y + h - rad);
  ctx.quadraticCurveTo(x + w, y + h, x + w - rad, y + h);
  ctx.lineTo(x + rad, y + h);
  ctx.quadraticCurveTo(x, y + h, x, y + h - rad);
  ctx.closePath();
  if (stroke) {
    ctx.lineWidth = stroke;
    ctx.stroke();
  } else {
    ctx.fill();
  }
}

function render() {
  const scene = view.scene;
  if (canvas.width !== scene.width) canvas.width = scene.width;
  if (canvas.height !== scene.height) canvas.height = scene.height;
  ctx.clearRect(0, 0, canvas.width, canvas.height);

  for (const slot of scene.empty) {
    ctx.fillStyle = scene.colors.shadow;
    roundedBox(slot.shadow, scene.cornerRadius);
    ctx.fillStyle = scene.colors.empty;
    roundedBox(slot.rect, scene.cornerRadius);
  }
  for (const tile of scene.tiles) {
    ctx.save();
    ctx.fillStyle = scene.colors.shadow;
    roundedBox(tile.shadow, scene.cornerRadius);
    ctx.fillStyle = tile.fill;
    roundedBox(tile.rect, scene.cornerRadius);
    ctx.fillStyle = scene.colors.loadBar;
    for (const bar of tile.bars) {
      ctx.fillRect(bar.x, bar.y, bar.width, bar.height);
    }
    if (tile.index === selected) {
      roundedBox(tile.rect, scene.cornerRadius, scene.selectedStroke);
    }
    ctx.restore();
  }
}

function refreshTip() {
  if (selected >= 0 && selected < view.tooltips.length) {
    tooltipEl.innerHTML = view.tooltips[selected];
    return;
  }
  tooltipEl.innerHTML = view.idleTooltip;
  const toggle = document.getElementById("toggle_autoscaling_link");
  if (toggle) toggle.addEventListener("click", toggleAutoscaling);
  const adjust = document.getElementById("adjust_autoscaling_link");
  if (adjust) adjust.addEventListener("click", adjustAutoscaling);
}

function askLimits() {
  const as = view.autoscaling;
  const min = window.prompt("Min nodes", as ? String(as.min) : "0");
  if (min === null) return null;
  const max = window.prompt("Max nodes", as ? String(as.max) : "0");
  if (max === null) return null;
  if (!/^\\d+$/.test(min.trim()) || !/^\\d+$/.test(max.trim())) {
    window.alert("Node limits must be whole numbers of at least 0");
    return null;
  }
  return { min: Number(min), max: Number(max) };
}

async function post(path, body) {
  const res = await fetch(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  if (!res.ok) {
    const data = await res.json().catch(() => null);
    window.alert(data && data.error ? data.error.message : "Request failed (" + res.status + ")");
  }
  await update();
}

function toggleAutoscaling() {
  if (view.autoscaling && view.autoscaling.enabled) {
    post("/api/autoscaling/toggle", {});
    return;
  }
  const limits = askLimits();
  if (limits) post("/api/autoscaling/toggle", limits);
}

function adjustAutoscaling() {
  const limits = askLimits();
  if (limits) post("/api/autoscaling/adjust", limits);
}

canvas.addEventListener("click", (e) => {
  const rect = canvas.getBoundingClientRect();
  const x = e.clientX - rect.left;
  const y = e.clientY - rect.top;
  const hit = hitTest(view.scene, x, y);
  if (hit < 0) return;
  selected = hit === selected ? -1 : hit;
  refreshTip();
  render();
});

async function update() {
  try {
    const res = await fetch("/api/scene?selected=" + selected, { cache: "no-store" });
    if (!res.ok) throw new Error("HTTP " + res.status);
    view = await res.json();
    statusEl.textContent = view.scene.tiles.length + " instance(s) \\u00b7 updated " + new Date().toLocaleTimeString();
  } catch (err) {
    view = { scene: EMPTY_SCENE, tooltips: [], idleTooltip: "", autoscaling: null };
    statusEl.textContent = "Status feed unavailable (" + err.message + ")";
  }
  render();
  refreshTip();
}

async function poll() {
  await update();
  setTimeout(poll, REFRESH_MS);
}

poll();
  </script>
</body>
</html>`;
}
