#!/usr/bin/env node
import { fork, spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "./shared/config.js";
import { createLogger } from "./shared/logger.js";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const log = createLogger("launch");

const RESTART_DELAY_MS = 3000;
const KILL_TIMEOUT_MS = 5000;

// Running from sources under tsx, or from the build output
const ext = import.meta.url.endsWith(".ts") ? ".ts" : ".js";

interface Component {
  name: "aggregator" | "web" | "tui";
  /** The terminal console owns the tty; quitting it ends the session */
  interactive: boolean;
}

interface Running {
  component: Component;
  proc: ChildProcess;
}

const running = new Map<Component["name"], Running>();
let shuttingDown = false;

function entryOf(component: Component): string {
  return resolve(__dirname, component.name, `index${ext}`);
}

function start(component: Component): void {
  const entry = entryOf(component);
  if (!existsSync(entry)) {
    log.error(`${component.name} entry point not found: ${entry}. Run npm run build first.`);
    process.exit(1);
  }

  const stdio: StdioOptions = component.interactive ? "inherit" : ["ignore", "ignore", "inherit"];
  const proc =
    ext === ".ts"
      ? spawn(process.execPath, ["--import", "tsx", entry], { stdio, env: process.env })
      : fork(entry, [], {
          stdio: component.interactive ? "inherit" : ["ignore", "ignore", "inherit", "ipc"],
          env: process.env,
        });

  running.set(component.name, { component, proc });
  proc.on("exit", (code, signal) => onExit(component, code, signal));
}

function onExit(component: Component, code: number | null, signal: NodeJS.Signals | null): void {
  running.delete(component.name);
  log.info(`${component.name} exited`, { code, signal });
  if (shuttingDown) return;

  if (component.interactive) {
    shutdown();
    return;
  }
  if (code !== 0) {
    log.warn(`Restarting ${component.name} in ${RESTART_DELAY_MS / 1000}s`);
    setTimeout(() => {
      if (!shuttingDown) start(component);
    }, RESTART_DELAY_MS);
  }
}

function shutdown(): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info("Stopping all components");

  for (const { component, proc } of running.values()) {
    log.info(`Stopping ${component.name}`, { pid: proc.pid });
    proc.kill("SIGTERM");
  }

  setTimeout(() => {
    for (const { proc } of running.values()) proc.kill("SIGKILL");
    process.exit(0);
  }, KILL_TIMEOUT_MS).unref();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

// --- Main ---

const args = process.argv.slice(2);
const components: Component[] = [
  { name: "aggregator", interactive: false },
  ...(args.includes("--no-web") ? [] : [{ name: "web" as const, interactive: false }]),
  ...(args.includes("--no-tui") ? [] : [{ name: "tui" as const, interactive: true }]),
];

log.info("Launching cluster console", { components: components.map((c) => c.name) });
for (const component of components) start(component);

if (running.has("web")) {
  log.info(`Web console: http://localhost:${config.webPort}`);
}
