/** Whole seconds between two instants, as a decimal string. */
export function formatSeconds(from: Date, to: Date): string {
  const seconds = Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
  return String(seconds);
}

/** Human duration: "2d 3h", "4h 12m" or "7m 5s". */
export function formatDelta(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const d = Math.floor(secs / 86400);
  const h = Math.floor((secs % 86400) / 3600);
  const m = Math.floor((secs % 3600) / 60);
  const s = secs % 60;

  if (d > 0) return `${d}d ${h}h`;
  if (h > 0) return `${h}h ${m}m`;
  return `${m}m ${s}s`;
}

/**
 * Parse a "1m 5m 15m" load triple. Anything that is not exactly three
 * finite numbers yields null.
 */
export function parseLoad(ld: string | number): [number, number, number] | null {
  const parts = String(ld).trim().split(/\s+/);
  if (parts.length !== 3) return null;
  const nums = parts.map(Number);
  if (nums.some((n) => !Number.isFinite(n))) return null;
  return [nums[0], nums[1], nums[2]];
}

/** Divide a reported load triple by the CPU count; other text passes through. */
export function normalizeLoad(load: string, numCpus: number): string {
  if (load === "0") return load;
  const parsed = parseLoad(load);
  if (!parsed) return load;
  const cpus = Math.max(1, numCpus);
  return parsed.map((n) => String(n / cpus)).join(" ");
}
