import { describe, it, expect } from "vitest";
import { formatDelta, formatSeconds, normalizeLoad, parseLoad } from "../format.js";

describe("formatSeconds", () => {
  it("returns whole elapsed seconds", () => {
    const from = new Date("2024-01-01T00:00:00.000Z");
    const to = new Date("2024-01-01T00:35:23.900Z");
    expect(formatSeconds(from, to)).toBe("2123");
  });

  it("never goes negative", () => {
    const from = new Date("2024-01-01T00:00:10.000Z");
    const to = new Date("2024-01-01T00:00:00.000Z");
    expect(formatSeconds(from, to)).toBe("0");
  });
});

describe("formatDelta", () => {
  it("shows minutes and seconds under an hour", () => {
    expect(formatDelta(2123)).toBe("35m 23s");
    expect(formatDelta(0)).toBe("0m 0s");
  });

  it("shows hours and minutes under a day", () => {
    expect(formatDelta(3 * 3600 + 12 * 60 + 5)).toBe("3h 12m");
  });

  it("shows days and hours past a day", () => {
    expect(formatDelta(2 * 86400 + 3 * 3600 + 59)).toBe("2d 3h");
  });
});

describe("parseLoad", () => {
  it("parses a three-part load", () => {
    expect(parseLoad("0.38 0.20 0.50")).toEqual([0.38, 0.2, 0.5]);
  });

  it("rejects anything else", () => {
    expect(parseLoad("0")).toBeNull();
    expect(parseLoad(0)).toBeNull();
    expect(parseLoad("1 2")).toBeNull();
    expect(parseLoad("a b c")).toBeNull();
  });
});

describe("normalizeLoad", () => {
  it("divides each part by the CPU count", () => {
    expect(normalizeLoad("0.40 0.20 1.00", 2)).toBe("0.2 0.1 0.5");
  });

  it("passes through unreported and non-numeric loads", () => {
    expect(normalizeLoad("0", 4)).toBe("0");
    expect(normalizeLoad("Starting", 2)).toBe("Starting");
  });

  it("treats a zero CPU count as one", () => {
    expect(normalizeLoad("1 1 1", 0)).toBe("1 1 1");
  });
});
