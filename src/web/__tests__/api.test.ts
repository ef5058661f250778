import { describe, it, expect, beforeEach } from "vitest";
import { syncInventory } from "../../aggregator/sync.js";
import { T0, master, resetDb, worker } from "../../aggregator/__tests__/test-utils.js";
import { routeRequest, type ApiRequest } from "../api.js";
import { hitTest } from "../grid.js";

function get(path: string, query = ""): ApiRequest {
  return { method: "GET", path, query: new URLSearchParams(query) };
}

function post(path: string, body?: unknown): ApiRequest {
  return {
    method: "POST",
    path,
    query: new URLSearchParams(),
    rawBody: body === undefined ? undefined : JSON.stringify(body),
  };
}

function bodyOf(res: { body: string }): unknown {
  return JSON.parse(res.body);
}

describe("routeRequest", () => {
  beforeEach(() => {
    resetDb();
    syncInventory([master("m1"), worker("w1", "pending")], T0);
  });

  it("serves the console page", () => {
    const res = routeRequest(get("/"), T0);
    expect(res.status).toBe(200);
    expect(res.headers["Content-Type"]).toBe("text/html; charset=utf-8");
    expect(res.headers["Cache-Control"]).toBe("no-cache");
    expect(res.body.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(res.body).toContain(hitTest.toString());
  });

  it("serves the instance feed", () => {
    const res = routeRequest(get("/api/instances"), T0);

    expect(res.status).toBe(200);
    expect(res.headers["Cache-Control"]).toBe("no-cache");
    const feed = bodyOf(res);
    expect(feed).toMatchObject({
      instances: [
        { id: "m1", role: "master", time_in_state: "0" },
        { id: "w1", role: "worker", instance_state: "pending", worker_status: "Pending" },
      ],
    });
  });

  it("serves a scene with the selection and tooltips", () => {
    const res = routeRequest(get("/api/scene", "selected=1"), T0);

    expect(res.status).toBe(200);
    expect(bodyOf(res)).toMatchObject({
      scene: { rows: 4, tiles: [{ id: "m1", selected: false }, { id: "w1", selected: true }] },
      idleTooltip:
        '<p>Autoscaling is <span class="as-off">off</span>. Turn <a id="toggle_autoscaling_link">on</a>?</p>',
      autoscaling: { enabled: false },
    });
  });

  it("rejects a non-numeric selection", () => {
    const res = routeRequest(get("/api/scene", "selected=abc"), T0);
    expect(res.status).toBe(400);
    expect(bodyOf(res)).toEqual({
      error: { code: "bad_request", message: 'Expected an integer, got "abc"' },
    });
  });

  it("toggles and adjusts autoscaling", () => {
    const on = routeRequest(post("/api/autoscaling/toggle", { min: 1, max: 3 }), T0);
    expect(bodyOf(on)).toEqual({ enabled: true, min: 1, max: 3, instanceType: null });

    const adjusted = routeRequest(post("/api/autoscaling/adjust", { min: "2", max: "6" }), T0);
    expect(bodyOf(adjusted)).toEqual({ enabled: true, min: 2, max: 6, instanceType: null });

    expect(bodyOf(routeRequest(get("/api/summary"), T0))).toEqual({
      total: 2,
      workers: 1,
      ready: 0,
      pending: 1,
      error: 0,
      autoscaling: { enabled: true, min: 2, max: 6, instanceType: null },
    });
  });

  it("answers 409 when adjusting while autoscaling is off", () => {
    const res = routeRequest(post("/api/autoscaling/adjust", { min: 1, max: 2 }), T0);
    expect(res.status).toBe(409);
    expect(bodyOf(res)).toEqual({
      error: { code: "conflict", message: "Cannot adjust autoscaling because autoscaling is not on" },
    });
  });

  it("reports invalid bodies with their field errors", () => {
    const res = routeRequest(post("/api/autoscaling/adjust", { min: 1 }), T0);
    expect(res.status).toBe(400);
    expect(bodyOf(res)).toEqual({
      error: { code: "bad_request", message: "Invalid request", detail: "max: Required" },
    });
  });

  it("refuses to turn autoscaling on without numeric limits", () => {
    const empty = routeRequest(post("/api/autoscaling/toggle", { min: null, max: null }), T0);
    expect(empty.status).toBe(400);
    expect(bodyOf(empty)).toEqual({
      error: {
        code: "bad_request",
        message: "Invalid request",
        detail: "min: Expected number, received null; max: Expected number, received null",
      },
    });

    const garbage = routeRequest(post("/api/autoscaling/toggle", { min: "", max: true }), T0);
    expect(garbage.status).toBe(400);
    expect(bodyOf(garbage)).toEqual({
      error: {
        code: "bad_request",
        message: "Invalid request",
        detail: "min: Expected number, received string; max: Expected number, received boolean",
      },
    });

    expect(bodyOf(routeRequest(get("/api/autoscaling"), T0))).toEqual({
      enabled: false,
      min: 0,
      max: 0,
      instanceType: null,
    });
  });

  it("rejects malformed JSON", () => {
    const res = routeRequest(
      { method: "POST", path: "/api/autoscaling/toggle", query: new URLSearchParams(), rawBody: "{min" },
      T0
    );
    expect(res.status).toBe(400);
    expect(bodyOf(res)).toEqual({
      error: { code: "bad_request", message: "Request body is not valid JSON" },
    });
  });

  it("applies worker messages", () => {
    const res = routeRequest(post("/api/instances/w1/messages", { message: "NODE_READY | 10.0.0.5 | 2" }), T0);
    expect(bodyOf(res)).toEqual({ instanceId: "w1", type: "NODE_READY" });

    const events = bodyOf(routeRequest(get("/api/events", "limit=1"), T0));
    expect(events).toMatchObject({
      events: [{ instanceId: "w1", type: "worker_message", payload: { type: "NODE_READY" } }],
    });
  });

  it("answers 404 for messages from unknown instances", () => {
    const res = routeRequest(post("/api/instances/nope/messages", { message: "ALIVE" }), T0);
    expect(res.status).toBe(404);
    expect(bodyOf(res)).toEqual({
      error: { code: "not_found", message: "Instance 'nope' is not part of the cluster" },
    });
  });

  it("answers 404 for unknown paths and 405 for wrong methods", () => {
    expect(routeRequest(get("/api/nothing"), T0).status).toBe(404);

    const res = routeRequest(post("/api/instances"), T0);
    expect(res.status).toBe(405);
    expect(res.headers["Allow"]).toBe("GET");
    expect(bodyOf(res)).toEqual({
      error: { code: "method_not_allowed", message: "Method POST not allowed" },
    });
  });
});
