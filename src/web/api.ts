import { z } from "zod";
import {
  adjustAutoscaling,
  adjustRequestSchema,
  getAutoscaling,
  toggleAutoscaling,
  toggleRequestSchema,
} from "../aggregator/autoscaling.js";
import { getClusterSummary, getInstanceFeed, listEvents } from "../aggregator/feed.js";
import { applyWorkerMessage } from "../aggregator/worker.js";
import { badRequest, HttpError, renderHttpError, toHttpError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { AutoscalingSettings } from "../shared/types.js";
import { buildScene, type GridScene } from "./grid.js";
import { getPageHtml } from "./page.js";
import { buildTooltip, renderTooltipHtml } from "./tooltip.js";

const log = createLogger("api");

export interface ApiRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  rawBody?: string;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface SceneResponse {
  scene: GridScene;
  /** Info panel HTML per tile, in tile order */
  tooltips: string[];
  /** Info panel HTML when no tile is selected */
  idleTooltip: string;
  autoscaling: AutoscalingSettings;
}

const DEFAULT_EVENT_LIMIT = 50;
const MAX_EVENT_LIMIT = 200;

const messageBodySchema = z.object({
  message: z.string().min(1),
});

interface RouteContext {
  req: ApiRequest;
  params: string[];
  now: Date;
}

interface Route {
  method: "GET" | "POST";
  pattern: RegExp;
  handle(ctx: RouteContext): ApiResponse;
}

function json(status: number, data: unknown): ApiResponse {
  return {
    status,
    headers: {
      "Content-Type": "application/json",
      "Cache-Control": "no-cache",
    },
    body: JSON.stringify(data),
  };
}

function parseBody(req: ApiRequest): unknown {
  const raw = req.rawBody?.trim();
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw badRequest("Request body is not valid JSON");
  }
}

function parseIntParam(value: string | null, fallback: number): number {
  if (value === null || value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw badRequest(`Expected an integer, got "${value}"`);
  }
  return n;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw badRequest(`Malformed path segment "${segment}"`);
  }
}

export function getScene(selected: number, now: Date): SceneResponse {
  const feed = getInstanceFeed(now);
  const autoscaling = getAutoscaling();
  return {
    scene: buildScene(feed.instances, selected),
    tooltips: feed.instances.map((_, i) =>
      renderTooltipHtml(buildTooltip(feed.instances, i, autoscaling))
    ),
    idleTooltip: renderTooltipHtml(buildTooltip(feed.instances, -1, autoscaling)),
    autoscaling,
  };
}

const ROUTES: Route[] = [
  {
    method: "GET",
    pattern: /^\/$/,
    handle: () => ({
      status: 200,
      headers: { "Content-Type": "text/html; charset=utf-8", "Cache-Control": "no-cache" },
      body: getPageHtml(),
    }),
  },
  {
    method: "GET",
    pattern: /^\/api\/instances$/,
    handle: ({ now }) => json(200, getInstanceFeed(now)),
  },
  {
    method: "GET",
    pattern: /^\/api\/scene$/,
    handle: ({ req, now }) =>
      json(200, getScene(parseIntParam(req.query.get("selected"), -1), now)),
  },
  {
    method: "GET",
    pattern: /^\/api\/summary$/,
    handle: () => json(200, getClusterSummary()),
  },
  {
    method: "GET",
    pattern: /^\/api\/events$/,
    handle: ({ req }) => {
      const limit = parseIntParam(req.query.get("limit"), DEFAULT_EVENT_LIMIT);
      const clamped = Math.min(Math.max(limit, 1), MAX_EVENT_LIMIT);
      return json(200, { events: listEvents(clamped) });
    },
  },
  {
    method: "GET",
    pattern: /^\/api\/autoscaling$/,
    handle: () => json(200, getAutoscaling()),
  },
  {
    method: "POST",
    pattern: /^\/api\/autoscaling\/toggle$/,
    handle: ({ req }) =>
      json(200, toggleAutoscaling(toggleRequestSchema.parse(parseBody(req)))),
  },
  {
    method: "POST",
    pattern: /^\/api\/autoscaling\/adjust$/,
    handle: ({ req }) =>
      json(200, adjustAutoscaling(adjustRequestSchema.parse(parseBody(req)))),
  },
  {
    method: "POST",
    pattern: /^\/api\/instances\/([^/]+)\/messages$/,
    handle: ({ req, params, now }) => {
      const body = messageBodySchema.parse(parseBody(req));
      const instanceId = decodePathSegment(params[0]);
      const msg = applyWorkerMessage(instanceId, body.message, now);
      return json(200, { instanceId, type: msg.type });
    },
  },
];

/**
 * Dispatch a request to its handler. Failures become JSON error bodies;
 * nothing thrown escapes.
 */
export function routeRequest(req: ApiRequest, now: Date = new Date()): ApiResponse {
  const matching = ROUTES.map((route) => ({ route, match: route.pattern.exec(req.path) }))
    .filter((m) => m.match !== null);

  if (matching.length === 0) {
    return json(404, renderHttpError(new HttpError({ status: 404, code: "not_found", message: "Not found" })));
  }

  const hit = matching.find((m) => m.route.method === req.method);
  if (!hit || !hit.match) {
    const allowed = matching.map((m) => m.route.method).join(", ");
    const res = json(405, renderHttpError(new HttpError({
      status: 405,
      code: "method_not_allowed",
      message: `Method ${req.method} not allowed`,
    })));
    res.headers["Allow"] = allowed;
    return res;
  }

  try {
    return hit.route.handle({ req, params: hit.match.slice(1), now });
  } catch (err) {
    const httpErr = toHttpError(err);
    if (httpErr.status >= 500) {
      log.error("Request failed", { method: req.method, path: req.path, error: httpErr.detail ?? httpErr.message });
    } else {
      log.debug("Request rejected", { method: req.method, path: req.path, code: httpErr.code });
    }
    return json(httpErr.status, renderHttpError(httpErr));
  }
}
