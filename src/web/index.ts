import { createServer } from "node:http";
import { getDb, closeDb } from "../db/index.js";
import { config } from "../shared/config.js";
import { renderHttpError, toHttpError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { routeRequest } from "./api.js";
import { readBody } from "./body.js";

const log = createLogger("web");

getDb();

const server = createServer((req, res) => {
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  const respond = (rawBody?: string) => {
    const result = routeRequest({
      method,
      path: url.pathname,
      query: url.searchParams,
      rawBody,
    });
    res.writeHead(result.status, result.headers);
    res.end(result.body);
  };

  if (method !== "POST") {
    respond();
    return;
  }

  readBody(req).then(respond, (err: unknown) => {
    const httpErr = toHttpError(err);
    log.warn("Failed to read request body", { path: url.pathname, error: String(err) });
    if (!res.headersSent) {
      // The rest of an oversized body is still in flight
      res.writeHead(httpErr.status, {
        "Content-Type": "application/json",
        "Cache-Control": "no-cache",
        Connection: "close",
      });
      res.end(JSON.stringify(renderHttpError(httpErr)));
    }
  });
});

const port = config.webPort;

server.listen(port, () => {
  log.info(`Cluster console running at http://localhost:${port}`);
});

// Graceful shutdown
function shutdown() {
  log.info("Shutting down web server...");
  server.close(() => {
    closeDb();
    process.exit(0);
  });
  // Force exit after 3s
  setTimeout(() => process.exit(0), 3000).unref();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
