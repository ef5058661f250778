import type { Readable } from "node:stream";
import { HttpError } from "../shared/errors.js";

/** Worker messages and autoscaling forms are tiny */
export const MAX_BODY_BYTES = 64 * 1024;

/**
 * Buffer a request body as UTF-8. Past the limit it rejects with 413 and
 * keeps reading without buffering, so the socket stays usable for the
 * response.
 */
export function readBody(req: Readable, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) {
        chunks.push(chunk);
        return;
      }
      chunks.length = 0;
      req.off("data", onData);
      req.resume();
      reject(new HttpError({
        status: 413,
        code: "payload_too_large",
        message: `Request body exceeds ${limit} bytes`,
      }));
    };

    req.on("data", onData);
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
