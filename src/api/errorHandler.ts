/**
 * Global error boundary for the HTTP surface.
 * Zone and transport failures are answered by the routes as values; only
 * thrown errors reach this handler.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const { method, path } = c.req;

  // Raised deliberately by Hono or its middleware; keep its status
  if (err instanceof HTTPException) {
    log.warn(
      { requestId, method, path, status: err.status, error: err.message },
      "Request rejected",
    );
    return err.getResponse();
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      method,
      path,
      error: err.message,
      stack: err.stack,
    },
    "❌ Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
