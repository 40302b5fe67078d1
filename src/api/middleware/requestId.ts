/**
 * Request ID middleware. Every request carries an ID in its logs and in the
 * x-request-id response header.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

// Caller-supplied IDs end up in log lines, so only short tokens are kept.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header)
    ? header
    : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));
  const { method, path } = c.req;

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method,
      path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    `${method} ${path} → ${c.res.status}`,
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
