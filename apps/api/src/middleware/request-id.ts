import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";
import { logger } from "@mona/observability";
import type { AppBindings } from "../types/context.js";

/**
 * Request ID middleware
 * Generates a unique request ID for each request, attaches it to the context
 * and logs the request once it completes, so every ledger call can be
 * correlated with its audit entries
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  // Reuse an ID set upstream (e.g., by a load balancer)
  const requestId =
    c.req.header("x-request-id") || c.req.header("x-correlation-id") || randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const startedAt = performance.now();
  await next();

  logger.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
    },
    "Request completed"
  );
}
