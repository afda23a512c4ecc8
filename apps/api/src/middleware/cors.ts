import { cors } from "hono/cors";

/**
 * CORS for browser wallets and dashboards talking to the ledger API
 * Only the configured origins and localhost (for development) are echoed back
 */
export function createCorsMiddleware(allowedOrigins: readonly string[] = []) {
  const allowed = new Set(allowedOrigins);

  return cors({
    origin: (origin) => {
      if (origin && allowed.has(origin)) {
        return origin;
      }

      // Allow localhost for development
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }

      // Reject all other origins
      return "";
    },
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "X-Ledger-Account", "X-Request-Id"],
    exposeHeaders: ["X-Request-Id"],
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
