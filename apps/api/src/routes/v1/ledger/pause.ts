/**
 * POST /v1/pause, POST /v1/unpause - global transfer switch (pauser role)
 */

import { Hono } from "hono";
import { requireCaller } from "../../../middleware/caller.js";
import { receiptResponse } from "../../../lib/ledger-response.js";
import type { AppBindings } from "../../../types/context.js";

const pauseRoute = new Hono<AppBindings>();

pauseRoute.post("/pause", requireCaller, (c) =>
  receiptResponse(c, () => c.get("ledger").pause(c.get("caller")))
);

pauseRoute.post("/unpause", requireCaller, (c) =>
  receiptResponse(c, () => c.get("ledger").unpause(c.get("caller")))
);

export { pauseRoute };
