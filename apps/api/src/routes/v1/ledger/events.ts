/**
 * GET /v1/events - Published ledger events, oldest first
 * Optional filters: ?fromSequence=<n>&type=<event type>
 */

import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { EventsQuerySchema } from "@mona/types";
import { toEventResponse } from "../../../lib/serialize.js";
import { validationHook } from "../../../lib/validation.js";
import type { AppBindings } from "../../../types/context.js";

const eventsRoute = new Hono<AppBindings>();

eventsRoute.get("/", zValidator("query", EventsQuerySchema, validationHook), (c) => {
  const filter = c.req.valid("query");
  const events = c.get("ledger").events(filter).map(toEventResponse);

  return c.json({ events });
});

export { eventsRoute };
