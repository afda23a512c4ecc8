/**
 * Supply changes
 *
 * POST /v1/mint - create tokens (minter role)
 * POST /v1/burn - destroy the caller's own tokens
 */

import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { BurnRequestSchema, MintRequestSchema } from "@mona/types";
import { requireCaller } from "../../../middleware/caller.js";
import { receiptResponse } from "../../../lib/ledger-response.js";
import { validationHook } from "../../../lib/validation.js";
import type { AppBindings } from "../../../types/context.js";

const supplyRoute = new Hono<AppBindings>();

supplyRoute.post(
  "/mint",
  requireCaller,
  zValidator("json", MintRequestSchema, validationHook),
  (c) => {
    const { to, amount } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").mint(c.get("caller"), to, amount));
  }
);

supplyRoute.post(
  "/burn",
  requireCaller,
  zValidator("json", BurnRequestSchema, validationHook),
  (c) => {
    const { amount } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").burn(c.get("caller"), amount));
  }
);

export { supplyRoute };
