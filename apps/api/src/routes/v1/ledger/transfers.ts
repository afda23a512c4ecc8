/**
 * Balance movements and delegation
 *
 * POST /v1/transfers - move the caller's tokens
 * POST /v1/transfers/delegated - move another account's tokens against an allowance
 * POST /v1/approvals - set the allowance of a spender over the caller's tokens
 */

import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import {
  ApproveRequestSchema,
  TransferFromRequestSchema,
  TransferRequestSchema,
} from "@mona/types";
import { requireCaller } from "../../../middleware/caller.js";
import { receiptResponse } from "../../../lib/ledger-response.js";
import { validationHook } from "../../../lib/validation.js";
import type { AppBindings } from "../../../types/context.js";

const transfersRoute = new Hono<AppBindings>();

transfersRoute.post(
  "/",
  requireCaller,
  zValidator("json", TransferRequestSchema, validationHook),
  (c) => {
    const { to, amount } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").transfer(c.get("caller"), to, amount));
  }
);

transfersRoute.post(
  "/delegated",
  requireCaller,
  zValidator("json", TransferFromRequestSchema, validationHook),
  (c) => {
    const { from, to, amount } = c.req.valid("json");
    return receiptResponse(c, () =>
      c.get("ledger").transferFrom(c.get("caller"), from, to, amount)
    );
  }
);

const approvalsRoute = new Hono<AppBindings>();

approvalsRoute.post(
  "/",
  requireCaller,
  zValidator("json", ApproveRequestSchema, validationHook),
  (c) => {
    const { spender, amount } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").approve(c.get("caller"), spender, amount));
  }
);

export { transfersRoute, approvalsRoute };
