/**
 * Role administration
 *
 * POST /v1/roles/:role/grant - give an account the role (admin role)
 * POST /v1/roles/:role/revoke - take the role from an account (admin role)
 * POST /v1/roles/:role/renounce - drop a role the caller holds
 */

import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { LedgerRoleSchema, RoleAccountRequestSchema } from "@mona/types";
import { requireCaller } from "../../../middleware/caller.js";
import { receiptResponse } from "../../../lib/ledger-response.js";
import { validationHook } from "../../../lib/validation.js";
import type { AppBindings } from "../../../types/context.js";

const RoleParamSchema = z.object({ role: LedgerRoleSchema });

const rolesRoute = new Hono<AppBindings>();

rolesRoute.post(
  "/:role/grant",
  requireCaller,
  zValidator("param", RoleParamSchema, validationHook),
  zValidator("json", RoleAccountRequestSchema, validationHook),
  (c) => {
    const { role } = c.req.valid("param");
    const { account } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").grantRole(c.get("caller"), role, account));
  }
);

rolesRoute.post(
  "/:role/revoke",
  requireCaller,
  zValidator("param", RoleParamSchema, validationHook),
  zValidator("json", RoleAccountRequestSchema, validationHook),
  (c) => {
    const { role } = c.req.valid("param");
    const { account } = c.req.valid("json");
    return receiptResponse(c, () => c.get("ledger").revokeRole(c.get("caller"), role, account));
  }
);

rolesRoute.post(
  "/:role/renounce",
  requireCaller,
  zValidator("param", RoleParamSchema, validationHook),
  (c) => {
    const { role } = c.req.valid("param");
    return receiptResponse(c, () => c.get("ledger").renounceRole(c.get("caller"), role));
  }
);

export { rolesRoute };
