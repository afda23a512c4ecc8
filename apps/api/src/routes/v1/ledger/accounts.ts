/**
 * Read-only account queries
 *
 * GET /v1/accounts/:address - balance and role membership
 * GET /v1/allowances/:owner/:spender - delegated allowance
 */

import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { AddressSchema, type AccountResponse, type AllowanceResponse } from "@mona/types";
import { validationHook } from "../../../lib/validation.js";
import type { AppBindings } from "../../../types/context.js";

const accountsRoute = new Hono<AppBindings>();

accountsRoute.get(
  "/:address",
  zValidator("param", z.object({ address: AddressSchema }), validationHook),
  (c) => {
    const ledger = c.get("ledger");
    const { address } = c.req.valid("param");
    const response: AccountResponse = {
      address,
      balance: ledger.balanceOf(address).toString(),
      roles: {
        admin: ledger.isAdmin(address),
        minter: ledger.isMinter(address),
        pauser: ledger.isPauser(address),
      },
    };

    return c.json(response);
  }
);

const allowancesRoute = new Hono<AppBindings>();

allowancesRoute.get(
  "/:owner/:spender",
  zValidator("param", z.object({ owner: AddressSchema, spender: AddressSchema }), validationHook),
  (c) => {
    const { owner, spender } = c.req.valid("param");
    const response: AllowanceResponse = {
      owner,
      spender,
      allowance: c.get("ledger").allowance(owner, spender).toString(),
    };

    return c.json(response);
  }
);

export { accountsRoute, allowancesRoute };
