/**
 * GET /v1/token - Token identity, supply and pause state
 */

import { Hono } from "hono";
import type { TokenInfoResponse } from "@mona/types";
import type { AppBindings } from "../../../types/context.js";

const tokenRoute = new Hono<AppBindings>();

tokenRoute.get("/", (c) => {
  const ledger = c.get("ledger");
  const response: TokenInfoResponse = {
    address: ledger.address,
    name: ledger.name(),
    symbol: ledger.symbol(),
    decimals: ledger.decimals(),
    totalSupply: ledger.totalSupply().toString(),
    paused: ledger.paused(),
  };

  return c.json(response);
});

export { tokenRoute };
