/**
 * Caller identity middleware
 *
 * Mutating ledger operations act on behalf of the account named in the
 * X-Ledger-Account header. Proving control of that account (signatures)
 * happens before requests reach this service.
 */

import type { Context, Next } from "hono";
import { AddressSchema } from "@mona/types";
import type { AppBindings } from "../types/context.js";

export const CALLER_HEADER = "x-ledger-account";

export async function requireCaller(c: Context<AppBindings>, next: Next) {
  const raw = c.req.header(CALLER_HEADER);
  if (!raw) {
    return c.json({ error: "Missing X-Ledger-Account header" }, 401);
  }

  const parsed = AddressSchema.safeParse(raw);
  if (!parsed.success) {
    return c.json({ error: "X-Ledger-Account must be a 0x-prefixed 20-byte hex address" }, 401);
  }

  c.set("caller", parsed.data);
  await next();
}
