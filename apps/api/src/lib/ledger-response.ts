/**
 * HTTP responses for ledger operations
 * Receipts on success; domain errors mapped to status codes
 */

import type { Context } from "hono";
import { LedgerError, type LedgerErrorKind, type LedgerReceipt } from "@mona/core";
import { toReceiptResponse } from "./serialize.js";

export const STATUS_BY_ERROR_KIND = {
  authorization: 403,
  insufficient_funds: 422,
  invalid_state: 409,
  invalid_argument: 400,
} as const satisfies Record<LedgerErrorKind, number>;

/**
 * Answer a LedgerError with its status code
 * Anything else is rethrown for the global error handler
 */
export function ledgerErrorResponse(c: Context, error: unknown) {
  if (error instanceof LedgerError) {
    return c.json({ error: error.message, kind: error.kind }, STATUS_BY_ERROR_KIND[error.kind]);
  }
  throw error;
}

/**
 * Run a mutating ledger operation and answer with its receipt
 */
export function receiptResponse(c: Context, operation: () => LedgerReceipt) {
  try {
    return c.json(toReceiptResponse(operation()), 200);
  } catch (error) {
    return ledgerErrorResponse(c, error);
  }
}
