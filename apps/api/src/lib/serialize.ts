/**
 * Wire representations of ledger values
 * Amounts become decimal strings and timestamps ISO 8601 strings
 */

import type { LedgerEvent, LedgerReceipt } from "@mona/core";
import type { LedgerEventResponse, ReceiptResponse } from "@mona/types";

export function toEventResponse(event: LedgerEvent): LedgerEventResponse {
  const timestamp = event.timestamp.toISOString();

  switch (event.type) {
    case "transfer":
    case "approval":
    case "mint-occurred":
    case "burn-occurred":
      return { ...event, amount: event.amount.toString(), timestamp };
    case "role-granted":
    case "role-revoked":
    case "paused":
    case "unpaused":
      return { ...event, timestamp };
  }
}

export function toReceiptResponse(receipt: LedgerReceipt): ReceiptResponse {
  return { events: receipt.events.map(toEventResponse) };
}
