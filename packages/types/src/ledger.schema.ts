/**
 * Ledger API schemas for request validation and response parsing
 * Amounts are decimal strings on the wire and bigints after parsing
 */

import { z } from "zod";
import { AddressSchema, AmountSchema, DecimalStringSchema } from "./address.schema.js";
import { LEDGER_ROLES } from "./roles.js";

export const LEDGER_EVENT_TYPES = [
  "transfer",
  "approval",
  "mint-occurred",
  "burn-occurred",
  "role-granted",
  "role-revoked",
  "paused",
  "unpaused",
] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

export const LedgerRoleSchema = z.enum(LEDGER_ROLES);

export const MintRequestSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export const BurnRequestSchema = z.object({
  amount: AmountSchema,
});

export const TransferRequestSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export const TransferFromRequestSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: AmountSchema,
});

export const ApproveRequestSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export const RoleAccountRequestSchema = z.object({
  account: AddressSchema,
});

/**
 * Query schema for the event log
 * - fromSequence: only events with sequence >= this value
 * - type: only events of this type
 */
export const EventsQuerySchema = z.object({
  fromSequence: z.coerce.number().int().min(0).optional(),
  type: z.enum(LEDGER_EVENT_TYPES).optional(),
});

const eventBase = {
  sequence: z.number().int().min(0),
  timestamp: z.string(), // ISO 8601 timestamp
};

/**
 * Wire form of a published ledger event
 */
export const LedgerEventResponseSchema = z.discriminatedUnion("type", [
  z.object({
    ...eventBase,
    type: z.literal("transfer"),
    from: z.string(),
    to: z.string(),
    amount: DecimalStringSchema,
  }),
  z.object({
    ...eventBase,
    type: z.literal("approval"),
    owner: z.string(),
    spender: z.string(),
    amount: DecimalStringSchema,
  }),
  z.object({
    ...eventBase,
    type: z.literal("mint-occurred"),
    to: z.string(),
    amount: DecimalStringSchema,
    minter: z.string(),
  }),
  z.object({
    ...eventBase,
    type: z.literal("burn-occurred"),
    from: z.string(),
    amount: DecimalStringSchema,
  }),
  z.object({
    ...eventBase,
    type: z.literal("role-granted"),
    role: LedgerRoleSchema,
    account: z.string(),
    sender: z.string(),
  }),
  z.object({
    ...eventBase,
    type: z.literal("role-revoked"),
    role: LedgerRoleSchema,
    account: z.string(),
    sender: z.string(),
  }),
  z.object({
    ...eventBase,
    type: z.literal("paused"),
    account: z.string(),
  }),
  z.object({
    ...eventBase,
    type: z.literal("unpaused"),
    account: z.string(),
  }),
]);

/**
 * Response schema for every mutating endpoint: the events the operation
 * published, in order
 */
export const ReceiptResponseSchema = z.object({
  events: z.array(LedgerEventResponseSchema),
});

export const EventsResponseSchema = z.object({
  events: z.array(LedgerEventResponseSchema),
});

export const TokenInfoResponseSchema = z.object({
  address: z.string(),
  name: z.string(),
  symbol: z.string(),
  decimals: z.number().int(),
  totalSupply: DecimalStringSchema,
  paused: z.boolean(),
});

export const AccountResponseSchema = z.object({
  address: z.string(),
  balance: DecimalStringSchema,
  roles: z.object({
    admin: z.boolean(),
    minter: z.boolean(),
    pauser: z.boolean(),
  }),
});

export const AllowanceResponseSchema = z.object({
  owner: z.string(),
  spender: z.string(),
  allowance: DecimalStringSchema,
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  kind: z.string().optional(),
});

// Export TypeScript types derived from schemas
export type MintRequest = z.input<typeof MintRequestSchema>;
export type TransferRequest = z.input<typeof TransferRequestSchema>;
export type TransferFromRequest = z.input<typeof TransferFromRequestSchema>;
export type ApproveRequest = z.input<typeof ApproveRequestSchema>;
export type EventsQuery = z.infer<typeof EventsQuerySchema>;
export type LedgerEventResponse = z.infer<typeof LedgerEventResponseSchema>;
export type ReceiptResponse = z.infer<typeof ReceiptResponseSchema>;
export type TokenInfoResponse = z.infer<typeof TokenInfoResponseSchema>;
export type AccountResponse = z.infer<typeof AccountResponseSchema>;
export type AllowanceResponse = z.infer<typeof AllowanceResponseSchema>;
