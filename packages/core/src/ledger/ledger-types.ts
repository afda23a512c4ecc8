/**
 * Ledger Domain Types
 *
 * Event payloads, published events and operation parameters
 */

import type { Address, LedgerEventType, LedgerRole } from '@mona/types';

export interface TransferEventPayload {
  type: 'transfer';
  from: Address;
  to: Address;
  amount: bigint;
}

export interface ApprovalEventPayload {
  type: 'approval';
  owner: Address;
  spender: Address;
  amount: bigint;
}

export interface MintOccurredEventPayload {
  type: 'mint-occurred';
  to: Address;
  amount: bigint;
  minter: Address;
}

export interface BurnOccurredEventPayload {
  type: 'burn-occurred';
  from: Address;
  amount: bigint;
}

export interface RoleGrantedEventPayload {
  type: 'role-granted';
  role: LedgerRole;
  account: Address;
  sender: Address;
}

export interface RoleRevokedEventPayload {
  type: 'role-revoked';
  role: LedgerRole;
  account: Address;
  sender: Address;
}

export interface PausedEventPayload {
  type: 'paused';
  account: Address;
}

export interface UnpausedEventPayload {
  type: 'unpaused';
  account: Address;
}

export type LedgerEventPayload =
  | TransferEventPayload
  | ApprovalEventPayload
  | MintOccurredEventPayload
  | BurnOccurredEventPayload
  | RoleGrantedEventPayload
  | RoleRevokedEventPayload
  | PausedEventPayload
  | UnpausedEventPayload;

/**
 * An event published by a committed operation
 * `sequence` is its position in the ledger's event log
 */
export type LedgerEvent = LedgerEventPayload & {
  sequence: number;
  timestamp: Date;
};

export type LedgerEventOf<T extends LedgerEventType> = Extract<LedgerEvent, { type: T }>;

/**
 * What a committed operation published
 */
export interface LedgerReceipt {
  events: LedgerEvent[];
}

export interface DeployLedgerParams {
  deployer: string;
  /** Address reported for the ledger itself */
  address?: string;
  now?: () => Date;
}

export interface EventsFilter {
  fromSequence?: number;
  type?: LedgerEventType;
}
