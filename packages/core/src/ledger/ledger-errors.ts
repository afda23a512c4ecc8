/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger rule violations
 * Every error aborts the whole operation; route handlers map `kind` to HTTP status codes
 */

import type { LedgerRole } from '@mona/types';

export type LedgerErrorKind =
  | 'authorization'
  | 'insufficient_funds'
  | 'invalid_state'
  | 'invalid_argument';

export abstract class LedgerError extends Error {
  abstract readonly kind: LedgerErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingRoleError extends LedgerError {
  readonly kind = 'authorization';

  constructor(
    readonly role: LedgerRole,
    readonly account: string
  ) {
    super(`Account ${account} is missing role "${role}"`);
  }
}

export class InsufficientBalanceError extends LedgerError {
  readonly kind = 'insufficient_funds';

  constructor(
    readonly account: string,
    readonly balance: bigint,
    readonly needed: bigint
  ) {
    super(`Insufficient balance for ${account}: has ${balance}, needs ${needed}`);
  }
}

export class InsufficientAllowanceError extends LedgerError {
  readonly kind = 'insufficient_funds';

  constructor(
    readonly spender: string,
    readonly allowance: bigint,
    readonly needed: bigint
  ) {
    super(`Insufficient allowance for ${spender}: has ${allowance}, needs ${needed}`);
  }
}

export class LedgerPausedError extends LedgerError {
  readonly kind = 'invalid_state';

  constructor() {
    super('Transfers are paused');
  }
}

export class AlreadyPausedError extends LedgerError {
  readonly kind = 'invalid_state';

  constructor() {
    super('Ledger is already paused');
  }
}

export class NotPausedError extends LedgerError {
  readonly kind = 'invalid_state';

  constructor() {
    super('Ledger is not paused');
  }
}

export type AddressField =
  | 'deployer'
  | 'ledger'
  | 'receiver'
  | 'sender'
  | 'spender'
  | 'approver'
  | 'account';

export class InvalidAddressError extends LedgerError {
  readonly kind = 'invalid_argument';

  constructor(
    readonly field: AddressField,
    readonly value: string
  ) {
    super(`Invalid ${field} address: ${value}`);
  }
}

export class InvalidAmountError extends LedgerError {
  readonly kind = 'invalid_argument';

  constructor(readonly amount: bigint) {
    super(`Amount must be a non-negative 256-bit integer, got ${amount}`);
  }
}

export class SupplyOverflowError extends LedgerError {
  readonly kind = 'invalid_argument';

  constructor(
    readonly totalSupply: bigint,
    readonly amount: bigint
  ) {
    super(`Minting ${amount} would overflow total supply ${totalSupply}`);
  }
}
