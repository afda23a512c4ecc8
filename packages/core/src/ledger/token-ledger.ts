/**
 * Token Ledger
 *
 * Business logic for the Monad Token: balances, total supply, allowances,
 * role membership and the global pause switch.
 *
 * Every mutating operation takes the calling account first, runs as one
 * atomic unit of work against the store and publishes its events only once
 * the unit commits. Any failure throws a LedgerError and leaves no change.
 */

import { randomBytes } from 'node:crypto';
import {
  LEDGER_ROLES,
  MAX_UINT256,
  ZERO_ADDRESS,
  isAddress,
  normalizeAddress,
  type Address,
  type LedgerRole,
} from '@mona/types';
import { logger } from '@mona/observability';
import { createAccessControl, getRoleAdmin, type AccessControl } from './access-control.js';
import { INITIAL_SUPPLY, TOKEN_DECIMALS, TOKEN_NAME, TOKEN_SYMBOL } from './ledger-constants.js';
import {
  AlreadyPausedError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidAddressError,
  InvalidAmountError,
  LedgerPausedError,
  NotPausedError,
  SupplyOverflowError,
  type AddressField,
} from './ledger-errors.js';
import type { LedgerEventPublisher } from './ledger-events.js';
import { LedgerStore } from './ledger-store.js';
import type {
  DeployLedgerParams,
  EventsFilter,
  LedgerEvent,
  LedgerEventPayload,
  LedgerReceipt,
} from './ledger-types.js';

export interface TokenLedgerOptions {
  store?: LedgerStore;
  publisher?: LedgerEventPublisher;
}

export class TokenLedger {
  readonly address: Address;
  readonly deployer: Address;

  private readonly store: LedgerStore;
  private readonly access: AccessControl;
  private readonly publisher: LedgerEventPublisher | undefined;
  private readonly now: () => Date;
  private readonly log: LedgerEvent[] = [];
  private pending: LedgerEventPayload[] = [];

  private constructor(
    address: Address,
    deployer: Address,
    now: () => Date,
    options: TokenLedgerOptions
  ) {
    this.address = address;
    this.deployer = deployer;
    this.now = now;
    this.store = options.store ?? new LedgerStore();
    this.access = createAccessControl(this.store);
    this.publisher = options.publisher;
  }

  /**
   * Create a ledger
   *
   * The deployer receives the admin, minter and pauser roles and the
   * initial supply of 100,000 MONA.
   *
   * @throws {InvalidAddressError} If the deployer or ledger address is malformed or zero
   */
  static deploy(params: DeployLedgerParams, options: TokenLedgerOptions = {}): TokenLedger {
    const deployer = parseAddress('deployer', params.deployer);
    if (deployer === ZERO_ADDRESS) {
      throw new InvalidAddressError('deployer', params.deployer);
    }
    const address = params.address
      ? parseAddress('ledger', params.address)
      : normalizeAddress(`0x${randomBytes(20).toString('hex')}`);
    if (address === ZERO_ADDRESS) {
      throw new InvalidAddressError('ledger', address);
    }

    const ledger = new TokenLedger(address, deployer, params.now ?? (() => new Date()), options);
    ledger.execute(() => {
      for (const role of LEDGER_ROLES) {
        ledger.grantRoleUnchecked(role, deployer, deployer);
      }
      ledger.mintUnchecked(deployer, INITIAL_SUPPLY);
    });
    return ledger;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  name(): string {
    return TOKEN_NAME;
  }

  symbol(): string {
    return TOKEN_SYMBOL;
  }

  decimals(): number {
    return TOKEN_DECIMALS;
  }

  totalSupply(): bigint {
    return this.store.totalSupply();
  }

  balanceOf(account: string): bigint {
    return this.store.balanceOf(parseAddress('account', account));
  }

  allowance(owner: string, spender: string): bigint {
    return this.store.allowance(parseAddress('approver', owner), parseAddress('spender', spender));
  }

  paused(): boolean {
    return this.store.isPaused();
  }

  hasRole(role: LedgerRole, account: string): boolean {
    return this.access.hasRole(role, parseAddress('account', account));
  }

  isAdmin(account: string): boolean {
    return this.hasRole('admin', account);
  }

  isMinter(account: string): boolean {
    return this.hasRole('minter', account);
  }

  isPauser(account: string): boolean {
    return this.hasRole('pauser', account);
  }

  /**
   * Published events in publication order, as copies of the log entries
   */
  events(filter: EventsFilter = {}): LedgerEvent[] {
    return this.log
      .filter(
        (event) =>
          (filter.fromSequence === undefined || event.sequence >= filter.fromSequence) &&
          (filter.type === undefined || event.type === filter.type)
      )
      .map((event) => ({ ...event }));
  }

  // ---------------------------------------------------------------------------
  // Supply
  // ---------------------------------------------------------------------------

  /**
   * Create `amount` new tokens for `to`
   *
   * Allowed while paused. A zero amount succeeds and still publishes events.
   *
   * @throws {MissingRoleError} If the caller lacks the minter role
   * @throws {InvalidAddressError} If `to` is the zero address
   * @throws {SupplyOverflowError} If total supply would exceed 2^256 - 1
   */
  mint(caller: string, to: string, amount: bigint): LedgerReceipt {
    return this.execute(() => {
      const minter = parseAddress('sender', caller);
      this.access.requireOperation('mint', minter);
      const receiver = parseAddress('receiver', to);
      assertAmount(amount);

      this.mintUnchecked(receiver, amount);
      this.record({ type: 'mint-occurred', to: receiver, amount, minter });
    });
  }

  /**
   * Destroy `amount` of the caller's own tokens
   *
   * @throws {InsufficientBalanceError} If the caller holds less than `amount`
   */
  burn(caller: string, amount: bigint): LedgerReceipt {
    return this.execute(() => {
      const holder = parseAddress('sender', caller);
      assertAmount(amount);

      if (holder === ZERO_ADDRESS) {
        throw new InvalidAddressError('sender', caller);
      }
      this.update(holder, ZERO_ADDRESS, amount);
      this.record({ type: 'burn-occurred', from: holder, amount });
    });
  }

  // ---------------------------------------------------------------------------
  // Transfers and delegation
  // ---------------------------------------------------------------------------

  /**
   * @throws {LedgerPausedError} If transfers are paused
   * @throws {InvalidAddressError} If `to` is the zero address
   * @throws {InsufficientBalanceError} If the caller holds less than `amount`
   */
  transfer(caller: string, to: string, amount: bigint): LedgerReceipt {
    return this.execute(() => {
      const sender = parseAddress('sender', caller);
      const receiver = parseAddress('receiver', to);
      assertAmount(amount);

      this.requireNotPaused();
      this.move(sender, receiver, amount);
    });
  }

  /**
   * Move `amount` from `from` to `to` on the strength of the caller's allowance
   *
   * The allowance is checked and spent before the balance moves; an
   * unlimited allowance (2^256 - 1) is left as it is.
   *
   * @throws {LedgerPausedError} If transfers are paused
   * @throws {InsufficientAllowanceError} If the caller's allowance is below `amount`
   * @throws {InsufficientBalanceError} If `from` holds less than `amount`
   */
  transferFrom(caller: string, from: string, to: string, amount: bigint): LedgerReceipt {
    return this.execute(() => {
      const spender = parseAddress('spender', caller);
      const owner = parseAddress('sender', from);
      const receiver = parseAddress('receiver', to);
      assertAmount(amount);

      this.requireNotPaused();
      this.spendAllowance(owner, spender, amount);
      this.move(owner, receiver, amount);
    });
  }

  /**
   * Let `spender` move up to `amount` of the caller's tokens
   * Replaces any previous allowance; allowed while paused.
   *
   * @throws {InvalidAddressError} If either party is the zero address
   */
  approve(caller: string, spender: string, amount: bigint): LedgerReceipt {
    return this.execute(() => {
      const owner = parseAddress('approver', caller);
      const delegate = parseAddress('spender', spender);
      assertAmount(amount);

      if (owner === ZERO_ADDRESS) {
        throw new InvalidAddressError('approver', caller);
      }
      if (delegate === ZERO_ADDRESS) {
        throw new InvalidAddressError('spender', spender);
      }

      this.store.setAllowance(owner, delegate, amount);
      this.record({ type: 'approval', owner, spender: delegate, amount });
    });
  }

  // ---------------------------------------------------------------------------
  // Pause switch
  // ---------------------------------------------------------------------------

  /**
   * @throws {MissingRoleError} If the caller lacks the pauser role
   * @throws {AlreadyPausedError} If transfers are already paused
   */
  pause(caller: string): LedgerReceipt {
    return this.execute(() => {
      const account = parseAddress('sender', caller);
      this.access.requireOperation('pause', account);
      if (this.store.isPaused()) {
        throw new AlreadyPausedError();
      }

      this.store.setPaused(true);
      this.record({ type: 'paused', account });
    });
  }

  /**
   * @throws {MissingRoleError} If the caller lacks the pauser role
   * @throws {NotPausedError} If transfers are not paused
   */
  unpause(caller: string): LedgerReceipt {
    return this.execute(() => {
      const account = parseAddress('sender', caller);
      this.access.requireOperation('unpause', account);
      if (!this.store.isPaused()) {
        throw new NotPausedError();
      }

      this.store.setPaused(false);
      this.record({ type: 'unpaused', account });
    });
  }

  // ---------------------------------------------------------------------------
  // Roles
  // ---------------------------------------------------------------------------

  /**
   * Give `account` the role
   *
   * Granting a role the account already holds succeeds without an event.
   *
   * @throws {MissingRoleError} If the caller lacks the admin role
   */
  grantRole(caller: string, role: LedgerRole, account: string): LedgerReceipt {
    return this.execute(() => {
      const sender = parseAddress('sender', caller);
      this.access.requireRole(getRoleAdmin(role), sender);
      this.grantRoleUnchecked(role, parseAddress('account', account), sender);
    });
  }

  /**
   * Take the role from `account`
   *
   * Admins may revoke their own admin role, including the last one; after
   * that no account can ever grant a role again.
   *
   * @throws {MissingRoleError} If the caller lacks the admin role
   */
  revokeRole(caller: string, role: LedgerRole, account: string): LedgerReceipt {
    return this.execute(() => {
      const sender = parseAddress('sender', caller);
      this.access.requireRole(getRoleAdmin(role), sender);
      this.revokeRoleUnchecked(role, parseAddress('account', account), sender);
    });
  }

  /**
   * Drop a role the caller holds; needs no admin
   */
  renounceRole(caller: string, role: LedgerRole): LedgerReceipt {
    return this.execute(() => {
      const account = parseAddress('sender', caller);
      this.revokeRoleUnchecked(role, account, account);
    });
  }

  grantAdminRole(caller: string, account: string): LedgerReceipt {
    return this.grantRole(caller, 'admin', account);
  }

  revokeAdminRole(caller: string, account: string): LedgerReceipt {
    return this.revokeRole(caller, 'admin', account);
  }

  grantMinterRole(caller: string, account: string): LedgerReceipt {
    return this.grantRole(caller, 'minter', account);
  }

  revokeMinterRole(caller: string, account: string): LedgerReceipt {
    return this.revokeRole(caller, 'minter', account);
  }

  grantPauserRole(caller: string, account: string): LedgerReceipt {
    return this.grantRole(caller, 'pauser', account);
  }

  revokePauserRole(caller: string, account: string): LedgerReceipt {
    return this.revokeRole(caller, 'pauser', account);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private execute(work: () => void): LedgerReceipt {
    const payloads = this.store.atomically(() => {
      this.pending = [];
      work();
      return this.pending;
    });
    this.pending = [];

    // The unit has committed: every event is logged before any subscriber sees one
    const events = payloads.map((payload) => this.append(payload));
    for (const event of events) {
      this.publish(event);
    }
    return { events: events.map((event) => ({ ...event })) };
  }

  private record(payload: LedgerEventPayload): void {
    this.pending.push(payload);
  }

  private append(payload: LedgerEventPayload): LedgerEvent {
    const event: LedgerEvent = {
      ...payload,
      sequence: this.log.length,
      timestamp: this.now(),
    };
    this.log.push(event);
    return event;
  }

  /**
   * A failing publisher cannot undo a committed operation, so its errors are
   * logged rather than thrown
   */
  private publish(event: LedgerEvent): void {
    if (!this.publisher) {
      return;
    }
    try {
      this.publisher.emit({ ...event });
    } catch (error) {
      logger.error(
        { err: error, eventType: event.type, sequence: event.sequence, ledger: this.address },
        'Ledger event publisher error'
      );
    }
  }

  private requireNotPaused(): void {
    if (this.store.isPaused()) {
      throw new LedgerPausedError();
    }
  }

  private mintUnchecked(to: Address, amount: bigint): void {
    if (to === ZERO_ADDRESS) {
      throw new InvalidAddressError('receiver', to);
    }
    this.update(ZERO_ADDRESS, to, amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    if (from === ZERO_ADDRESS) {
      throw new InvalidAddressError('sender', from);
    }
    if (to === ZERO_ADDRESS) {
      throw new InvalidAddressError('receiver', to);
    }
    this.update(from, to, amount);
  }

  /**
   * Single balance-moving primitive: the zero address on either side means
   * supply is created or destroyed
   */
  private update(from: Address, to: Address, amount: bigint): void {
    if (from === ZERO_ADDRESS) {
      const supply = this.store.totalSupply();
      if (supply + amount > MAX_UINT256) {
        throw new SupplyOverflowError(supply, amount);
      }
      this.store.setTotalSupply(supply + amount);
    } else {
      const balance = this.store.balanceOf(from);
      if (balance < amount) {
        throw new InsufficientBalanceError(from, balance, amount);
      }
      this.store.setBalance(from, balance - amount);
    }

    if (to === ZERO_ADDRESS) {
      this.store.setTotalSupply(this.store.totalSupply() - amount);
    } else {
      this.store.setBalance(to, this.store.balanceOf(to) + amount);
    }

    this.record({ type: 'transfer', from, to, amount });
  }

  private spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const current = this.store.allowance(owner, spender);
    if (current === MAX_UINT256) {
      return;
    }
    if (current < amount) {
      throw new InsufficientAllowanceError(spender, current, amount);
    }
    this.store.setAllowance(owner, spender, current - amount);
  }

  private grantRoleUnchecked(role: LedgerRole, account: Address, sender: Address): void {
    if (this.store.setRole(role, account, true)) {
      this.record({ type: 'role-granted', role, account, sender });
    }
  }

  private revokeRoleUnchecked(role: LedgerRole, account: Address, sender: Address): void {
    if (this.store.setRole(role, account, false)) {
      this.record({ type: 'role-revoked', role, account, sender });
    }
  }
}

function parseAddress(field: AddressField, value: string): Address {
  if (!isAddress(value)) {
    throw new InvalidAddressError(field, value);
  }
  return normalizeAddress(value);
}

function assertAmount(amount: bigint): void {
  if (amount < 0n || amount > MAX_UINT256) {
    throw new InvalidAmountError(amount);
  }
}
