/**
 * Ledger Store
 *
 * In-memory state of one ledger: balances, total supply, allowances, role
 * membership and the pause flag. Pure state access with no business rules.
 *
 * Writes are only accepted inside `atomically()`. Each write records how to
 * undo itself; when the unit of work throws, the journal is replayed in
 * reverse and the error is rethrown, so a failed operation leaves no trace.
 */

import type { Address, LedgerRole } from '@mona/types';

type UndoEntry = () => void;

export class LedgerStore {
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<Address, Map<Address, bigint>>();
  private readonly roles = new Map<LedgerRole, Set<Address>>();
  private supply = 0n;
  private pausedFlag = false;
  private journal: UndoEntry[] | null = null;

  /**
   * Run `work` as one all-or-nothing unit
   * Nested calls join the enclosing unit
   */
  atomically<T>(work: () => T): T {
    if (this.journal) {
      return work();
    }

    const journal: UndoEntry[] = [];
    this.journal = journal;
    try {
      return work();
    } catch (error) {
      for (let index = journal.length - 1; index >= 0; index -= 1) {
        journal[index]?.();
      }
      throw error;
    } finally {
      this.journal = null;
    }
  }

  get inUnitOfWork(): boolean {
    return this.journal !== null;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  setBalance(account: Address, amount: bigint): void {
    const previous = this.balances.get(account);
    this.record(() => {
      if (previous === undefined) {
        this.balances.delete(account);
      } else {
        this.balances.set(account, previous);
      }
    });

    // A zero balance is indistinguishable from an untouched account
    if (amount === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, amount);
    }
  }

  /**
   * Every account holding a non-zero balance
   */
  balanceEntries(): Array<[Address, bigint]> {
    return [...this.balances.entries()];
  }

  totalSupply(): bigint {
    return this.supply;
  }

  setTotalSupply(amount: bigint): void {
    const previous = this.supply;
    this.record(() => {
      this.supply = previous;
    });
    this.supply = amount;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  setAllowance(owner: Address, spender: Address, amount: bigint): void {
    const previous = this.allowances.get(owner)?.get(spender);
    this.record(() => {
      this.writeAllowance(owner, spender, previous ?? 0n);
    });
    this.writeAllowance(owner, spender, amount);
  }

  hasRole(role: LedgerRole, account: Address): boolean {
    return this.roles.get(role)?.has(account) ?? false;
  }

  /**
   * Set or clear membership
   * @returns whether membership changed
   */
  setRole(role: LedgerRole, account: Address, member: boolean): boolean {
    if (this.hasRole(role, account) === member) {
      return false;
    }

    this.record(() => {
      this.writeRole(role, account, !member);
    });
    this.writeRole(role, account, member);
    return true;
  }

  roleMembers(role: LedgerRole): Address[] {
    return [...(this.roles.get(role) ?? [])];
  }

  isPaused(): boolean {
    return this.pausedFlag;
  }

  setPaused(paused: boolean): void {
    const previous = this.pausedFlag;
    this.record(() => {
      this.pausedFlag = previous;
    });
    this.pausedFlag = paused;
  }

  private record(undo: UndoEntry): void {
    if (!this.journal) {
      throw new Error('Ledger state can only change inside atomically()');
    }
    this.journal.push(undo);
  }

  private writeAllowance(owner: Address, spender: Address, amount: bigint): void {
    let spenders = this.allowances.get(owner);
    if (amount === 0n) {
      spenders?.delete(spender);
      if (spenders && spenders.size === 0) {
        this.allowances.delete(owner);
      }
      return;
    }
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  private writeRole(role: LedgerRole, account: Address, member: boolean): void {
    let members = this.roles.get(role);
    if (!members) {
      members = new Set();
      this.roles.set(role, members);
    }
    if (member) {
      members.add(account);
    } else {
      members.delete(account);
    }
  }
}
