/**
 * Ledger Store Unit Tests
 *
 * Covers the undo journal that makes each operation all-or-nothing
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerStore } from '../ledger-store.js';

const ALICE = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const BOB = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

describe('LedgerStore', () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore();
  });

  it('should default untouched accounts to zero', () => {
    expect(store.balanceOf(ALICE)).toBe(0n);
    expect(store.allowance(ALICE, BOB)).toBe(0n);
    expect(store.hasRole('admin', ALICE)).toBe(false);
    expect(store.totalSupply()).toBe(0n);
    expect(store.isPaused()).toBe(false);
  });

  it('should refuse writes outside a unit of work', () => {
    expect(() => store.setBalance(ALICE, 1n)).toThrow(
      'Ledger state can only change inside atomically()'
    );
    expect(store.balanceOf(ALICE)).toBe(0n);
  });

  it('should keep writes from a unit of work that returns', () => {
    const result = store.atomically(() => {
      store.setBalance(ALICE, 10n);
      store.setTotalSupply(10n);
      return 'done';
    });

    expect(result).toBe('done');
    expect(store.balanceOf(ALICE)).toBe(10n);
    expect(store.totalSupply()).toBe(10n);
    expect(store.inUnitOfWork).toBe(false);
  });

  it('should roll back every write from a unit of work that throws', () => {
    store.atomically(() => {
      store.setBalance(ALICE, 10n);
      store.setAllowance(ALICE, BOB, 3n);
    });

    expect(() =>
      store.atomically(() => {
        store.setBalance(ALICE, 4n);
        store.setBalance(BOB, 6n);
        store.setAllowance(ALICE, BOB, 0n);
        store.setRole('minter', BOB, true);
        store.setPaused(true);
        store.setTotalSupply(99n);
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(store.balanceOf(ALICE)).toBe(10n);
    expect(store.balanceOf(BOB)).toBe(0n);
    expect(store.allowance(ALICE, BOB)).toBe(3n);
    expect(store.hasRole('minter', BOB)).toBe(false);
    expect(store.isPaused()).toBe(false);
    expect(store.totalSupply()).toBe(0n);
    expect(store.balanceEntries()).toEqual([[ALICE, 10n]]);
    expect(store.inUnitOfWork).toBe(false);
  });

  it('should let nested units join the outer one', () => {
    expect(() =>
      store.atomically(() => {
        store.atomically(() => {
          store.setBalance(ALICE, 1n);
        });
        throw new Error('outer failure');
      })
    ).toThrow('outer failure');

    expect(store.balanceOf(ALICE)).toBe(0n);
  });

  it('should drop zero balances from the balance entries', () => {
    store.atomically(() => {
      store.setBalance(ALICE, 5n);
      store.setBalance(BOB, 5n);
      store.setBalance(ALICE, 0n);
    });

    expect(store.balanceEntries()).toEqual([[BOB, 5n]]);
  });

  it('should report whether a role write changed membership', () => {
    store.atomically(() => {
      expect(store.setRole('pauser', ALICE, true)).toBe(true);
      expect(store.setRole('pauser', ALICE, true)).toBe(false);
      expect(store.setRole('pauser', BOB, false)).toBe(false);
    });

    expect(store.roleMembers('pauser')).toEqual([ALICE]);
  });
});
