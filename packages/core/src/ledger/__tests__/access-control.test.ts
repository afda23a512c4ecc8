import { describe, expect, it } from 'vitest';
import { LEDGER_ROLES } from '@mona/types';
import {
  OPERATION_ROLE_MAP,
  ROLE_ADMIN_MAP,
  createAccessControl,
  getRoleAdmin,
} from '../access-control.js';
import { MissingRoleError } from '../ledger-errors.js';
import { LedgerStore } from '../ledger-store.js';

const ALICE = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';

function storeWithRole(role: 'admin' | 'minter' | 'pauser') {
  const store = new LedgerStore();
  store.atomically(() => {
    store.setRole(role, ALICE, true);
  });
  return store;
}

describe('operation role mapping', () => {
  it('gates minting on the minter role and the pause switch on the pauser role', () => {
    expect(OPERATION_ROLE_MAP).toEqual({ mint: 'minter', pause: 'pauser', unpause: 'pauser' });
  });

  it('makes admin the administering role of every role', () => {
    for (const role of LEDGER_ROLES) {
      expect(getRoleAdmin(role)).toBe('admin');
    }
    expect(Object.keys(ROLE_ADMIN_MAP).sort()).toEqual([...LEDGER_ROLES].sort());
  });
});

describe('createAccessControl', () => {
  it('reads membership from the store', () => {
    const access = createAccessControl(storeWithRole('minter'));

    expect(access.hasRole('minter', ALICE)).toBe(true);
    expect(access.hasRole('admin', ALICE)).toBe(false);
  });

  it('passes callers holding the role', () => {
    const access = createAccessControl(storeWithRole('pauser'));

    expect(() => access.requireOperation('pause', ALICE)).not.toThrow();
  });

  it('rejects callers missing the role with the role and account named', () => {
    const access = createAccessControl(storeWithRole('pauser'));

    try {
      access.requireOperation('mint', ALICE);
      expect.unreachable('requireOperation should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRoleError);
      expect(error).toMatchObject({ kind: 'authorization', role: 'minter', account: ALICE });
    }
  });
});
