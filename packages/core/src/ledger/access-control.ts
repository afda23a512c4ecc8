import type { Address, LedgerRole } from '@mona/types';
import { MissingRoleError } from './ledger-errors.js';
import type { LedgerStore } from './ledger-store.js';

export type PrivilegedOperation = 'mint' | 'pause' | 'unpause';

/**
 * Role each privileged operation requires of its caller
 */
export const OPERATION_ROLE_MAP = {
  mint: 'minter',
  pause: 'pauser',
  unpause: 'pauser',
} as const satisfies Record<PrivilegedOperation, LedgerRole>;

/**
 * Role whose holders may grant and revoke each role
 */
export const ROLE_ADMIN_MAP = {
  admin: 'admin',
  minter: 'admin',
  pauser: 'admin',
} as const satisfies Record<LedgerRole, LedgerRole>;

export function getRoleAdmin(role: LedgerRole): LedgerRole {
  return ROLE_ADMIN_MAP[role];
}

export interface AccessControl {
  hasRole(role: LedgerRole, account: Address): boolean;
  requireRole(role: LedgerRole, account: Address): void;
  requireOperation(operation: PrivilegedOperation, account: Address): void;
}

export function createAccessControl(store: LedgerStore): AccessControl {
  return {
    hasRole(role, account) {
      return store.hasRole(role, account);
    },

    requireRole(role, account) {
      if (!store.hasRole(role, account)) {
        throw new MissingRoleError(role, account);
      }
    },

    requireOperation(operation, account) {
      this.requireRole(OPERATION_ROLE_MAP[operation], account);
    },
  };
}
