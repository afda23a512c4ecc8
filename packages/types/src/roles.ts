/**
 * Ledger role definitions
 *
 * Roles gate the privileged ledger operations:
 * - admin: grants and revokes every role, including admin itself
 * - minter: increases total supply
 * - pauser: toggles the global pause flag
 *
 * This file is in @mona/types (not @mona/core) so the API and the SDK can
 * share it without depending on the ledger itself.
 */

export const LEDGER_ROLES = ['admin', 'minter', 'pauser'] as const;

export type LedgerRole = (typeof LEDGER_ROLES)[number];

export function isLedgerRole(value: unknown): value is LedgerRole {
  return typeof value === 'string' && LEDGER_ROLES.some((role) => role === value);
}
