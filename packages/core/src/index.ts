/**
 * @mona/core - Domain logic for the Monad Token ledger
 *
 * Balances, supply, allowances, roles and the pause switch, consumed by the
 * API layer.
 */

export * from './ledger/index.js';
