/**
 * @mona/sdk - Typed client for the ledger HTTP API
 */

export { LedgerClient } from './client.js';
export type {
  AccountInfo,
  FetchLike,
  LedgerClientConfig,
  LedgerEventRecord,
  Receipt,
  TokenInfo,
} from './client.js';
export { LedgerApiError } from './errors.js';
