/**
 * Ledger Domain
 *
 * Public exports for the Monad Token ledger
 */

// State layer
export { LedgerStore } from './ledger-store.js';

// Access control
export {
  OPERATION_ROLE_MAP,
  ROLE_ADMIN_MAP,
  createAccessControl,
  getRoleAdmin,
} from './access-control.js';
export type { AccessControl, PrivilegedOperation } from './access-control.js';

// Service layer
export { TokenLedger } from './token-ledger.js';
export type { TokenLedgerOptions } from './token-ledger.js';

// Events
export { LedgerEventEmitter, ledgerEvents } from './ledger-events.js';
export type { LedgerEventHandler, LedgerEventPublisher } from './ledger-events.js';

// Constants
export {
  INITIAL_SUPPLY,
  ONE_TOKEN,
  TOKEN_DECIMALS,
  TOKEN_NAME,
  TOKEN_SYMBOL,
} from './ledger-constants.js';

// Domain types
export type {
  ApprovalEventPayload,
  BurnOccurredEventPayload,
  DeployLedgerParams,
  EventsFilter,
  LedgerEvent,
  LedgerEventOf,
  LedgerEventPayload,
  LedgerReceipt,
  MintOccurredEventPayload,
  PausedEventPayload,
  RoleGrantedEventPayload,
  RoleRevokedEventPayload,
  TransferEventPayload,
  UnpausedEventPayload,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  MissingRoleError,
  InsufficientBalanceError,
  InsufficientAllowanceError,
  LedgerPausedError,
  AlreadyPausedError,
  NotPausedError,
  InvalidAddressError,
  InvalidAmountError,
  SupplyOverflowError,
} from './ledger-errors.js';
export type { AddressField, LedgerErrorKind } from './ledger-errors.js';
