/**
 * @mona/types - Shared schemas and primitives for the Monad Token ledger
 */

export * from './address.schema.js';
export * from './ledger.schema.js';
export * from './roles.js';
