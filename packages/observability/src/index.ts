/**
 * @mona/observability
 *
 * Structured logging for the Monad Token ledger, built on Pino.
 */

export { createLogger, logger, redactSecrets } from './logger.js';
export type { Logger } from './logger.js';
