import { ledgerEvents, type LedgerEvent, type LedgerEventEmitter } from '@mona/core';
import { logger } from '@mona/observability';
import { toEventResponse } from './serialize.js';

/**
 * Initialize audit logging for ledger events
 * Every committed supply, transfer, role and pause change is logged
 *
 * @returns a function that stops audit logging
 */
export function initializeAuditLogging(emitter: LedgerEventEmitter = ledgerEvents): () => void {
  const off = emitter.on(handleLedgerEvent);
  logger.info('Audit logging initialized for ledger events');
  return off;
}

function handleLedgerEvent(event: LedgerEvent) {
  const { type, sequence, ...details } = toEventResponse(event);
  const logEntry = { event: type, sequence, ...details };

  switch (type) {
    case 'mint-occurred':
      logger.info(logEntry, 'Tokens minted');
      break;

    case 'burn-occurred':
      logger.info(logEntry, 'Tokens burned');
      break;

    case 'transfer':
      logger.debug(logEntry, 'Balance moved');
      break;

    case 'approval':
      logger.debug(logEntry, 'Allowance set');
      break;

    case 'role-granted':
      logger.info(logEntry, 'Role granted');
      break;

    case 'role-revoked':
      logger.warn(logEntry, 'Role revoked');
      break;

    case 'paused':
      logger.warn(logEntry, 'Transfers paused');
      break;

    case 'unpaused':
      logger.info(logEntry, 'Transfers resumed');
      break;
  }
}
