/**
 * Ledger event emitter for audit logging and downstream consumers
 * Events are fire-and-forget: a slow or failing handler never blocks or
 * aborts a ledger operation, and only committed operations publish
 */

import { logger } from '@mona/observability';
import type { LedgerEvent } from './ledger-types.js';

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

export interface LedgerEventPublisher {
  emit(event: LedgerEvent): void;
}

export class LedgerEventEmitter implements LedgerEventPublisher {
  private handlers: LedgerEventHandler[] = [];

  /**
   * Register a handler
   * @returns a function that removes it again
   */
  on(handler: LedgerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((registered) => registered !== handler);
    };
  }

  emit(event: LedgerEvent): void {
    const deliveries = this.handlers.map((handler) =>
      Promise.resolve().then(() => handler(event))
    );

    void Promise.allSettled(deliveries).then((results) => {
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.error(
            { err: result.reason, eventType: event.type, sequence: event.sequence },
            'Ledger event handler error'
          );
        }
      }
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}

export const ledgerEvents = new LedgerEventEmitter();
