import type { TokenLedger } from '@mona/core';
import type { Address } from '@mona/types';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  ledger: TokenLedger;
  /** Account the request acts as; set by requireCaller */
  caller: Address;
};

export type AppBindings = {
  Variables: ContextVariables;
};
