/**
 * Service Registry
 *
 * Deploys the ledger this API serves and wires it to the shared event emitter
 */

import { TokenLedger, ledgerEvents } from '@mona/core';
import { logger } from '@mona/observability';
import type { ApiConfig } from '../config.js';

/**
 * Create the ledger and report the deployment
 * The deployer receives every role and the initial supply
 */
export function deployLedger(config: Pick<ApiConfig, 'deployer' | 'ledgerAddress'>): TokenLedger {
  const ledger = TokenLedger.deploy(
    { deployer: config.deployer, address: config.ledgerAddress },
    { publisher: ledgerEvents }
  );

  logger.info(
    {
      ledgerAddress: ledger.address,
      deployer: ledger.deployer,
      name: ledger.name(),
      symbol: ledger.symbol(),
      decimals: ledger.decimals(),
      totalSupply: ledger.totalSupply(),
    },
    'Ledger deployed'
  );

  return ledger;
}
