/**
 * Fixed identity of the token held by the ledger
 */

export const TOKEN_NAME = 'Monad Token';
export const TOKEN_SYMBOL = 'MONA';
export const TOKEN_DECIMALS = 18;

/** One whole token in base units */
export const ONE_TOKEN = 10n ** BigInt(TOKEN_DECIMALS);

/** Minted to the deployer when the ledger is created: 100,000 whole tokens */
export const INITIAL_SUPPLY = 100_000n * ONE_TOKEN;
