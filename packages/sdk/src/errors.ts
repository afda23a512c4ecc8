/**
 * Error thrown for every non-2xx answer from the ledger API
 */
export class LedgerApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public kind?: string
  ) {
    super(message);
    this.name = 'LedgerApiError';
  }
}
