/**
 * Ledger Errors
 *
 * Raised by the in-memory token contracts. The bridge treats these as
 * opaque failures of the token and wraps or propagates them.
 */

export enum LedgerErrorCode {
  NOT_OWNER = 'LEDGER_001',
  ALREADY_MINTED = 'LEDGER_002',
  NONEXISTENT_TOKEN = 'LEDGER_003',
  INVALID_RECIPIENT = 'LEDGER_004',
  RECEIVER_REJECTED = 'LEDGER_005',
}

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}
