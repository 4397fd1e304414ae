import type { BidLedgerErrorCode, LedgerResult } from './types.js';

/**
 * Error form of a rejected ledger operation, for callers that prefer
 * exceptions over inspecting a `LedgerResult`.
 */
export class BidLedgerError extends Error {
  constructor(
    public readonly code: BidLedgerErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'BidLedgerError';
  }
}

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail<T>(code: BidLedgerErrorCode, message: string): LedgerResult<T> {
  return { ok: false, error: { code, message } };
}

export function unwrapResult<T>(result: LedgerResult<T>): T {
  if (!result.ok) {
    throw new BidLedgerError(result.error.code, result.error.message);
  }
  return result.value;
}
