export type CommitmentEncodingErrorCode =
  | 'INVALID_AMOUNT'
  | 'INVALID_HEX'
  | 'INVALID_LENGTH';

/**
 * Thrown when a value cannot be put into the canonical commitment byte layout.
 */
export class CommitmentEncodingError extends Error {
  constructor(
    public readonly code: CommitmentEncodingErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'CommitmentEncodingError';
  }
}
