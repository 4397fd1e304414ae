/**
 * @bidledger/commitment
 *
 * Canonical bid encoding and SHA-256 commitments for the sealed-bid ledger.
 */

export {
  AMOUNT_BYTE_LENGTH,
  MAX_AMOUNT,
  toAmount,
  isEncodableAmount,
  encodeAmount,
  encodeDescription,
  encodeIdentity,
  encodeBidPreimage,
} from './encoding.js';
export type { AmountInput, BidContent } from './encoding.js';
export {
  COMMITMENT_LENGTH,
  computeBidCommitment,
  commitmentsEqual,
  verifyBidCommitment,
  commitmentToHex,
  commitmentFromHex,
  decodeHex,
} from './commitment.js';
export { CommitmentEncodingError } from './errors.js';
export type { CommitmentEncodingErrorCode } from './errors.js';
