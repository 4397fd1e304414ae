/**
 * Canonical byte encodings for sealed-bid commitments.
 *
 * Layout of the hashed preimage, in order, with no separators or padding:
 *
 *   amount       8 bytes, unsigned big-endian
 *   description  UTF-8 bytes
 *   bidder       UTF-8 bytes of the identity string
 *
 * Two implementations only agree on a commitment if they reproduce this
 * layout byte for byte.
 */

import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';

import { CommitmentEncodingError } from './errors.js';

export const AMOUNT_BYTE_LENGTH = 8;

export const MAX_AMOUNT = (1n << 64n) - 1n;

export type AmountInput = bigint | number;

export interface BidContent {
  amount: AmountInput;
  description: string;
  bidder: string;
}

// ---------------------------------------------------------------------------
// Amount
// ---------------------------------------------------------------------------

/**
 * Normalize an amount to a u64 bigint.
 * Numbers must be non-negative safe integers.
 */
export function toAmount(value: AmountInput): bigint {
  let amount: bigint;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new CommitmentEncodingError(
        'INVALID_AMOUNT',
        `Amount must be a safe integer, got ${value}`
      );
    }
    amount = BigInt(value);
  } else {
    amount = value;
  }

  if (amount < 0n || amount > MAX_AMOUNT) {
    throw new CommitmentEncodingError(
      'INVALID_AMOUNT',
      `Amount ${amount.toString()} is outside the unsigned 64-bit range`
    );
  }
  return amount;
}

export function isEncodableAmount(value: AmountInput): boolean {
  try {
    toAmount(value);
    return true;
  } catch (err) {
    if (err instanceof CommitmentEncodingError) return false;
    throw err;
  }
}

export function encodeAmount(value: AmountInput): Uint8Array {
  const out = new Uint8Array(AMOUNT_BYTE_LENGTH);
  new DataView(out.buffer).setBigUint64(0, toAmount(value), false);
  return out;
}

// ---------------------------------------------------------------------------
// Text and identity
// ---------------------------------------------------------------------------

export function encodeDescription(description: string): Uint8Array {
  return utf8ToBytes(description);
}

export function encodeIdentity(identity: string): Uint8Array {
  return utf8ToBytes(identity);
}

// ---------------------------------------------------------------------------
// Preimage
// ---------------------------------------------------------------------------

export function encodeBidPreimage(content: BidContent): Uint8Array {
  return concatBytes(
    encodeAmount(content.amount),
    encodeDescription(content.description),
    encodeIdentity(content.bidder)
  );
}
