import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

import { encodeBidPreimage, type BidContent } from './encoding.js';
import { CommitmentEncodingError } from './errors.js';

/** SHA-256 output size; every stored commitment has exactly this length. */
export const COMMITMENT_LENGTH = 32;

/**
 * Commitment a bidder submits before the reveal phase:
 * SHA-256(amount || description || bidder).
 */
export function computeBidCommitment(content: BidContent): Uint8Array {
  return sha256(encodeBidPreimage(content));
}

/**
 * Compare two byte strings without an early exit on the first differing byte.
 * Length mismatch returns false immediately.
 */
export function commitmentsEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * True when the revealed content hashes to `commitment`.
 * Content that cannot be encoded never verifies.
 */
export function verifyBidCommitment(
  commitment: Uint8Array,
  content: BidContent
): boolean {
  let expected: Uint8Array;
  try {
    expected = computeBidCommitment(content);
  } catch (err) {
    if (err instanceof CommitmentEncodingError) return false;
    throw err;
  }
  return commitmentsEqual(expected, commitment);
}

// ---------------------------------------------------------------------------
// Hex
// ---------------------------------------------------------------------------

export function commitmentToHex(commitment: Uint8Array): string {
  return bytesToHex(commitment);
}

/**
 * Decode hex of any even length, with or without a `0x` prefix.
 */
export function decodeHex(hex: string): Uint8Array {
  const normalized = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (!/^[0-9a-fA-F]*$/.test(normalized) || normalized.length % 2 !== 0) {
    throw new CommitmentEncodingError('INVALID_HEX', `Invalid hex string: ${hex}`);
  }
  return hexToBytes(normalized);
}

/**
 * Parse a 64-char hex commitment, with or without a `0x` prefix.
 */
export function commitmentFromHex(hex: string): Uint8Array {
  const bytes = decodeHex(hex);
  if (bytes.length !== COMMITMENT_LENGTH) {
    throw new CommitmentEncodingError(
      'INVALID_LENGTH',
      `Commitment must be ${COMMITMENT_LENGTH} bytes, got ${bytes.length}`
    );
  }
  return bytes;
}
