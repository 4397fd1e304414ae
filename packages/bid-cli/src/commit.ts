import { bytesToHex } from '@noble/hashes/utils';
import {
  CommitmentEncodingError,
  commitmentFromHex,
  commitmentToHex,
  commitmentsEqual,
  computeBidCommitment,
  encodeBidPreimage,
  toAmount,
  type BidContent,
} from '@bidledger/commitment';

import type { BidContentArgs } from './args.js';
import { hintForReasonCode } from './hints.js';
import type { CliCommitOutput } from './types.js';

/**
 * Decimal string → u64 amount. Signs, decimals and exponents are refused.
 */
export function parseAmountArg(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new CommitmentEncodingError(
      'INVALID_AMOUNT',
      `Amount must be a non-negative whole number, got "${raw}"`
    );
  }
  return toAmount(BigInt(raw));
}

function toContent(args: BidContentArgs): BidContent {
  return {
    amount: parseAmountArg(args.amount),
    description: args.description,
    bidder: args.bidder,
  };
}

export function runCommit(
  args: BidContentArgs,
  now: () => Date = () => new Date()
): CliCommitOutput {
  const content = toContent(args);
  const commitment = computeBidCommitment(content);

  return {
    status: 'PASS',
    generated_at: now().toISOString(),
    reason_code: 'OK',
    reason: 'Commitment computed',
    command: 'commit',
    input: { ...args, amount: content.amount.toString() },
    commitment_hex: commitmentToHex(commitment),
    preimage_hex: bytesToHex(encodeBidPreimage(content)),
  };
}

export function runVerify(
  args: BidContentArgs,
  commitmentHex: string,
  now: () => Date = () => new Date()
): CliCommitOutput {
  const expected = commitmentFromHex(commitmentHex);
  const content = toContent(args);
  const commitment = computeBidCommitment(content);
  const matches = commitmentsEqual(commitment, expected);

  return {
    status: matches ? 'PASS' : 'FAIL',
    generated_at: now().toISOString(),
    reason_code: matches ? 'OK' : 'INVALID_REVEAL',
    reason: matches
      ? 'Revealed content matches the commitment'
      : 'Revealed content does not hash to the commitment',
    ...(matches ? {} : { hint: hintForReasonCode('INVALID_REVEAL') }),
    command: 'verify',
    input: { ...args, amount: content.amount.toString() },
    commitment_hex: commitmentToHex(commitment),
    preimage_hex: bytesToHex(encodeBidPreimage(content)),
    expected_commitment_hex: commitmentToHex(expected),
  };
}
