/**
 * Actionable hints for reason codes.
 *
 * Each hint should tell the user what to check or do next.
 */

const HINTS: Record<string, string> = {
  // ── Pass ──────────────────────────────────────────────
  OK: 'No action required.',

  // ── Ledger ────────────────────────────────────────────
  UNAUTHORIZED:
    'Only the current admin may pause, unpause or transfer adminship. Transferring adminship to the current admin is also rejected.',
  PAUSED:
    'The ledger is paused. Bids cannot be submitted, revealed or withdrawn until the admin unpauses it.',
  PROJECT_NOT_FOUND:
    'The project is not registered. The project registry must register it before bids are accepted.',
  ALREADY_SUBMITTED:
    'This bidder already holds a bid on the project. Withdraw the unrevealed bid first to submit a new commitment.',
  ALREADY_REVEALED:
    'The bid was already revealed. A revealed bid is final.',
  ALREADY_OPENED:
    'Revealed bids are opened and can no longer be withdrawn.',
  INVALID_HASH:
    'The commitment must be exactly 32 bytes (64 hex characters). Compute it with: bidledger commit --amount <n> --description <text> --bidder <id>',
  INVALID_REVEAL:
    'The revealed amount, description and bidder do not hash to the submitted commitment, the commitment argument differs from the stored one, or the description is too long. Reveal exactly the values used at commit time.',
  BID_NOT_FOUND:
    'No bid exists for this bidder on this project. Check the project id and bidder identity.',
  BIDS_FULL:
    'The project already holds the maximum number of bids.',

  // ── CLI ───────────────────────────────────────────────
  INVALID_AMOUNT:
    'Amounts must be whole numbers between 0 and 18446744073709551615.',
  INVALID_HEX:
    'The commitment is not valid hex. Use 64 hex characters, optionally prefixed with 0x.',
  INVALID_LENGTH:
    'The commitment must decode to exactly 32 bytes (64 hex characters).',
  OPERATION_REJECTED:
    'At least one replayed operation was rejected and --strict is set. Inspect steps[].reason_code for each rejection.',
  INVALID_INPUT:
    'The replay file does not match the expected shape: {"operations":[{"op":"submit","caller":"...","project_id":1,...}]}.',
  USAGE_ERROR:
    'Check the command syntax. Run: bidledger --help',
  CONFIG_ERROR:
    'Check the config file (must contain "config_version":"1") and the BID_LEDGER_* environment variables.',
  INTERNAL_ERROR:
    'Unexpected failure. Re-run with BID_LEDGER_LOG_LEVEL=debug and report the output.',
};

export function hintForReasonCode(code: string): string | undefined {
  return HINTS[code];
}

export function explainReasonCode(code: string): string {
  const hint = HINTS[code];
  if (!hint) {
    return `Unknown reason code: ${code}\n\nKnown codes: ${Object.keys(HINTS).join(', ')}`;
  }
  return `${code}\n\n${hint}`;
}
