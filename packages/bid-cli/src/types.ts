export type CliStatus = 'PASS' | 'FAIL' | 'ERROR';

export interface CliOutputBase {
  status: CliStatus;
  generated_at: string;
  reason_code: string;
  reason: string;
  /** Actionable hint for how to fix the issue. Only present on FAIL/ERROR. */
  hint?: string;
}

export interface CliCommitOutput extends CliOutputBase {
  command: 'commit' | 'verify';
  input: {
    amount: string;
    description: string;
    bidder: string;
  };
  commitment_hex: string;
  preimage_hex: string;
  /** Commitment the caller asked to verify against (verify only). */
  expected_commitment_hex?: string;
}

export interface ReplayStepResult {
  index: number;
  op: string;
  height: number;
  ok: boolean;
  reason_code?: string;
  reason?: string;
}

export interface ReplayBidView {
  bidder: string;
  commitment_hex: string;
  submitted_at: number;
  revealed: boolean;
  amount: string;
  description: string;
  revealed_at: number | null;
}

export interface ReplayFinalState {
  admin: string;
  paused: boolean;
  height: number;
  projects: Array<{ project_id: number; bids: ReplayBidView[] }>;
}

export interface CliReplayOutput extends CliOutputBase {
  command: 'replay';
  input: { path: string; config_path?: string; strict: boolean };
  rejected: number;
  steps: ReplayStepResult[];
  final_state: ReplayFinalState;
}

export interface CliErrorOutput extends CliOutputBase {
  command?: string;
}

export type CliOutput = CliCommitOutput | CliReplayOutput | CliErrorOutput;

/** On-disk config file accepted by `--config`. */
export interface BidLedgerCliConfigV1 {
  config_version: '1';
  admin?: string;
  max_bids_per_project?: number;
  max_description_length?: number;
  log_level?: string;
  start_height?: number;
}
