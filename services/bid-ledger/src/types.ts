/**
 * Bid Ledger Types
 *
 * Core type definitions for the sealed-bid ledger.
 */

import type { AmountInput } from '@bidledger/commitment';

export type { AmountInput };

/** Identity of an already-authenticated party. */
export type Identity = string;

/** Project identifier: a non-negative safe integer. */
export type ProjectId = number;

/**
 * Lightweight entry in a project's bid list.
 */
export interface BidHeader {
  bidder: Identity;
  /** 32-byte SHA-256 commitment as submitted; never rewritten on reveal. */
  commitment: Uint8Array;
  submittedAt: number;
}

/** A project's bid headers in submission order, bounded by `maxBidsPerProject`. */
export type ProjectBidList = BidHeader[];

/**
 * Full bid detail keyed by (project, bidder).
 *
 * While `revealed` is false, `amount` is 0n, `description` is empty and
 * `revealedAt` is null.
 */
export interface BidRecord {
  commitment: Uint8Array;
  amount: bigint;
  description: string;
  revealed: boolean;
  revealedAt: number | null;
}

export interface AccessControlState {
  admin: Identity;
  paused: boolean;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type BidLedgerErrorCode =
  | 'UNAUTHORIZED'
  | 'PAUSED'
  | 'PROJECT_NOT_FOUND'
  | 'ALREADY_SUBMITTED'
  | 'ALREADY_REVEALED'
  | 'ALREADY_OPENED'
  | 'INVALID_HASH'
  | 'INVALID_REVEAL'
  | 'BID_NOT_FOUND'
  | 'BIDS_FULL';

export interface LedgerFailure {
  code: BidLedgerErrorCode;
  message: string;
}

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LedgerFailure };

export type LedgerOperation =
  | 'register_project'
  | 'pause'
  | 'unpause'
  | 'set_admin'
  | 'submit'
  | 'reveal'
  | 'withdraw';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Synchronous key-value storage. The ledger is applied sequentially, so no
 * operation ever waits on its store.
 */
export interface KeyValueStore<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  delete(key: string): boolean;
  has(key: string): boolean;
  keys(): string[];
}

/**
 * Monotonic logical clock supplied by the execution environment.
 */
export interface HeightSource {
  currentHeight(): number;
}

export interface AuditEvent {
  event_id: string;
  operation: LedgerOperation;
  /** Null for access-control operations. */
  project_id: ProjectId | null;
  caller: Identity;
  height: number;
  outcome: 'accepted';
  recorded_at: string;
}

/**
 * External append-only audit log. Calls are fire-and-forget: the ledger
 * neither awaits nor retries them.
 */
export interface AuditSink {
  append(event: AuditEvent): void | Promise<void>;
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}
