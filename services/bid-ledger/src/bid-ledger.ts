/**
 * Bid Ledger
 *
 * Sealed-bid commit-reveal state machine: bidders submit a SHA-256
 * commitment, later reveal the bid content, and the ledger accepts the
 * reveal only if the content hashes to the stored commitment.
 *
 * Every mutating operation checks all of its preconditions before its first
 * write and returns a `LedgerResult`; a rejected operation leaves state
 * untouched.
 */

import {
  COMMITMENT_LENGTH,
  commitmentsEqual,
  toAmount,
  verifyBidCommitment,
} from '@bidledger/commitment';

import { buildAuditEvent } from './audit.js';
import { BoundedList } from './bounded-list.js';
import { parseLedgerConfig, type BidLedgerConfig, type BidLedgerConfigInput } from './config.js';
import { fail, ok } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { MemoryKeyValueStore } from './stores/memory-store.js';
import type {
  AccessControlState,
  AmountInput,
  AuditSink,
  BidHeader,
  BidLedgerErrorCode,
  BidRecord,
  HeightSource,
  Identity,
  KeyValueStore,
  LedgerOperation,
  LedgerResult,
  Logger,
  ProjectBidList,
  ProjectId,
} from './types.js';

export interface BidLedgerStores {
  /** Project id (decimal string) → submitted bid headers, in submission order. */
  projects: KeyValueStore<ProjectBidList>;
  /** `<projectId>::<bidder>` → full bid record. */
  bids: KeyValueStore<BidRecord>;
}

export interface BidLedgerOptions {
  config: BidLedgerConfigInput;
  heightSource: HeightSource;
  stores?: Partial<BidLedgerStores>;
  auditSink?: AuditSink;
  logger?: Logger;
  now?: () => Date;
}

export function projectKey(projectId: ProjectId): string {
  return String(projectId);
}

export function bidKey(projectId: ProjectId, bidder: Identity): string {
  return `${projectKey(projectId)}::${bidder}`;
}

function cloneHeader(header: BidHeader): BidHeader {
  return { ...header, commitment: Uint8Array.from(header.commitment) };
}

function cloneRecord(record: BidRecord): BidRecord {
  return { ...record, commitment: Uint8Array.from(record.commitment) };
}

export class BidLedger {
  readonly config: BidLedgerConfig;
  private readonly access: AccessControlState;
  private readonly projects: KeyValueStore<ProjectBidList>;
  private readonly bids: KeyValueStore<BidRecord>;
  private readonly heightSource: HeightSource;
  private readonly auditSink?: AuditSink;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: BidLedgerOptions) {
    this.config = parseLedgerConfig(options.config);
    this.access = { admin: this.config.admin, paused: false };
    this.projects = options.stores?.projects ?? new MemoryKeyValueStore<ProjectBidList>();
    this.bids = options.stores?.bids ?? new MemoryKeyValueStore<BidRecord>();
    this.heightSource = options.heightSource;
    this.auditSink = options.auditSink;
    this.logger =
      options.logger ?? createConsoleLogger({ level: this.config.logLevel, name: 'bid-ledger' });
    this.now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Project registry hook
  // -------------------------------------------------------------------------

  /**
   * Seed an empty bid list so the project can accept bids. Called by the
   * project registry; an existing project keeps its bids and yields `false`.
   *
   * Unlike the bid operations this throws: a malformed id is a caller bug
   * in the registry, not a ledger rejection.
   *
   * @throws RangeError if `projectId` is not a non-negative safe integer.
   */
  registerProject(
    projectId: ProjectId,
    registeredBy: Identity = 'project-registry'
  ): LedgerResult<boolean> {
    if (!Number.isSafeInteger(projectId) || projectId < 0) {
      throw new RangeError(`Project id must be a non-negative safe integer, got ${projectId}`);
    }

    const key = projectKey(projectId);
    if (this.projects.has(key)) {
      return ok(false);
    }

    this.projects.set(key, []);
    this.emitAudit('register_project', projectId, registeredBy);
    return ok(true);
  }

  // -------------------------------------------------------------------------
  // Access control
  // -------------------------------------------------------------------------

  /** Resolves to the new paused flag. */
  pause(caller: Identity): LedgerResult<boolean> {
    if (caller !== this.access.admin) {
      return this.reject('pause', 'UNAUTHORIZED', 'Only the admin can pause the ledger');
    }
    this.access.paused = true;
    this.emitAudit('pause', null, caller);
    return ok(this.access.paused);
  }

  unpause(caller: Identity): LedgerResult<boolean> {
    if (caller !== this.access.admin) {
      return this.reject('unpause', 'UNAUTHORIZED', 'Only the admin can unpause the ledger');
    }
    this.access.paused = false;
    this.emitAudit('unpause', null, caller);
    return ok(this.access.paused);
  }

  /**
   * Hand adminship to `newAdmin`. Naming the current admin again is
   * rejected as UNAUTHORIZED.
   */
  setAdmin(caller: Identity, newAdmin: Identity): LedgerResult<Identity> {
    if (caller !== this.access.admin) {
      return this.reject('set_admin', 'UNAUTHORIZED', 'Only the admin can transfer adminship');
    }
    if (this.access.paused) {
      return this.reject('set_admin', 'PAUSED', 'Ledger is paused');
    }
    if (newAdmin === caller) {
      return this.reject('set_admin', 'UNAUTHORIZED', 'New admin must differ from the current admin');
    }
    this.access.admin = newAdmin;
    this.emitAudit('set_admin', null, caller);
    return ok(newAdmin);
  }

  // -------------------------------------------------------------------------
  // Bid lifecycle
  // -------------------------------------------------------------------------

  /**
   * Record a sealed bid: a 32-byte commitment to (amount, description, bidder).
   *
   * Checks, first failure wins: PAUSED, PROJECT_NOT_FOUND, ALREADY_SUBMITTED,
   * INVALID_HASH, BIDS_FULL.
   */
  submit(caller: Identity, projectId: ProjectId, commitment: Uint8Array): LedgerResult<BidHeader> {
    if (this.access.paused) {
      return this.reject('submit', 'PAUSED', 'Ledger is paused');
    }

    const pKey = projectKey(projectId);
    const headers = this.projects.get(pKey);
    if (!headers) {
      return this.reject('submit', 'PROJECT_NOT_FOUND', `Project ${projectId} not found`);
    }

    const bKey = bidKey(projectId, caller);
    if (this.bids.has(bKey)) {
      return this.reject(
        'submit',
        'ALREADY_SUBMITTED',
        `Bidder ${caller} already has a bid on project ${projectId}`
      );
    }

    if (commitment.length !== COMMITMENT_LENGTH) {
      return this.reject(
        'submit',
        'INVALID_HASH',
        `Commitment must be ${COMMITMENT_LENGTH} bytes, got ${commitment.length}`
      );
    }

    // A store written under a larger capacity may already hold more headers.
    if (headers.length >= this.config.maxBidsPerProject) {
      return this.reject(
        'submit',
        'BIDS_FULL',
        `Project ${projectId} already holds ${this.config.maxBidsPerProject} bids`
      );
    }
    const list = new BoundedList(this.config.maxBidsPerProject, headers);

    const height = this.heightSource.currentHeight();
    const header: BidHeader = {
      bidder: caller,
      commitment: Uint8Array.from(commitment),
      submittedAt: height,
    };
    list.append(header);

    this.projects.set(pKey, list.toArray());
    this.bids.set(bKey, {
      commitment: Uint8Array.from(commitment),
      amount: 0n,
      description: '',
      revealed: false,
      revealedAt: null,
    });

    this.emitAudit('submit', projectId, caller, height);
    return ok(cloneHeader(header));
  }

  /**
   * Disclose bid content. Accepted only if both the supplied commitment and
   * SHA-256(amount || description || caller) equal the stored commitment.
   *
   * Checks, first failure wins: PAUSED, PROJECT_NOT_FOUND, BID_NOT_FOUND,
   * ALREADY_REVEALED, then INVALID_REVEAL for an argument mismatch, a hash
   * mismatch or an oversized description.
   */
  reveal(
    caller: Identity,
    projectId: ProjectId,
    amount: AmountInput,
    description: string,
    commitment: Uint8Array
  ): LedgerResult<BidRecord> {
    if (this.access.paused) {
      return this.reject('reveal', 'PAUSED', 'Ledger is paused');
    }

    if (!this.projects.has(projectKey(projectId))) {
      return this.reject('reveal', 'PROJECT_NOT_FOUND', `Project ${projectId} not found`);
    }

    const bKey = bidKey(projectId, caller);
    const record = this.bids.get(bKey);
    if (!record) {
      return this.reject(
        'reveal',
        'BID_NOT_FOUND',
        `No bid from ${caller} on project ${projectId}`
      );
    }

    if (record.revealed) {
      return this.reject('reveal', 'ALREADY_REVEALED', 'Bid has already been revealed');
    }

    if (!commitmentsEqual(commitment, record.commitment)) {
      return this.reject(
        'reveal',
        'INVALID_REVEAL',
        'Supplied commitment does not match the submitted commitment'
      );
    }

    if (!verifyBidCommitment(record.commitment, { amount, description, bidder: caller })) {
      return this.reject(
        'reveal',
        'INVALID_REVEAL',
        'Revealed content does not hash to the submitted commitment'
      );
    }

    if (description.length > this.config.maxDescriptionLength) {
      return this.reject(
        'reveal',
        'INVALID_REVEAL',
        `Description exceeds ${this.config.maxDescriptionLength} characters`
      );
    }

    const height = this.heightSource.currentHeight();
    const revealed: BidRecord = {
      ...record,
      amount: toAmount(amount),
      description,
      revealed: true,
      revealedAt: height,
    };
    this.bids.set(bKey, revealed);

    this.emitAudit('reveal', projectId, caller, height);
    return ok(cloneRecord(revealed));
  }

  /**
   * Remove an unrevealed bid. Revealed bids are treated as opened and can
   * no longer be withdrawn (ALREADY_OPENED).
   */
  withdraw(caller: Identity, projectId: ProjectId): LedgerResult<BidRecord> {
    if (this.access.paused) {
      return this.reject('withdraw', 'PAUSED', 'Ledger is paused');
    }

    const pKey = projectKey(projectId);
    const headers = this.projects.get(pKey);
    if (!headers) {
      return this.reject('withdraw', 'PROJECT_NOT_FOUND', `Project ${projectId} not found`);
    }

    const bKey = bidKey(projectId, caller);
    const record = this.bids.get(bKey);
    if (!record) {
      return this.reject(
        'withdraw',
        'BID_NOT_FOUND',
        `No bid from ${caller} on project ${projectId}`
      );
    }

    if (record.revealed) {
      return this.reject(
        'withdraw',
        'ALREADY_OPENED',
        'Revealed bids are opened and cannot be withdrawn'
      );
    }

    const list = new BoundedList(Math.max(this.config.maxBidsPerProject, headers.length), headers);
    list.removeWhere((header) => header.bidder === caller);
    this.projects.set(pKey, list.toArray());
    this.bids.delete(bKey);

    this.emitAudit('withdraw', projectId, caller);
    return ok(cloneRecord(record));
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getBidDetails(projectId: ProjectId, bidder: Identity): BidRecord | null {
    const record = this.bids.get(bidKey(projectId, bidder));
    return record ? cloneRecord(record) : null;
  }

  /** Headers in submission order, or null for an unknown project. */
  getProjectBids(projectId: ProjectId): BidHeader[] | null {
    const headers = this.projects.get(projectKey(projectId));
    return headers ? headers.map(cloneHeader) : null;
  }

  hasProject(projectId: ProjectId): boolean {
    return this.projects.has(projectKey(projectId));
  }

  isPaused(): boolean {
    return this.access.paused;
  }

  getAdmin(): Identity {
    return this.access.admin;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private reject<T>(
    operation: LedgerOperation,
    code: BidLedgerErrorCode,
    message: string
  ): LedgerResult<T> {
    this.logger.debug(`${operation} rejected: ${code}`, { message });
    return fail(code, message);
  }

  private emitAudit(
    operation: LedgerOperation,
    projectId: ProjectId | null,
    caller: Identity,
    height = this.heightSource.currentHeight()
  ): void {
    if (!this.auditSink) return;

    const event = buildAuditEvent({ operation, projectId, caller, height, now: this.now });
    const onFailure = (err: unknown): void => {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.warn(`audit sink failed for ${operation}: ${msg}`, { event_id: event.event_id });
    };

    try {
      const pending = this.auditSink.append(event);
      if (pending instanceof Promise) {
        void pending.catch(onFailure);
      }
    } catch (err) {
      onFailure(err);
    }
  }
}
