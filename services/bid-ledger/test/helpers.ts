import { computeBidCommitment } from '@bidledger/commitment';

import {
  BidLedger,
  ManualHeightSource,
  MemoryAuditLog,
  MemoryKeyValueStore,
  silentLogger,
  type BidHeader,
  type BidLedgerConfigInput,
  type BidRecord,
  type Logger,
} from '../src/index.js';

export const ADMIN = 'deployer';
export const PROJECT = 1;

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export interface Harness {
  ledger: BidLedger;
  clock: ManualHeightSource;
  audit: MemoryAuditLog;
  projects: MemoryKeyValueStore<BidHeader[]>;
  bids: MemoryKeyValueStore<BidRecord>;
}

export function makeLedger(
  options: { config?: Partial<BidLedgerConfigInput>; logger?: Logger; startHeight?: number } = {}
): Harness {
  const clock = new ManualHeightSource(options.startHeight ?? 100);
  const audit = new MemoryAuditLog();
  const projects = new MemoryKeyValueStore<BidHeader[]>();
  const bids = new MemoryKeyValueStore<BidRecord>();

  const ledger = new BidLedger({
    config: { admin: ADMIN, ...options.config },
    heightSource: clock,
    stores: { projects, bids },
    auditSink: audit,
    logger: options.logger ?? silentLogger,
    now: () => FIXED_NOW,
  });

  ledger.registerProject(PROJECT);
  audit.clear();

  return { ledger, clock, audit, projects, bids };
}

export function sealedBid(amount: number | bigint, description: string, bidder: string): Uint8Array {
  return computeBidCommitment({ amount, description, bidder });
}

/**
 * Full copy of everything the ledger persists, for before/after comparison.
 */
export function snapshot(h: Harness): unknown {
  return {
    admin: h.ledger.getAdmin(),
    paused: h.ledger.isPaused(),
    projects: h.projects
      .keys()
      .sort()
      .map((key) => [key, h.projects.get(key)]),
    bids: h.bids
      .keys()
      .sort()
      .map((key) => [key, h.bids.get(key)]),
  };
}
