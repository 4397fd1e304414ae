import { describe, expect, it } from 'vitest';

import { commitmentsEqual } from '@bidledger/commitment';

import { BidLedger, silentLogger, type LedgerResult } from '../src/index.js';
import { ADMIN, PROJECT, makeLedger, sealedBid, snapshot, type Harness } from './helpers.js';

function expectRejectedWithoutChange(
  h: Harness,
  run: () => LedgerResult<unknown>,
  code: string
): void {
  const before = snapshot(h);
  const auditCount = h.audit.entries().length;
  const result = run();
  expect(result).toMatchObject({ ok: false, error: { code } });
  expect(snapshot(h)).toEqual(before);
  expect(h.audit.entries()).toHaveLength(auditCount);
}

describe('atomicity', () => {
  it('leaves state untouched for every kind of rejection', () => {
    const h = makeLedger();
    const { ledger } = h;
    const revealedCommitment = sealedBid(10, 'revealed', 'carol');
    ledger.submit('alice', PROJECT, new Uint8Array(32).fill(1));
    ledger.submit('carol', PROJECT, revealedCommitment);
    ledger.reveal('carol', PROJECT, 10, 'revealed', revealedCommitment);

    expectRejectedWithoutChange(h, () => ledger.pause('alice'), 'UNAUTHORIZED');
    expectRejectedWithoutChange(h, () => ledger.setAdmin(ADMIN, ADMIN), 'UNAUTHORIZED');
    expectRejectedWithoutChange(h, () => ledger.submit('bob', 5, new Uint8Array(32)), 'PROJECT_NOT_FOUND');
    expectRejectedWithoutChange(
      h,
      () => ledger.submit('alice', PROJECT, new Uint8Array(32)),
      'ALREADY_SUBMITTED'
    );
    expectRejectedWithoutChange(h, () => ledger.submit('bob', PROJECT, new Uint8Array(16)), 'INVALID_HASH');
    expectRejectedWithoutChange(
      h,
      () => ledger.reveal('bob', PROJECT, 1, 'x', new Uint8Array(32)),
      'BID_NOT_FOUND'
    );
    expectRejectedWithoutChange(
      h,
      () => ledger.reveal('carol', PROJECT, 10, 'revealed', revealedCommitment),
      'ALREADY_REVEALED'
    );
    expectRejectedWithoutChange(
      h,
      () => ledger.reveal('alice', PROJECT, 1, 'x', new Uint8Array(32).fill(1)),
      'INVALID_REVEAL'
    );
    expectRejectedWithoutChange(h, () => ledger.withdraw('carol', PROJECT), 'ALREADY_OPENED');
    expectRejectedWithoutChange(h, () => ledger.withdraw('bob', PROJECT), 'BID_NOT_FOUND');

    ledger.pause(ADMIN);
    expectRejectedWithoutChange(h, () => ledger.setAdmin(ADMIN, 'agency'), 'PAUSED');
    expectRejectedWithoutChange(h, () => ledger.withdraw('alice', PROJECT), 'PAUSED');
  });
});

describe('capacity bound', () => {
  function fillProject(h: Harness, count: number): void {
    for (let i = 0; i < count; i++) {
      const result = h.ledger.submit(`bidder-${i}`, PROJECT, new Uint8Array(32).fill(i));
      expect(result.ok).toBe(true);
    }
  }

  it('rejects the 51st bid regardless of caller', () => {
    const h = makeLedger();
    fillProject(h, 50);

    expect(h.ledger.getProjectBids(PROJECT)).toHaveLength(50);
    expectRejectedWithoutChange(
      h,
      () => h.ledger.submit('bidder-50', PROJECT, new Uint8Array(32)),
      'BIDS_FULL'
    );
    expectRejectedWithoutChange(
      h,
      () => h.ledger.submit(ADMIN, PROJECT, new Uint8Array(32)),
      'BIDS_FULL'
    );
  });

  it('reports a malformed commitment before a full list', () => {
    const h = makeLedger();
    fillProject(h, 50);
    expect(h.ledger.submit('late', PROJECT, new Uint8Array(8))).toMatchObject({
      ok: false,
      error: { code: 'INVALID_HASH' },
    });
  });

  it('frees a slot when a bid is withdrawn', () => {
    const h = makeLedger();
    fillProject(h, 50);
    h.ledger.withdraw('bidder-10', PROJECT);

    expect(h.ledger.submit('late', PROJECT, new Uint8Array(32)).ok).toBe(true);
    expect(h.ledger.getProjectBids(PROJECT)).toHaveLength(50);
  });

  it('honours a configured capacity', () => {
    const h = makeLedger({ config: { maxBidsPerProject: 2 } });
    fillProject(h, 2);
    expect(h.ledger.submit('third', PROJECT, new Uint8Array(32))).toMatchObject({
      ok: false,
      error: { code: 'BIDS_FULL', message: 'Project 1 already holds 2 bids' },
    });
  });

  it('stays usable when reopened over a store holding more bids than its capacity', () => {
    const h = makeLedger();
    fillProject(h, 3);

    const reopened = new BidLedger({
      config: { admin: ADMIN, maxBidsPerProject: 2 },
      heightSource: h.clock,
      stores: { projects: h.projects, bids: h.bids },
      logger: silentLogger,
    });

    expect(reopened.submit('fourth', PROJECT, new Uint8Array(32))).toMatchObject({
      ok: false,
      error: { code: 'BIDS_FULL', message: 'Project 1 already holds 2 bids' },
    });
    expect(reopened.withdraw('bidder-1', PROJECT).ok).toBe(true);
    expect(reopened.getProjectBids(PROJECT)?.map((header) => header.bidder)).toEqual([
      'bidder-0',
      'bidder-2',
    ]);
    expect(reopened.submit('fourth', PROJECT, new Uint8Array(32))).toMatchObject({
      ok: false,
      error: { code: 'BIDS_FULL' },
    });
    expect(reopened.withdraw('bidder-2', PROJECT).ok).toBe(true);
    expect(reopened.submit('fourth', PROJECT, new Uint8Array(32)).ok).toBe(true);
  });
});

describe('commit binding', () => {
  const amount = 1000n;
  const description = 'Rebuild school';

  it('rejects every single-bit change to the amount', () => {
    const h = makeLedger();
    const commitment = sealedBid(amount, description, 'bidder1');
    h.ledger.submit('bidder1', PROJECT, commitment);

    for (let bit = 0n; bit < 64n; bit++) {
      const mutated = amount ^ (1n << bit);
      expectRejectedWithoutChange(
        h,
        () => h.ledger.reveal('bidder1', PROJECT, mutated, description, commitment),
        'INVALID_REVEAL'
      );
    }
  });

  it('rejects every single-bit change to the description', () => {
    const h = makeLedger();
    const commitment = sealedBid(amount, description, 'bidder1');
    h.ledger.submit('bidder1', PROJECT, commitment);

    for (let i = 0; i < description.length; i++) {
      for (let bit = 0; bit < 7; bit++) {
        const flipped = String.fromCharCode(description.charCodeAt(i) ^ (1 << bit));
        const mutated = description.slice(0, i) + flipped + description.slice(i + 1);
        expectRejectedWithoutChange(
          h,
          () => h.ledger.reveal('bidder1', PROJECT, amount, mutated, commitment),
          'INVALID_REVEAL'
        );
      }
    }

    expect(h.ledger.reveal('bidder1', PROJECT, amount, description, commitment).ok).toBe(true);
  });
});

describe('uniqueness and structural invariants', () => {
  /** Deterministic LCG so the operation sequence is reproducible. */
  function lcg(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      return state;
    };
  }

  function checkInvariants(h: Harness): void {
    const capacity = h.ledger.config.maxBidsPerProject;
    const recordKeys = new Set(h.bids.keys());
    let headerCount = 0;

    for (const projectKey of h.projects.keys()) {
      const headers = h.projects.get(projectKey) ?? [];
      const bidders = headers.map((header) => header.bidder);
      expect(new Set(bidders).size).toBe(bidders.length);
      expect(headers.length).toBeLessThanOrEqual(capacity);

      for (const header of headers) {
        const record = h.bids.get(`${projectKey}::${header.bidder}`);
        expect(record).toBeDefined();
        if (record) {
          expect(commitmentsEqual(record.commitment, header.commitment)).toBe(true);
        }
        headerCount++;
      }
    }
    expect(recordKeys.size).toBe(headerCount);

    for (const key of recordKeys) {
      const record = h.bids.get(key);
      if (record && !record.revealed) {
        expect(record).toMatchObject({ amount: 0n, description: '', revealedAt: null });
      }
    }
  }

  it('holds after a long mixed sequence of operations', () => {
    const h = makeLedger({ config: { maxBidsPerProject: 3 } });
    h.ledger.registerProject(2);
    const next = lcg(20260301);
    const bidders = ['alice', 'bob', 'carol', 'dave'];
    const projects = [1, 2];
    const contents = new Map(
      bidders.map((bidder, i) => [bidder, { amount: BigInt(100 * (i + 1)), description: `bid of ${bidder}` }])
    );

    for (let step = 0; step < 400; step++) {
      const bidder = bidders[next() % bidders.length];
      const projectId = projects[next() % projects.length];
      const content = contents.get(bidder) ?? { amount: 0n, description: '' };
      const commitment = sealedBid(content.amount, content.description, bidder);

      switch (next() % 5) {
        case 0:
        case 1:
          h.ledger.submit(bidder, projectId, commitment);
          break;
        case 2:
          h.ledger.reveal(bidder, projectId, content.amount, content.description, commitment);
          break;
        case 3:
          h.ledger.withdraw(bidder, projectId);
          break;
        default:
          if (h.ledger.isPaused()) h.ledger.unpause(ADMIN);
          else if (next() % 4 === 0) h.ledger.pause(ADMIN);
      }
      h.clock.advance();
      checkInvariants(h);
    }
  });
});
