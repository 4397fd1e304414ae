/**
 * Replay an ordered operation log against a fresh ledger.
 *
 * The log stands in for the host sequencer: operations are applied one by
 * one in file order, each seeing the state left by the one before. Each
 * step runs at the current height (or the height it pins) and the clock
 * then moves forward by one.
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import {
  commitmentToHex,
  computeBidCommitment,
  decodeHex,
  CommitmentEncodingError,
} from '@bidledger/commitment';
import {
  BidLedger,
  ManualHeightSource,
  MemoryAuditLog,
  createConsoleLogger,
  type LedgerResult,
  type Logger,
} from '@bidledger/ledger';

import type { ResolvedCliConfig } from './config.js';
import { CliInputError } from './errors.js';
import type { ReplayFinalState, ReplayStepResult } from './types.js';

const AmountSchema = z
  .union([z.number().int().nonnegative().safe(), z.string().regex(/^\d+$/)])
  .transform((value) => BigInt(value));

const HexSchema = z.string().regex(/^(0x)?([0-9a-fA-F]{2})*$/, 'must be even-length hex');

const ProjectIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const StepBase = {
  /** Pin the logical height before applying this step; it may not go backwards. */
  height: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional(),
};

const SealedContentSchema = z.object({
  amount: AmountSchema,
  description: z.string(),
});

export const ReplayOperationSchema = z.discriminatedUnion('op', [
  z.object({ ...StepBase, op: z.literal('register_project'), project_id: ProjectIdSchema }),
  z.object({ ...StepBase, op: z.literal('pause'), caller: z.string() }),
  z.object({ ...StepBase, op: z.literal('unpause'), caller: z.string() }),
  z.object({
    ...StepBase,
    op: z.literal('set_admin'),
    caller: z.string(),
    new_admin: z.string(),
  }),
  z.object({
    ...StepBase,
    op: z.literal('submit'),
    caller: z.string(),
    project_id: ProjectIdSchema,
    commitment: HexSchema.optional(),
    sealed: SealedContentSchema.optional(),
  }),
  z.object({
    ...StepBase,
    op: z.literal('reveal'),
    caller: z.string(),
    project_id: ProjectIdSchema,
    amount: AmountSchema,
    description: z.string(),
    commitment: HexSchema.optional(),
  }),
  z.object({
    ...StepBase,
    op: z.literal('withdraw'),
    caller: z.string(),
    project_id: ProjectIdSchema,
  }),
]);

export const ReplayFileSchema = z.object({
  operations: z.array(ReplayOperationSchema).superRefine((operations, ctx) => {
    operations.forEach((step, index) => {
      if (step.op !== 'submit') return;
      if ((step.commitment === undefined) === (step.sealed === undefined)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: 'submit needs exactly one of commitment or sealed',
        });
      }
    });
  }),
});

export type ReplayOperation = z.infer<typeof ReplayOperationSchema>;
export type ReplayFile = z.infer<typeof ReplayFileSchema>;

export interface ReplayReport {
  steps: ReplayStepResult[];
  rejected: number;
  finalState: ReplayFinalState;
}

export function parseReplayFile(input: unknown): ReplayFile {
  const result = ReplayFileSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CliInputError(`Invalid replay file: ${summary}`);
  }
  return result.data;
}

export async function loadReplayFile(path: string): Promise<ReplayFile> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new CliInputError(
      `Could not read replay file at ${path}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CliInputError(
      `Replay file is not valid JSON: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }
  return parseReplayFile(parsed);
}

function applyOperation(
  ledger: BidLedger,
  step: ReplayOperation
): LedgerResult<unknown> {
  switch (step.op) {
    case 'register_project':
      return ledger.registerProject(step.project_id);
    case 'pause':
      return ledger.pause(step.caller);
    case 'unpause':
      return ledger.unpause(step.caller);
    case 'set_admin':
      return ledger.setAdmin(step.caller, step.new_admin);
    case 'submit': {
      const commitment = step.sealed
        ? computeBidCommitment({ ...step.sealed, bidder: step.caller })
        : decodeHex(step.commitment ?? '');
      return ledger.submit(step.caller, step.project_id, commitment);
    }
    case 'reveal': {
      const commitment =
        step.commitment !== undefined
          ? decodeHex(step.commitment)
          : computeBidCommitment({
              amount: step.amount,
              description: step.description,
              bidder: step.caller,
            });
      return ledger.reveal(step.caller, step.project_id, step.amount, step.description, commitment);
    }
    case 'withdraw':
      return ledger.withdraw(step.caller, step.project_id);
  }
}

function snapshotProjects(ledger: BidLedger, projectIds: number[]): ReplayFinalState['projects'] {
  return projectIds.map((projectId) => ({
    project_id: projectId,
    bids: (ledger.getProjectBids(projectId) ?? []).map((header) => {
      const record = ledger.getBidDetails(projectId, header.bidder);
      return {
        bidder: header.bidder,
        commitment_hex: commitmentToHex(header.commitment),
        submitted_at: header.submittedAt,
        revealed: record?.revealed ?? false,
        amount: (record?.amount ?? 0n).toString(),
        description: record?.description ?? '',
        revealed_at: record?.revealedAt ?? null,
      };
    }),
  }));
}

export function replayOperations(
  file: ReplayFile,
  config: ResolvedCliConfig,
  logger: Logger = createConsoleLogger({ level: config.ledger.logLevel, name: 'bidledger' })
): ReplayReport {
  const clock = new ManualHeightSource(config.startHeight);
  const ledger = new BidLedger({
    config: config.ledger,
    heightSource: clock,
    auditSink: new MemoryAuditLog(),
    logger,
  });

  const steps: ReplayStepResult[] = [];
  const touched = new Set<number>();

  file.operations.forEach((step, index) => {
    if (step.height !== undefined) {
      try {
        clock.set(step.height);
      } catch (err) {
        throw new CliInputError(
          `operations.${index}.height: ${err instanceof Error ? err.message : 'invalid height'}`
        );
      }
    }
    if ('project_id' in step) touched.add(step.project_id);

    let result: LedgerResult<unknown>;
    try {
      result = applyOperation(ledger, step);
    } catch (err) {
      if (err instanceof CommitmentEncodingError) {
        throw new CliInputError(`operations.${index}: ${err.message}`);
      }
      throw err;
    }

    steps.push(
      result.ok
        ? { index, op: step.op, height: clock.currentHeight(), ok: true }
        : {
            index,
            op: step.op,
            height: clock.currentHeight(),
            ok: false,
            reason_code: result.error.code,
            reason: result.error.message,
          }
    );

    clock.advance();
  });

  return {
    steps,
    rejected: steps.filter((s) => !s.ok).length,
    finalState: {
      admin: ledger.getAdmin(),
      paused: ledger.isPaused(),
      height: clock.currentHeight(),
      projects: snapshotProjects(
        ledger,
        [...touched].filter((id) => ledger.hasProject(id)).sort((a, b) => a - b)
      ),
    },
  };
}
