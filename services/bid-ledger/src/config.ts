import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';

export const DEFAULT_MAX_BIDS_PER_PROJECT = 50;
export const DEFAULT_MAX_DESCRIPTION_LENGTH = 500;

const LogLevelSchema = z.enum(LOG_LEVELS);

export const BidLedgerConfigSchema = z.object({
  admin: z.string().min(1),
  maxBidsPerProject: z.number().int().positive().default(DEFAULT_MAX_BIDS_PER_PROJECT),
  maxDescriptionLength: z.number().int().positive().default(DEFAULT_MAX_DESCRIPTION_LENGTH),
  logLevel: LogLevelSchema.default('warn'),
});

export type BidLedgerConfig = z.infer<typeof BidLedgerConfigSchema>;
export type BidLedgerConfigInput = z.input<typeof BidLedgerConfigSchema>;

export class LedgerConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'LedgerConfigError';
  }
}

export function parseLedgerConfig(input: unknown): BidLedgerConfig {
  const result = BidLedgerConfigSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LedgerConfigError(`Invalid ledger config: ${summary}`, result.error.issues);
  }
  return result.data;
}

function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new LedgerConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Environment overlay. Unset variables are left out so file or code
 * defaults still apply.
 */
export function readLedgerEnv(
  env: Record<string, string | undefined>
): Partial<BidLedgerConfigInput> {
  const out: Partial<BidLedgerConfigInput> = {};

  const admin = env.BID_LEDGER_ADMIN?.trim();
  if (admin) out.admin = admin;

  const maxBids = parseIntegerEnv('BID_LEDGER_MAX_BIDS', env.BID_LEDGER_MAX_BIDS);
  if (maxBids !== undefined) out.maxBidsPerProject = maxBids;

  const maxDescription = parseIntegerEnv(
    'BID_LEDGER_MAX_DESCRIPTION',
    env.BID_LEDGER_MAX_DESCRIPTION
  );
  if (maxDescription !== undefined) out.maxDescriptionLength = maxDescription;

  const logLevel = env.BID_LEDGER_LOG_LEVEL?.trim();
  if (logLevel) {
    const parsed = LogLevelSchema.safeParse(logLevel);
    if (!parsed.success) {
      throw new LedgerConfigError(
        `BID_LEDGER_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`
      );
    }
    out.logLevel = parsed.data;
  }

  return out;
}

export function loadLedgerConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): BidLedgerConfig {
  return parseLedgerConfig(readLedgerEnv(env));
}
