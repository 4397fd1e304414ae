import * as fs from 'node:fs/promises';

import {
  LedgerConfigError,
  parseLedgerConfig,
  readLedgerEnv,
  type BidLedgerConfig,
  type BidLedgerConfigInput,
} from '@bidledger/ledger';

import type { BidLedgerCliConfigV1 } from './types.js';

export const DEFAULT_CLI_ADMIN = 'admin';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new CliConfigError(`Config field ${field} must be a number`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new CliConfigError(`Config field ${field} must be a string`);
  }
  return value;
}

export class CliConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
  }
}

export async function loadCliConfigFile(path: string): Promise<BidLedgerCliConfigV1> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new CliConfigError(
      `Could not read config file at ${path}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CliConfigError(
      `Config file is not valid JSON: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }

  if (!isRecord(parsed) || parsed.config_version !== '1') {
    throw new CliConfigError('Config must be an object with {"config_version":"1", ... }');
  }

  return {
    config_version: '1',
    admin: optionalString(parsed.admin, 'admin'),
    max_bids_per_project: optionalNumber(parsed.max_bids_per_project, 'max_bids_per_project'),
    max_description_length: optionalNumber(parsed.max_description_length, 'max_description_length'),
    log_level: optionalString(parsed.log_level, 'log_level'),
    start_height: optionalNumber(parsed.start_height, 'start_height'),
  };
}

export interface ResolvedCliConfig {
  ledger: BidLedgerConfig;
  startHeight: number;
}

/**
 * File values first, then `BID_LEDGER_*` environment variables on top.
 */
export async function resolveCliConfig(opts: {
  configPath?: string;
  env?: Record<string, string | undefined>;
}): Promise<ResolvedCliConfig> {
  const file = opts.configPath ? await loadCliConfigFile(opts.configPath) : null;

  const fromFile: Partial<BidLedgerConfigInput> = {};
  if (file?.admin !== undefined) fromFile.admin = file.admin;
  if (file?.max_bids_per_project !== undefined) {
    fromFile.maxBidsPerProject = file.max_bids_per_project;
  }
  if (file?.max_description_length !== undefined) {
    fromFile.maxDescriptionLength = file.max_description_length;
  }

  try {
    const fromEnv = readLedgerEnv(opts.env ?? process.env);
    const ledger = parseLedgerConfig({
      admin: DEFAULT_CLI_ADMIN,
      ...fromFile,
      logLevel: file?.log_level,
      ...fromEnv,
    });
    return { ledger, startHeight: file?.start_height ?? 0 };
  } catch (err) {
    if (err instanceof LedgerConfigError) {
      throw new CliConfigError(err.message);
    }
    throw err;
  }
}
