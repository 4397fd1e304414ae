import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';

import { CliConfigError, loadCliConfigFile, resolveCliConfig } from '../src/index.js';

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe('loadCliConfigFile', () => {
  it('reads a v1 config', async () => {
    expect(await loadCliConfigFile(fixture('ledger.config.json'))).toEqual({
      config_version: '1',
      admin: 'agency',
      max_bids_per_project: 1,
      max_description_length: undefined,
      log_level: undefined,
      start_height: 100,
    });
  });

  it('rejects files without config_version 1', async () => {
    await expect(loadCliConfigFile(fixture('tender.json'))).rejects.toThrow(
      'Config must be an object with {"config_version":"1", ... }'
    );
  });

  it('rejects unreadable files', async () => {
    await expect(loadCliConfigFile(fixture('missing.json'))).rejects.toThrow(CliConfigError);
  });
});

describe('resolveCliConfig', () => {
  it('uses built-in defaults without a file', async () => {
    expect(await resolveCliConfig({ env: {} })).toEqual({
      ledger: {
        admin: 'admin',
        maxBidsPerProject: 50,
        maxDescriptionLength: 500,
        logLevel: 'warn',
      },
      startHeight: 0,
    });
  });

  it('overlays environment variables on the file', async () => {
    const resolved = await resolveCliConfig({
      configPath: fixture('ledger.config.json'),
      env: { BID_LEDGER_MAX_BIDS: '4', BID_LEDGER_LOG_LEVEL: 'error' },
    });
    expect(resolved).toEqual({
      ledger: {
        admin: 'agency',
        maxBidsPerProject: 4,
        maxDescriptionLength: 500,
        logLevel: 'error',
      },
      startHeight: 100,
    });
  });

  it('wraps invalid settings in CliConfigError', async () => {
    await expect(resolveCliConfig({ env: { BID_LEDGER_MAX_BIDS: '0' } })).rejects.toThrow(
      CliConfigError
    );
    await expect(resolveCliConfig({ env: { BID_LEDGER_LOG_LEVEL: 'loud' } })).rejects.toThrow(
      CliConfigError
    );
  });
});
