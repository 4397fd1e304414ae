import { CommitmentEncodingError } from '@bidledger/commitment';

import { parseCliArgs } from './args.js';
import { runCommit, runVerify } from './commit.js';
import { CliConfigError, resolveCliConfig } from './config.js';
import { CliInputError, CliUsageError } from './errors.js';
import { explainReasonCode, hintForReasonCode } from './hints.js';
import { loadReplayFile, replayOperations } from './replay.js';
import type { CliErrorOutput, CliOutput, CliReplayOutput } from './types.js';

export const CLI_VERSION = '0.1.0';

export interface CliRunDeps {
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

export interface CliRunResult {
  /** JSON output, or plain text for `version` and `explain`. */
  output: CliOutput | string;
  exitCode: number;
}

export function exitCodeForOutput(out: CliOutput): number {
  if (out.status === 'PASS') return 0;
  if (out.status === 'FAIL') return 1;
  return 2;
}

function errorOutput(code: string, reason: string, now: () => Date): CliErrorOutput {
  return {
    status: 'ERROR',
    generated_at: now().toISOString(),
    reason_code: code,
    reason,
    hint: hintForReasonCode(code),
  };
}

async function dispatch(argv: string[], deps: Required<CliRunDeps>): Promise<CliRunResult> {
  const parsed = parseCliArgs(argv);

  switch (parsed.command) {
    case 'version':
      return { output: `bidledger ${CLI_VERSION}`, exitCode: 0 };

    case 'explain':
      return { output: explainReasonCode(parsed.code), exitCode: 0 };

    case 'commit': {
      const out = runCommit(parsed.content, deps.now);
      return { output: out, exitCode: exitCodeForOutput(out) };
    }

    case 'verify': {
      const out = runVerify(parsed.content, parsed.commitmentHex, deps.now);
      return { output: out, exitCode: exitCodeForOutput(out) };
    }

    case 'replay': {
      const config = await resolveCliConfig({ configPath: parsed.configPath, env: deps.env });
      const file = await loadReplayFile(parsed.inputPath);
      const report = replayOperations(file, config);
      const failed = parsed.strict && report.rejected > 0;

      const out: CliReplayOutput = {
        status: failed ? 'FAIL' : 'PASS',
        generated_at: deps.now().toISOString(),
        reason_code: failed ? 'OPERATION_REJECTED' : 'OK',
        reason: `${report.steps.length} operations applied, ${report.rejected} rejected`,
        command: 'replay',
        input: { path: parsed.inputPath, config_path: parsed.configPath, strict: parsed.strict },
        rejected: report.rejected,
        steps: report.steps,
        final_state: report.finalState,
      };
      return { output: out, exitCode: exitCodeForOutput(out) };
    }
  }
}

/**
 * Run one CLI invocation. Never throws for user errors: they come back as an
 * ERROR output with exit code 2.
 */
export async function runCli(argv: string[], deps: CliRunDeps = {}): Promise<CliRunResult> {
  const now = deps.now ?? (() => new Date());
  const env = deps.env ?? process.env;

  try {
    return await dispatch(argv, { env, now });
  } catch (err: unknown) {
    if (err instanceof CliUsageError) {
      return { output: errorOutput('USAGE_ERROR', err.message, now), exitCode: 2 };
    }
    if (err instanceof CliConfigError) {
      return { output: errorOutput('CONFIG_ERROR', err.message, now), exitCode: 2 };
    }
    if (err instanceof CliInputError) {
      return { output: errorOutput('INVALID_INPUT', err.message, now), exitCode: 2 };
    }
    if (err instanceof CommitmentEncodingError) {
      return { output: errorOutput(err.code, err.message, now), exitCode: 2 };
    }
    return {
      output: errorOutput(
        'INTERNAL_ERROR',
        err instanceof Error ? err.message : 'unknown error',
        now
      ),
      exitCode: 2,
    };
  }
}
