export { parseCliArgs, usageText } from './args.js';
export type { ParsedArgs, BidContentArgs } from './args.js';
export { runCli, exitCodeForOutput, CLI_VERSION } from './run.js';
export type { CliRunDeps, CliRunResult } from './run.js';
export { runCommit, runVerify, parseAmountArg } from './commit.js';
export {
  replayOperations,
  parseReplayFile,
  loadReplayFile,
  ReplayFileSchema,
  ReplayOperationSchema,
} from './replay.js';
export type { ReplayFile, ReplayOperation, ReplayReport } from './replay.js';
export { resolveCliConfig, loadCliConfigFile, CliConfigError, DEFAULT_CLI_ADMIN } from './config.js';
export type { ResolvedCliConfig } from './config.js';
export { CliUsageError, CliInputError } from './errors.js';
export { hintForReasonCode, explainReasonCode } from './hints.js';
export type {
  CliOutput,
  CliCommitOutput,
  CliReplayOutput,
  CliErrorOutput,
  CliStatus,
  BidLedgerCliConfigV1,
} from './types.js';
