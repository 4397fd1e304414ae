/**
 * @bidledger/ledger
 *
 * Sealed-bid commit-reveal ledger for competitive procurement.
 */

export { BidLedger, bidKey, projectKey } from './bid-ledger.js';
export type { BidLedgerOptions, BidLedgerStores } from './bid-ledger.js';
export { BidLedgerError, ok, fail, unwrapResult } from './errors.js';
export { BoundedList, BoundedListOverflowError } from './bounded-list.js';
export { MemoryKeyValueStore } from './stores/memory-store.js';
export { ManualHeightSource } from './height.js';
export { MemoryAuditLog, LoggerAuditSink, buildAuditEvent } from './audit.js';
export { createConsoleLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { LogLevel, ConsoleLoggerOptions } from './logger.js';
export {
  BidLedgerConfigSchema,
  DEFAULT_MAX_BIDS_PER_PROJECT,
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  LedgerConfigError,
  parseLedgerConfig,
  readLedgerEnv,
  loadLedgerConfigFromEnv,
} from './config.js';
export type { BidLedgerConfig, BidLedgerConfigInput } from './config.js';
export type {
  AccessControlState,
  AmountInput,
  AuditEvent,
  AuditSink,
  BidHeader,
  ProjectBidList,
  BidLedgerErrorCode,
  BidRecord,
  HeightSource,
  Identity,
  KeyValueStore,
  LedgerFailure,
  LedgerOperation,
  LedgerResult,
  Logger,
  ProjectId,
} from './types.js';
