/**
 * Audit sinks for ledger events.
 */

import { v4 as uuidv4 } from 'uuid';

import type {
  AuditEvent,
  AuditSink,
  Identity,
  LedgerOperation,
  Logger,
  ProjectId,
} from './types.js';

export function buildAuditEvent(params: {
  operation: LedgerOperation;
  projectId: ProjectId | null;
  caller: Identity;
  height: number;
  now?: () => Date;
}): AuditEvent {
  const now = params.now ?? (() => new Date());
  return {
    event_id: `evt_${uuidv4()}`,
    operation: params.operation,
    project_id: params.projectId,
    caller: params.caller,
    height: params.height,
    outcome: 'accepted',
    recorded_at: now().toISOString(),
  };
}

/**
 * Append-only in-memory log (for testing and local runs).
 */
export class MemoryAuditLog implements AuditSink {
  private events: AuditEvent[] = [];

  append(event: AuditEvent): void {
    this.events.push({ ...event });
  }

  entries(): AuditEvent[] {
    return this.events.map((e) => ({ ...e }));
  }

  /** Clear all events (for testing) */
  clear(): void {
    this.events = [];
  }
}

/**
 * Writes each event as one JSON line at info level.
 */
export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  append(event: AuditEvent): void {
    this.logger.info(JSON.stringify(event));
  }
}
