import type { JsonObject } from '../record_store/record_store.types';

export const EVENT_KINDS = [
  'init',
  'command_run',
  'task_transition',
  'approval',
  'import',
  'export',
  'worker_checkpoint',
  'worker_stall',
  'worker_resume',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/**
 * Identity of an event across machines: the project that first appended it
 * and the sequence number it got there.
 */
export type EventOrigin = {
  projectId: string;
  sequenceNo: number;
};

export type LogEvent = {
  /** Local, strictly increasing */
  sequenceNo: number;
  timestamp: string;
  kind: EventKind;
  payload: JsonObject;
  origin: EventOrigin;
};

export type EventQuery = {
  /** Only events with a greater sequence number */
  sinceSequence?: number;
  kinds?: EventKind[];
  /** Keep the last N matching events */
  limit?: number;
};

export type ImportedEventsResult = {
  imported: number;
  skipped: number;
};

/**
 * IEventLog - append-only ledger of typed events.
 *
 * Single appender only. Events are never updated; they leave the log only
 * through purgeOlderThan or clear.
 */
export interface IEventLog {
  append(kind: EventKind, payload?: JsonObject): Promise<LogEvent>;

  /**
   * Appends events from another log, renumbered locally with their origin
   * kept. Events whose origin is already present are skipped.
   */
  appendImported(events: LogEvent[]): Promise<ImportedEventsResult>;

  list(query?: EventQuery): Promise<LogEvent[]>;

  /** 0 for a log that never held an event */
  lastSequence(): Promise<number>;

  /** @returns number of events removed */
  purgeOlderThan(days: number): Promise<number>;

  clear(): Promise<void>;
}
