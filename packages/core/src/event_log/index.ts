export type {
  IEventLog,
  LogEvent,
  EventKind,
  EventOrigin,
  EventQuery,
  ImportedEventsResult,
} from './event_log.types';
export { EVENT_KINDS } from './event_log.types';
export { BaseEventLog, originKey } from './base_event_log';
export type { EventLogOptions } from './base_event_log';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsEventLog
// - @hivekeep/core/memory -> MemoryEventLog
