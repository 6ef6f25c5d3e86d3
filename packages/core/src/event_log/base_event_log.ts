import type { JsonObject } from '../record_store/record_store.types';
import { createLogger } from '../logger';
import { systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import type {
  EventKind,
  EventQuery,
  IEventLog,
  ImportedEventsResult,
  LogEvent,
} from './event_log.types';

const logger = createLogger('[EventLog] ');

const DAY_MS = 24 * 60 * 60 * 1000;

export type EventLogOptions = {
  /** Stamped as origin on locally appended events */
  projectId: string;
  clock?: Clock;
};

export function originKey(event: LogEvent): string {
  return `${event.origin.projectId}\u0000${event.origin.sequenceNo}`;
}

/**
 * Shared append/import/purge logic. Subclasses only store events.
 *
 * The highest sequence number ever handed out is kept apart from the
 * events, so a purge that empties the log does not reuse numbers.
 */
export abstract class BaseEventLog implements IEventLog {
  protected readonly projectId: string;
  protected readonly clock: Clock;

  constructor(options: EventLogOptions) {
    this.projectId = options.projectId;
    this.clock = options.clock ?? systemClock;
  }

  protected abstract readAll(): Promise<LogEvent[]>;
  protected abstract appendEvents(events: LogEvent[]): Promise<void>;
  protected abstract replaceAll(events: LogEvent[]): Promise<void>;
  protected abstract readHighWater(): Promise<number>;
  protected abstract writeHighWater(sequenceNo: number): Promise<void>;
  protected abstract removeAll(): Promise<void>;

  async append(kind: EventKind, payload: JsonObject = {}): Promise<LogEvent> {
    const sequenceNo = (await this.lastSequence()) + 1;
    const event: LogEvent = {
      sequenceNo,
      timestamp: this.clock().toISOString(),
      kind,
      payload,
      origin: { projectId: this.projectId, sequenceNo },
    };
    await this.appendEvents([event]);
    logger.debug(`#${sequenceNo} ${kind}`);
    return event;
  }

  async appendImported(events: LogEvent[]): Promise<ImportedEventsResult> {
    const existing = await this.readAll();
    const seen = new Set(existing.map(originKey));
    let next = Math.max(await this.readHighWater(), existing.at(-1)?.sequenceNo ?? 0);

    const accepted: LogEvent[] = [];
    for (const event of events) {
      const key = originKey(event);
      if (seen.has(key)) continue;
      seen.add(key);
      next += 1;
      accepted.push({ ...event, sequenceNo: next });
    }

    if (accepted.length > 0) {
      await this.appendEvents(accepted);
    }
    return { imported: accepted.length, skipped: events.length - accepted.length };
  }

  async list(query: EventQuery = {}): Promise<LogEvent[]> {
    const { sinceSequence, kinds, limit } = query;
    const matching = (await this.readAll()).filter(
      (event) =>
        (sinceSequence === undefined || event.sequenceNo > sinceSequence) &&
        (kinds === undefined || kinds.includes(event.kind)),
    );
    return limit === undefined ? matching : matching.slice(Math.max(0, matching.length - limit));
  }

  async lastSequence(): Promise<number> {
    const events = await this.readAll();
    return Math.max(await this.readHighWater(), events.at(-1)?.sequenceNo ?? 0);
  }

  async purgeOlderThan(days: number): Promise<number> {
    const cutoff = this.clock().getTime() - days * DAY_MS;
    const events = await this.readAll();
    const kept = events.filter((event) => Date.parse(event.timestamp) >= cutoff);
    const removed = events.length - kept.length;

    if (removed > 0) {
      await this.writeHighWater(await this.lastSequence());
      await this.replaceAll(kept);
      logger.info(`Purged ${removed} event(s) older than ${days} day(s)`);
    }
    return removed;
  }

  async clear(): Promise<void> {
    await this.removeAll();
  }
}
