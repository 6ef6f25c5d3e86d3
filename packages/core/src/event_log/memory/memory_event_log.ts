import { BaseEventLog } from '../base_event_log';
import type { LogEvent } from '../event_log.types';

/**
 * MemoryEventLog - In-memory IEventLog for testing.
 */
export class MemoryEventLog extends BaseEventLog {
  private events: LogEvent[] = [];
  private highWater = 0;

  protected async readAll(): Promise<LogEvent[]> {
    return [...this.events];
  }

  protected async appendEvents(events: LogEvent[]): Promise<void> {
    this.events.push(...events);
  }

  protected async replaceAll(events: LogEvent[]): Promise<void> {
    this.events = [...events];
  }

  protected async readHighWater(): Promise<number> {
    return this.highWater;
  }

  protected async writeHighWater(sequenceNo: number): Promise<void> {
    this.highWater = sequenceNo;
  }

  protected async removeAll(): Promise<void> {
    this.events = [];
    this.highWater = 0;
  }
}
