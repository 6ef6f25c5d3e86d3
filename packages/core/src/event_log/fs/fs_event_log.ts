import * as fs from 'fs/promises';
import * as path from 'path';
import { BaseEventLog } from '../base_event_log';
import type { EventLogOptions } from '../base_event_log';
import type { LogEvent } from '../event_log.types';
import { CacheCorruptionError } from '../../record_projection/record_projection.errors';
import { SchemaValidationCache } from '../../validation/schema_cache';
import { readFileIfExists, writeFileAtomic } from '../../utils/atomic_write';

export type FsEventLogOptions = EventLogOptions & {
  /** Cache directory, usually `.ai_runtime/cache` */
  basePath: string;
};

/**
 * FsEventLog - one JSON event per line in `events.jsonl`.
 *
 * Appends go to the end of the file; purge rewrites it atomically.
 * `events.meta.json` keeps the highest sequence number handed out.
 */
export class FsEventLog extends BaseEventLog {
  private readonly logPath: string;
  private readonly metaPath: string;

  constructor(options: FsEventLogOptions) {
    super(options);
    this.logPath = path.join(options.basePath, 'events.jsonl');
    this.metaPath = path.join(options.basePath, 'events.meta.json');
  }

  protected async readAll(): Promise<LogEvent[]> {
    const content = await readFileIfExists(this.logPath);
    if (content === null) {
      return [];
    }
    const validate = SchemaValidationCache.getValidator<LogEvent>('event');

    const events: LogEvent[] = [];
    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new CacheCorruptionError(this.logPath, `line ${index + 1} is not valid JSON`);
      }
      if (!validate(parsed)) {
        throw new CacheCorruptionError(this.logPath, `line ${index + 1} is not a valid event`);
      }
      events.push(parsed);
    }
    return events;
  }

  protected async appendEvents(events: LogEvent[]): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.appendFile(this.logPath, events.map((e) => `${JSON.stringify(e)}\n`).join(''), 'utf-8');
  }

  protected async replaceAll(events: LogEvent[]): Promise<void> {
    await writeFileAtomic(this.logPath, events.map((e) => `${JSON.stringify(e)}\n`).join(''));
  }

  protected async readHighWater(): Promise<number> {
    const content = await readFileIfExists(this.metaPath);
    if (content === null) {
      return 0;
    }
    try {
      const meta: unknown = JSON.parse(content);
      if (typeof meta === 'object' && meta !== null && 'lastSequence' in meta && typeof meta.lastSequence === 'number') {
        return meta.lastSequence;
      }
    } catch {
      throw new CacheCorruptionError(this.metaPath, 'not valid JSON');
    }
    throw new CacheCorruptionError(this.metaPath, "missing numeric 'lastSequence'");
  }

  protected async writeHighWater(sequenceNo: number): Promise<void> {
    await writeFileAtomic(this.metaPath, JSON.stringify({ lastSequence: sequenceNo }));
  }

  protected async removeAll(): Promise<void> {
    await fs.rm(this.logPath, { force: true });
    await fs.rm(this.metaPath, { force: true });
  }
}
