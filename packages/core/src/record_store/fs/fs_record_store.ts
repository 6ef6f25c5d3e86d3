import * as path from 'path';
import { TextRecordStore } from '../base_record_store';
import { readFileIfExists, writeFileAtomic } from '../../utils/atomic_write';
import type { Clock } from '../../utils/clock';

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions {
  /** Directory holding the collection files (usually `.ai/state`) */
  basePath: string;
  clock?: Clock;
}

/**
 * FsRecordStore - YAML files on disk.
 *
 * @example
 * const store = new FsRecordStore({ basePath: '/repo/.ai/state' });
 * const snapshot = await store.load();
 * await store.putRecord('task', { id: 'T-1', payload: { title: 'Write docs', status: 'backlog' } });
 */
export class FsRecordStore extends TextRecordStore {
  private readonly basePath: string;

  constructor(options: FsRecordStoreOptions) {
    super(options.clock);
    this.basePath = options.basePath;
  }

  protected async readText(file: string): Promise<string | null> {
    return readFileIfExists(path.join(this.basePath, file));
  }

  protected async writeText(file: string, content: string): Promise<void> {
    await writeFileAtomic(path.join(this.basePath, file), content);
  }
}
