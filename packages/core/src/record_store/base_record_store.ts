import type { RecordStore } from './record_store';
import type {
  CanonicalRecord,
  RecordCollection,
  RecordFile,
  RecordInput,
  RecordKind,
  RecordStoreSnapshot,
} from './record_store.types';
import { RECORD_COLLECTIONS, collectionForKind } from './record_store.types';
import { parseCollection, serializeCollection } from './record_codec';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';

/**
 * Shared load/put/delete logic over a "file name → text" backend.
 * Subclasses only decide where the text lives.
 */
export abstract class TextRecordStore implements RecordStore {
  protected readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  protected abstract readText(file: string): Promise<string | null>;
  protected abstract writeText(file: string, content: string): Promise<void>;

  async load(): Promise<RecordStoreSnapshot> {
    const files = await this.readFiles();
    const collections: RecordCollection[] = RECORD_COLLECTIONS.map((spec, i) =>
      parseCollection(spec, files[i]?.content ?? null),
    );
    return { collections };
  }

  async readFiles(): Promise<RecordFile[]> {
    const files: RecordFile[] = [];
    for (const spec of RECORD_COLLECTIONS) {
      files.push({ file: spec.file, content: await this.readText(spec.file) });
    }
    return files;
  }

  async putRecord(kind: RecordKind, input: RecordInput): Promise<void> {
    const collection = await this.loadCollection(kind);
    const record: CanonicalRecord = {
      id: input.id,
      kind,
      payload: input.payload,
      updatedAt: input.updatedAt ?? this.clock().toISOString(),
    };

    const index = collection.records.findIndex((r) => r.id === input.id);
    if (index === -1) {
      collection.records.push(record);
    } else {
      collection.records[index] = record;
    }
    await this.writeText(collection.spec.file, serializeCollection(collection));
  }

  async deleteRecord(kind: RecordKind, id: string): Promise<boolean> {
    const collection = await this.loadCollection(kind);
    const remaining = collection.records.filter((r) => r.id !== id);
    if (remaining.length === collection.records.length) {
      return false;
    }
    await this.writeText(collection.spec.file, serializeCollection({ ...collection, records: remaining }));
    return true;
  }

  private async loadCollection(kind: RecordKind): Promise<RecordCollection> {
    const spec = collectionForKind(kind);
    return parseCollection(spec, await this.readText(spec.file));
  }
}
