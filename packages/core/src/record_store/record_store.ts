import type {
  RecordFile,
  RecordInput,
  RecordKind,
  RecordStoreSnapshot,
} from './record_store.types';

/**
 * RecordStore - the durable, human-editable record set.
 *
 * Owns all truth. Only the orchestrator writes to it, one record at a time;
 * workers and the derived cache never do.
 */
export interface RecordStore {
  /**
   * Parses every collection.
   * @throws RecordParseError naming the first malformed file; nothing is returned partially
   */
  load(): Promise<RecordStoreSnapshot>;

  /**
   * Raw contents of every collection file, for the validation gate.
   */
  readFiles(): Promise<RecordFile[]>;

  /**
   * Inserts or replaces one record. The collection file is rewritten atomically.
   */
  putRecord(kind: RecordKind, record: RecordInput): Promise<void>;

  /**
   * Removes one record.
   * @returns false when no record with that id existed
   */
  deleteRecord(kind: RecordKind, id: string): Promise<boolean>;
}
