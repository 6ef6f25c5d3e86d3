import type { JsonObject, RecordKind } from '../record_store/record_store.types';

export const CACHE_FORMAT_VERSION = 1;

/**
 * Derived projection of exactly one canonical record.
 */
export type CacheRow = {
  /** `<collection>/<id>`, unique across the cache */
  key: string;
  collection: string;
  kind: RecordKind;
  id: string;
  /** The payload's `status` when it is a string */
  status: string | null;
  payload: JsonObject;
  updatedAt: string | null;
  contentHash: string;
};

export type CacheIndices = {
  countsByKind: Record<string, number>;
  /** kind -> status -> count */
  countsByStatus: Record<string, Record<string, number>>;
};

/**
 * Whole content of the derived cache. Rows are sorted by collection, then id.
 */
export type CacheSnapshot = {
  formatVersion: number;
  /** CanonicalFingerprint of the RecordStore the rows were derived from */
  fingerprint: string;
  generatedAt: string;
  rows: CacheRow[];
  indices: CacheIndices;
};

export type RowFilter = {
  kind?: RecordKind;
  collection?: string;
  status?: string;
};

/**
 * IRecordProjection - storage for the derived cache.
 *
 * `persist` replaces the whole snapshot at once; readers never see a mix of
 * two snapshots. Only the Reconciler holds a reference that writes.
 */
export interface IRecordProjection {
  persist(snapshot: CacheSnapshot): Promise<void>;

  /**
   * @returns null when no cache has been written
   * @throws CacheCorruptionError when the stored cache is unreadable or inconsistent
   */
  read(): Promise<CacheSnapshot | null>;

  exists(): Promise<boolean>;

  clear(): Promise<void>;
}
