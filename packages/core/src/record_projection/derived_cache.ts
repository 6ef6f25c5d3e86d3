import type { RecordKind } from '../record_store/record_store.types';
import type { CacheRow, CacheSnapshot, IRecordProjection, RowFilter } from './record_projection.types';

/**
 * DerivedCache - read-only query view over the cache storage.
 *
 * There is no write method here: rows are created and destroyed by the
 * Reconciler only.
 */
export class DerivedCache {
  constructor(private readonly projection: IRecordProjection) {}

  async getSnapshot(): Promise<CacheSnapshot | null> {
    return this.projection.read();
  }

  async getFingerprint(): Promise<string | null> {
    const snapshot = await this.projection.read();
    return snapshot?.fingerprint ?? null;
  }

  async listRows(filter: RowFilter = {}): Promise<CacheRow[]> {
    const snapshot = await this.projection.read();
    if (!snapshot) return [];

    return snapshot.rows.filter(
      (row) =>
        (filter.kind === undefined || row.kind === filter.kind) &&
        (filter.collection === undefined || row.collection === filter.collection) &&
        (filter.status === undefined || row.status === filter.status),
    );
  }

  async getRow(kind: RecordKind, id: string): Promise<CacheRow | null> {
    const rows = await this.listRows({ kind });
    return rows.find((row) => row.id === id) ?? null;
  }

  /**
   * Counts rows of one kind grouped by a payload field.
   * Rows without a scalar value for the field are not counted.
   */
  async countBy(kind: RecordKind, field: string): Promise<Record<string, number>> {
    if (field === 'status') {
      const snapshot = await this.projection.read();
      return { ...snapshot?.indices.countsByStatus[kind] };
    }

    const counts: Record<string, number> = {};
    for (const row of await this.listRows({ kind })) {
      const value = row.payload[field];
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        const bucket = String(value);
        counts[bucket] = (counts[bucket] ?? 0) + 1;
      }
    }
    return counts;
  }
}
