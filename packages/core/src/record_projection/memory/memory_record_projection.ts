import type { CacheSnapshot, IRecordProjection } from '../record_projection.types';
import { assertCacheSnapshot } from '../cache_indices';

/**
 * MemoryRecordProjection - In-memory IRecordProjection for testing.
 *
 * Keeps the snapshot as serialized JSON so reads go through the same
 * corruption checks as the filesystem variant.
 */
export class MemoryRecordProjection implements IRecordProjection {
  private stored: string | null = null;

  async persist(snapshot: CacheSnapshot): Promise<void> {
    this.stored = JSON.stringify(snapshot);
  }

  async read(): Promise<CacheSnapshot | null> {
    if (this.stored === null) {
      return null;
    }
    return assertCacheSnapshot(JSON.parse(this.stored), 'memory');
  }

  async exists(): Promise<boolean> {
    return this.stored !== null;
  }

  async clear(): Promise<void> {
    this.stored = null;
  }

  // ==================== Test Helpers ====================

  /**
   * Overwrites the stored snapshot with arbitrary JSON, bypassing persist().
   */
  setRaw(value: unknown): void {
    this.stored = JSON.stringify(value);
  }
}
