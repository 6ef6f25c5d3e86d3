import { computeCanonicalFingerprint } from '../crypto/checksum';
import { createLogger } from '../logger';
import { DerivedCache } from '../record_projection/derived_cache';
import { buildIndices, indicesMatchRows } from '../record_projection/cache_indices';
import { CacheCorruptionError } from '../record_projection/record_projection.errors';
import { CACHE_FORMAT_VERSION } from '../record_projection/record_projection.types';
import type { CacheSnapshot, IRecordProjection } from '../record_projection/record_projection.types';
import type { RecordStore } from '../record_store/record_store';
import { RecordParseError } from '../record_store/record_store.errors';
import type { RecordStoreSnapshot } from '../record_store/record_store.types';
import { SchemaRecordValidator } from '../validation/record_validator';
import type { RecordValidator } from '../validation/record_validator';
import { ValidationFailedError } from '../validation/validation.errors';
import { systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { deriveRows } from './derive_rows';
import { ReconcileError } from './reconciler.errors';

const logger = createLogger('[Reconciler] ');

export type ReconcilerDependencies = {
  recordStore: RecordStore;
  projection: IRecordProjection;
  validator?: RecordValidator;
  clock?: Clock;
};

export type ReconcileResult = {
  snapshot: CacheSnapshot;
  rowCount: number;
  fingerprint: string;
  /** False when the rows are identical to the ones already cached */
  changed: boolean;
};

/**
 * Reconciler - the only writer of the derived cache.
 *
 * Every rebuild is full: all rows are re-derived from the RecordStore and
 * the snapshot replaces the previous one in a single persist. The event
 * log is not touched. Disagreement between store and cache always ends
 * with the store's content in the cache.
 */
export class Reconciler {
  private readonly recordStore: RecordStore;
  private readonly projection: IRecordProjection;
  private readonly validator: RecordValidator;
  private readonly clock: Clock;
  private readonly derivedCache: DerivedCache;

  constructor(deps: ReconcilerDependencies) {
    this.recordStore = deps.recordStore;
    this.projection = deps.projection;
    this.validator = deps.validator ?? new SchemaRecordValidator();
    this.clock = deps.clock ?? systemClock;
    this.derivedCache = new DerivedCache(deps.projection);
  }

  get cache(): DerivedCache {
    return this.derivedCache;
  }

  /**
   * Rebuilds the cache from the RecordStore.
   * @throws ReconcileError when the store fails validation or parsing; the prior cache is kept
   */
  async reconcile(): Promise<ReconcileResult> {
    const store = await this.loadValidStore();
    const fingerprint = computeCanonicalFingerprint(store);
    const rows = deriveRows(store);
    const snapshot: CacheSnapshot = {
      formatVersion: CACHE_FORMAT_VERSION,
      fingerprint,
      generatedAt: this.clock().toISOString(),
      rows,
      indices: buildIndices(rows),
    };

    const previous = await this.readPreviousQuietly();
    const changed = previous === null || JSON.stringify(previous.rows) !== JSON.stringify(rows);

    await this.projection.persist(snapshot);
    logger.info(`Reconciled ${rows.length} row(s)${changed ? '' : ' (unchanged)'}`);

    return { snapshot, rowCount: rows.length, fingerprint, changed };
  }

  /**
   * CanonicalFingerprint of the RecordStore as it is now.
   * @throws ReconcileError when the store fails validation or parsing
   */
  async currentFingerprint(): Promise<string> {
    return computeCanonicalFingerprint(await this.loadValidStore());
  }

  /**
   * Installs a snapshot built elsewhere (an imported derived summary).
   *
   * @returns false, leaving the cache untouched, unless the snapshot's
   * fingerprint equals the current store's and its indices and row count
   * agree with its rows
   */
  async installSnapshot(snapshot: CacheSnapshot): Promise<boolean> {
    const store = await this.loadValidStore();
    const fingerprint = computeCanonicalFingerprint(store);

    if (snapshot.fingerprint !== fingerprint) {
      logger.info(`Snapshot fingerprint ${snapshot.fingerprint.slice(0, 12)} does not match store ${fingerprint.slice(0, 12)}`);
      return false;
    }
    if (snapshot.formatVersion !== CACHE_FORMAT_VERSION || !indicesMatchRows(snapshot)) {
      logger.info('Snapshot indices are inconsistent with its rows');
      return false;
    }
    const recordCount = store.collections.reduce((sum, c) => sum + c.records.length, 0);
    if (snapshot.rows.length !== recordCount) {
      logger.info(`Snapshot has ${snapshot.rows.length} row(s) for ${recordCount} record(s)`);
      return false;
    }

    await this.projection.persist(snapshot);
    return true;
  }

  /**
   * Disaster recovery: drops the cache storage and rebuilds it.
   */
  async recover(): Promise<ReconcileResult> {
    logger.warn('Recovering derived cache: deleting and rebuilding from RecordStore');
    await this.projection.clear();
    return this.reconcile();
  }

  private async loadValidStore(): Promise<RecordStoreSnapshot> {
    const report = await this.validator.validate(await this.recordStore.readFiles());
    if (!report.valid) {
      const error = new ValidationFailedError(report.errors);
      throw new ReconcileError(error.message, report.errors[0]?.file ?? null, error);
    }

    try {
      return await this.recordStore.load();
    } catch (error) {
      if (error instanceof RecordParseError) {
        throw new ReconcileError(error.message, error.file, error);
      }
      throw error;
    }
  }

  private async readPreviousQuietly(): Promise<CacheSnapshot | null> {
    try {
      return await this.projection.read();
    } catch (error) {
      if (error instanceof CacheCorruptionError) {
        logger.warn(`Replacing corrupted cache: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
