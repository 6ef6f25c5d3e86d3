import { canonicalize } from '../crypto/checksum';
import { SchemaValidationCache } from '../validation/schema_cache';
import { CacheCorruptionError } from './record_projection.errors';
import { CACHE_FORMAT_VERSION } from './record_projection.types';
import type { CacheIndices, CacheRow, CacheSnapshot } from './record_projection.types';

export function buildIndices(rows: CacheRow[]): CacheIndices {
  const countsByKind: Record<string, number> = {};
  const countsByStatus: Record<string, Record<string, number>> = {};

  for (const row of rows) {
    countsByKind[row.kind] = (countsByKind[row.kind] ?? 0) + 1;
    if (row.status !== null) {
      const byStatus = countsByStatus[row.kind] ?? {};
      byStatus[row.status] = (byStatus[row.status] ?? 0) + 1;
      countsByStatus[row.kind] = byStatus;
    }
  }

  return { countsByKind, countsByStatus };
}

/**
 * Stored indices must be exactly what the rows produce.
 */
export function indicesMatchRows(snapshot: CacheSnapshot): boolean {
  return canonicalize(buildIndices(snapshot.rows)) === canonicalize(snapshot.indices);
}

/**
 * Narrows a parsed JSON document to a CacheSnapshot.
 * @throws CacheCorruptionError naming `source` when the shape, format version or indices are wrong
 */
export function assertCacheSnapshot(value: unknown, source: string): CacheSnapshot {
  const validate = SchemaValidationCache.getValidator<CacheSnapshot>('cacheSnapshot');
  if (!validate(value)) {
    const first = validate.errors?.[0];
    throw new CacheCorruptionError(source, `${first?.instancePath || '/'} ${first?.message ?? 'is invalid'}`);
  }
  if (value.formatVersion !== CACHE_FORMAT_VERSION) {
    throw new CacheCorruptionError(source, `unsupported format version ${value.formatVersion}`);
  }
  if (!indicesMatchRows(value)) {
    throw new CacheCorruptionError(source, 'stored indices do not match rows');
  }
  return value;
}
