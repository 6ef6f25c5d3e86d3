// Core interfaces - backend-agnostic
export type {
  IRecordProjection,
  CacheRow,
  CacheSnapshot,
  CacheIndices,
  RowFilter,
} from './record_projection.types';
export { CACHE_FORMAT_VERSION } from './record_projection.types';
export { CacheCorruptionError } from './record_projection.errors';
export { DerivedCache } from './derived_cache';
export { buildIndices, indicesMatchRows, assertCacheSnapshot } from './cache_indices';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsRecordProjection
// - @hivekeep/core/memory -> MemoryRecordProjection
