// Core interfaces - backend-agnostic
export type { RecordStore } from './record_store';
export * from './record_store.types';
export * from './record_store.errors';
export { parseCollection, serializeCollection, isJsonObject } from './record_codec';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsRecordStore
// - @hivekeep/core/memory -> MemoryRecordStore
