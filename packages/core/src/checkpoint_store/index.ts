export type {
  CheckpointStore,
  CheckpointWriteResult,
  LocalCheckpoint,
  LocalCheckpointDetail,
  PortableCheckpoint,
  ResumableState,
} from './checkpoint_store.types';
export { TextCheckpointStore } from './base_checkpoint_store';
export type { CheckpointTier } from './base_checkpoint_store';
export { serializePortable, parsePortable, assertWorkerId } from './checkpoint_codec';
export * from './checkpoint_store.errors';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsCheckpointStore
// - @hivekeep/core/memory -> MemoryCheckpointStore
