export { FsCheckpointStore } from './fs_checkpoint_store';
export type { FsCheckpointStoreOptions } from './fs_checkpoint_store';
