export { MemoryCheckpointStore } from './memory_checkpoint_store';
