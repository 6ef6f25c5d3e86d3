/**
 * In-memory implementations (no filesystem required)
 *
 * This module exports all implementations that work without filesystem access.
 * Suitable for tests and for embedding the core in another process.
 */

// RecordStore
export { MemoryRecordStore } from './record_store/memory';

// Derived cache + event log
export { MemoryRecordProjection } from './record_projection/memory';
export { MemoryEventLog } from './event_log/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// Checkpoints
export { MemoryCheckpointStore } from './checkpoint_store/memory';

// Worker doubles
export {
  MemoryWorkerRegistry,
  MemoryHeartbeatStore,
  MemoryWorkerLauncher,
  MemoryEscalationNotifier,
} from './worker_supervisor/memory';

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryCommit } from './git/memory';
