/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @hivekeep/core/memory for in-memory alternatives.
 */

// RecordStore
export { FsRecordStore } from './record_store/fs';
export type { FsRecordStoreOptions } from './record_store/fs';

// Derived cache + event log
export { FsRecordProjection } from './record_projection/fs';
export type { FsRecordProjectionOptions } from './record_projection/fs';
export { FsEventLog } from './event_log/fs';
export type { FsEventLogOptions } from './event_log/fs';

// ConfigStore
export { FsConfigStore, CONFIG_FILE, PROJECT_DIR } from './config_store/fs';

// Checkpoints
export { FsCheckpointStore } from './checkpoint_store/fs';
export type { FsCheckpointStoreOptions } from './checkpoint_store/fs';

// Worker files
export { FsWorkerRegistry, FsHeartbeatStore, FsResumeLauncher } from './worker_supervisor/fs';
export type {
  FsWorkerRegistryOptions,
  FsHeartbeatStoreOptions,
  FsResumeLauncherOptions,
} from './worker_supervisor/fs';

// ProjectInitializer
export { FsProjectInitializer } from './project_initializer/fs';

// LocalGitModule (CLI-based, uses execCommand for git operations)
export { LocalGitModule } from './git/local';
export type { IGitModule, GitModuleDependencies } from './git';

// Orchestrator wired onto the on-disk layout
export { createFsOrchestrator } from './orchestrator/fs';
export type { FsOrchestratorOptions } from './orchestrator/fs';
