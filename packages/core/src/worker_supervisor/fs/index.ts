export { FsWorkerRegistry } from './fs_worker_registry';
export type { FsWorkerRegistryOptions } from './fs_worker_registry';
export { FsHeartbeatStore } from './fs_heartbeat_store';
export type { FsHeartbeatStoreOptions } from './fs_heartbeat_store';
export { FsResumeLauncher } from './fs_resume_launcher';
export type { FsResumeLauncherOptions } from './fs_resume_launcher';
