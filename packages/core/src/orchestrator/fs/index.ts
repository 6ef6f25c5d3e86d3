export { createFsOrchestrator } from './fs_orchestrator';
export type { FsOrchestratorOptions } from './fs_orchestrator';
