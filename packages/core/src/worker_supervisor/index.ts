export { WorkerSupervisor } from './worker_supervisor';
export type { WorkerSupervisorDependencies, TickListener, CheckpointAllResult } from './worker_supervisor';
export { WorkerChannel } from './worker_channel';
export type { WorkerProgress } from './worker_channel';
export { LoggingEscalationNotifier } from './escalation_notifier';
export { buildResumeDirective, renderResumeDirective } from './resume_directive';
export { WORKER_STATES, TERMINAL_STATES } from './worker_supervisor.types';
export type {
  EscalationNotice,
  EscalationNotifier,
  Heartbeat,
  HeartbeatStatus,
  HeartbeatStore,
  ResumeDirective,
  StateTransition,
  TickResult,
  WorkerLauncher,
  WorkerRecord,
  WorkerRegistration,
  WorkerRegistryStore,
  WorkerState,
} from './worker_supervisor.types';
export * from './worker_supervisor.errors';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsWorkerRegistry, FsHeartbeatStore, FsResumeLauncher
// - @hivekeep/core/memory -> MemoryWorkerRegistry, MemoryHeartbeatStore, MemoryWorkerLauncher, MemoryEscalationNotifier
