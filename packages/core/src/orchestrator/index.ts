export { Orchestrator } from './orchestrator';
export type { OrchestratorDependencies, OrchestratorWorkerDependencies } from './orchestrator';
export { OperationGate } from './operation_gate';
export type { GatedOperation } from './operation_gate';
export { OrchestratorError, OperationInProgressError } from './orchestrator.errors';
export * from './orchestrator.types';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> createFsOrchestrator
