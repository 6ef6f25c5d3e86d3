import type { GatedOperation } from './operation_gate';

/**
 * Base error for facade-level failures.
 */
export class OrchestratorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestratorError';
    Object.setPrototypeOf(this, OrchestratorError.prototype);
  }
}

/**
 * Reconcile, export, import and sync exclude one another within the
 * process. Thrown instead of waiting.
 */
export class OperationInProgressError extends OrchestratorError {
  constructor(
    public readonly requested: GatedOperation,
    public readonly inFlight: GatedOperation,
  ) {
    super(`Cannot start ${requested}: ${inFlight} is already in progress`);
    this.name = 'OperationInProgressError';
    Object.setPrototypeOf(this, OperationInProgressError.prototype);
  }
}
