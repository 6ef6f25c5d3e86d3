import { OperationInProgressError } from './orchestrator.errors';

export type GatedOperation = 'reconcile' | 'export' | 'import' | 'sync';

/**
 * Process-local mutual exclusion for the operations that write the
 * derived cache or the event log in bulk. Not a queue: a second caller
 * fails immediately.
 */
export class OperationGate {
  private inFlight: GatedOperation | null = null;

  current(): GatedOperation | null {
    return this.inFlight;
  }

  /**
   * @throws OperationInProgressError when another gated operation is running
   */
  async run<T>(operation: GatedOperation, task: () => Promise<T>): Promise<T> {
    if (this.inFlight !== null) {
      throw new OperationInProgressError(operation, this.inFlight);
    }
    this.inFlight = operation;
    try {
      return await task();
    } finally {
      this.inFlight = null;
    }
  }
}
