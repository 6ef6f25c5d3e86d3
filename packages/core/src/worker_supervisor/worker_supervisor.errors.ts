/**
 * Base class for worker supervision errors.
 */
export class WorkerSupervisorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkerSupervisorError';
    Object.setPrototypeOf(this, WorkerSupervisorError.prototype);
  }
}

/**
 * Carried by escalation notices; never thrown by the supervisor loop.
 */
export class RetryCeilingExceededError extends WorkerSupervisorError {
  constructor(
    public readonly workerId: string,
    public readonly retryCount: number,
    public readonly maxRetries: number,
  ) {
    super(`Worker ${workerId} failed to resume ${retryCount} time(s) (ceiling ${maxRetries})`);
    this.name = 'RetryCeilingExceededError';
    Object.setPrototypeOf(this, RetryCeilingExceededError.prototype);
  }
}

export class UnknownWorkerError extends WorkerSupervisorError {
  constructor(public readonly workerId: string) {
    super(`Unknown worker: ${workerId}`);
    this.name = 'UnknownWorkerError';
    Object.setPrototypeOf(this, UnknownWorkerError.prototype);
  }
}

export class WorkerAlreadyRegisteredError extends WorkerSupervisorError {
  constructor(public readonly workerId: string) {
    super(`Worker already registered: ${workerId}`);
    this.name = 'WorkerAlreadyRegisteredError';
    Object.setPrototypeOf(this, WorkerAlreadyRegisteredError.prototype);
  }
}

export class HeartbeatFormatError extends WorkerSupervisorError {
  constructor(
    public readonly workerId: string,
    public readonly detail: string,
  ) {
    super(`Unreadable heartbeat for ${workerId}: ${detail}`);
    this.name = 'HeartbeatFormatError';
    Object.setPrototypeOf(this, HeartbeatFormatError.prototype);
  }
}

export class TickInProgressError extends WorkerSupervisorError {
  constructor() {
    super('A supervisor tick is already in progress');
    this.name = 'TickInProgressError';
    Object.setPrototypeOf(this, TickInProgressError.prototype);
  }
}
