export class CheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckpointError';
    Object.setPrototypeOf(this, CheckpointError.prototype);
  }
}

export class InvalidWorkerIdError extends CheckpointError {
  public readonly workerId: string;

  constructor(workerId: string) {
    super(`Invalid worker id '${workerId}': use letters, digits, '.', '_' or '-'`);
    this.name = 'InvalidWorkerIdError';
    this.workerId = workerId;
    Object.setPrototypeOf(this, InvalidWorkerIdError.prototype);
  }
}
