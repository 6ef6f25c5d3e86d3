export class SyncGateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncGateError';
    Object.setPrototypeOf(this, SyncGateError.prototype);
  }
}

/**
 * The sync stopped before committing because the index could not be
 * brought inside the allow-list.
 */
export class SyncAbortedError extends SyncGateError {
  public readonly paths: string[];

  constructor(reason: string, paths: string[], cause?: unknown) {
    super(`Sync aborted: ${reason}`);
    this.name = 'SyncAbortedError';
    this.paths = paths;
    if (cause !== undefined) {
      this.cause = cause;
    }
    Object.setPrototypeOf(this, SyncAbortedError.prototype);
  }
}
