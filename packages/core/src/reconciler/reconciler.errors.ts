/**
 * Reconciliation did not complete. The previous cache, if any, is untouched.
 */
export class ReconcileError extends Error {
  /** RecordStore file that stopped the rebuild, when one is known */
  public readonly file: string | null;

  constructor(message: string, file: string | null, cause: unknown) {
    super(message, { cause });
    this.name = 'ReconcileError';
    this.file = file;
    Object.setPrototypeOf(this, ReconcileError.prototype);
  }
}
