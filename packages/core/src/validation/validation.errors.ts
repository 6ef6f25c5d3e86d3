import type { RecordFileError } from './record_validator';

/**
 * The validation gate rejected the RecordStore: nothing is reconciled or synced.
 */
export class ValidationFailedError extends Error {
  public readonly errors: RecordFileError[];

  constructor(errors: RecordFileError[]) {
    const summary = errors
      .slice(0, 5)
      .map((e) => `${e.file}${e.field}: ${e.message}`)
      .join('; ');
    super(`RecordStore validation failed (${errors.length} error(s)): ${summary}`);
    this.name = 'ValidationFailedError';
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationFailedError.prototype);
  }
}
