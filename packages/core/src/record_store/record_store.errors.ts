/**
 * Base error class for RecordStore failures
 */
export class RecordStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordStoreError';
    Object.setPrototypeOf(this, RecordStoreError.prototype);
  }
}

/**
 * A RecordStore file could not be parsed into records.
 * Fatal to the operation that loaded it; nothing derived from it is written.
 */
export class RecordParseError extends RecordStoreError {
  public readonly file: string;
  public readonly detail: string;

  constructor(file: string, detail: string) {
    super(`Failed to parse ${file}: ${detail}`);
    this.name = 'RecordParseError';
    this.file = file;
    this.detail = detail;
    Object.setPrototypeOf(this, RecordParseError.prototype);
  }
}
