/**
 * The derived cache (or the event log stored beside it) cannot be trusted.
 * The only recovery is to delete it and reconcile from the RecordStore.
 */
export class CacheCorruptionError extends Error {
  public readonly source: string;

  constructor(source: string, detail: string) {
    super(`Cache corrupted (${source}): ${detail}`);
    this.name = 'CacheCorruptionError';
    this.source = source;
    Object.setPrototypeOf(this, CacheCorruptionError.prototype);
  }
}
