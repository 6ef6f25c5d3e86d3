export class MemoryPackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemoryPackError';
    Object.setPrototypeOf(this, MemoryPackError.prototype);
  }
}

/**
 * The pack's format version is not one this build can read.
 * Raised before anything from the pack is written.
 */
export class UnsupportedPackVersionError extends MemoryPackError {
  public readonly formatVersion: string;
  public readonly supported: readonly string[];

  constructor(formatVersion: string, supported: readonly string[]) {
    super(`Unsupported memory pack format version '${formatVersion}' (supported: ${supported.join(', ')})`);
    this.name = 'UnsupportedPackVersionError';
    this.formatVersion = formatVersion;
    this.supported = supported;
    Object.setPrototypeOf(this, UnsupportedPackVersionError.prototype);
  }
}

export class InvalidPackError extends MemoryPackError {
  /** Pack entry or manifest field at fault, e.g. `manifest.fingerprint` */
  public readonly field: string;

  constructor(field: string, detail: string) {
    super(`Invalid memory pack (${field}): ${detail}`);
    this.name = 'InvalidPackError';
    this.field = field;
    Object.setPrototypeOf(this, InvalidPackError.prototype);
  }
}
