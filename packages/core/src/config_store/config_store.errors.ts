export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor() {
    super('Project configuration not found. Run init first.');
    this.name = 'ConfigNotFoundError';
    Object.setPrototypeOf(this, ConfigNotFoundError.prototype);
  }
}

export class InvalidConfigError extends ConfigError {
  public readonly file: string;
  public readonly details: string[];

  constructor(file: string, details: string[]) {
    super(`Invalid configuration in ${file}: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.file = file;
    this.details = details;
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}
