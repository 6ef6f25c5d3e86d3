/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command exits non-zero
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command: string | undefined;

  constructor(message: string, stderr: string = '', command?: string) {
    super(stderr ? `${message}: ${stderr.trim()}` : message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}
