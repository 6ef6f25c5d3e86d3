/**
 * Type Definitions for the git module
 */

export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecCommand = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule.
 * The command runner is injected so tests never spawn git.
 */
export type GitModuleDependencies = {
  /** Path to the repository root (auto-detected if not provided) */
  repoRoot?: string;
  execCommand: ExecCommand;
};

export type CommitAuthor = {
  name: string;
  email: string;
};
