export type { IGitModule } from './git_module';
export type { ExecCommand, ExecOptions, ExecResult, GitModuleDependencies, CommitAuthor } from './types';
export { GitError, GitCommandError } from './errors';
export { createExecCommand } from './exec_command';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> LocalGitModule
// - @hivekeep/core/memory -> MemoryGitModule
