/**
 * LocalGitModule - IGitModule over the git CLI
 *
 * Every command goes through the injected execCommand; failures become
 * GitCommandError carrying git's stderr.
 */

import type { IGitModule } from '../git_module';
import type { CommitAuthor, ExecCommand, ExecOptions, ExecResult, GitModuleDependencies } from '../types';
import { GitCommandError } from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('[GitModule] ');

export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private readonly execCommand: ExecCommand;

  constructor(dependencies: GitModuleDependencies) {
    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot ?? '';
  }

  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd ?? (await this.ensureRepoRoot());
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  async getRepoRoot(): Promise<string> {
    return this.ensureRepoRoot();
  }

  /**
   * @example
   * const staged = await gitModule.getStagedFiles();
   * // => [".ai/state/board.yaml"]
   */
  async getStagedFiles(): Promise<string[]> {
    const result = await this.execGit(['diff', '--cached', '--name-only', '-z']);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to get staged files', result.stderr, 'diff --cached');
    }
    return result.stdout.split('\0').filter((line) => line.length > 0);
  }

  async add(filePaths: string[]): Promise<void> {
    if (filePaths.length === 0) return;
    const result = await this.execGit(['add', '--', ...filePaths]);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to add files', result.stderr, 'add');
    }
  }

  /**
   * Resets the index entries to HEAD. Before the first commit there is no
   * HEAD, so the entries are dropped from the index instead.
   */
  async unstage(filePaths: string[]): Promise<void> {
    if (filePaths.length === 0) return;
    const head = await this.execGit(['rev-parse', '--verify', '--quiet', 'HEAD']);
    const args = head.exitCode === 0
      ? ['restore', '--staged', '--', ...filePaths]
      : ['rm', '--cached', '--quiet', '-r', '--', ...filePaths];

    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to unstage files', result.stderr, args[0]);
    }
  }

  /**
   * Multi-line messages are passed as one -m per line.
   */
  async commit(message: string, author?: CommitAuthor): Promise<string> {
    const args = ['commit'];
    for (const line of message.split('\n')) {
      args.push('-m', line);
    }
    if (author) {
      args.push('--author', `${author.name} <${author.email}>`);
    }

    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to create commit', result.stderr, 'commit');
    }

    const hashResult = await this.execGit(['rev-parse', 'HEAD']);
    if (hashResult.exitCode !== 0) {
      throw new GitCommandError('Failed to read commit hash', hashResult.stderr, 'rev-parse');
    }
    return hashResult.stdout.trim();
  }
}
