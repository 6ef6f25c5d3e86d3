/**
 * MemoryGitModule - In-memory IGitModule for tests
 *
 * Test Helpers:
 * - stage(paths): put paths in the index as if a user ran `git add`
 * - failOn(operation): make the next call to an operation throw
 * - getCommits(): commits made so far, with their paths
 */

import type { IGitModule } from '../git_module';
import type { CommitAuthor } from '../types';
import { GitCommandError } from '../errors';

export type MemoryCommit = {
  hash: string;
  message: string;
  author: string | null;
  files: string[];
};

type Operation = 'getStagedFiles' | 'add' | 'unstage' | 'commit';

export class MemoryGitModule implements IGitModule {
  private readonly repoRoot: string;
  private readonly staged = new Set<string>();
  private readonly commits: MemoryCommit[] = [];
  private readonly failures = new Set<Operation>();

  constructor(repoRoot: string = '/test/repo') {
    this.repoRoot = repoRoot;
  }

  async getRepoRoot(): Promise<string> {
    return this.repoRoot;
  }

  async getStagedFiles(): Promise<string[]> {
    this.maybeFail('getStagedFiles');
    return [...this.staged].sort();
  }

  async add(filePaths: string[]): Promise<void> {
    this.maybeFail('add');
    for (const filePath of filePaths) this.staged.add(filePath);
  }

  async unstage(filePaths: string[]): Promise<void> {
    this.maybeFail('unstage');
    for (const filePath of filePaths) this.staged.delete(filePath);
  }

  async commit(message: string, author?: CommitAuthor): Promise<string> {
    this.maybeFail('commit');
    if (this.staged.size === 0) {
      throw new GitCommandError('Failed to create commit', 'nothing to commit');
    }
    const hash = `memcommit${String(this.commits.length + 1).padStart(4, '0')}`;
    this.commits.push({
      hash,
      message,
      author: author ? `${author.name} <${author.email}>` : null,
      files: [...this.staged].sort(),
    });
    this.staged.clear();
    return hash;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  stage(filePaths: string[]): void {
    for (const filePath of filePaths) this.staged.add(filePath);
  }

  failOn(operation: Operation): void {
    this.failures.add(operation);
  }

  getCommits(): MemoryCommit[] {
    return this.commits.map((c) => ({ ...c, files: [...c.files] }));
  }

  private maybeFail(operation: Operation): void {
    if (this.failures.delete(operation)) {
      throw new GitCommandError(`Simulated ${operation} failure`, 'fatal: simulated');
    }
  }
}
