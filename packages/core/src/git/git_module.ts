import type { CommitAuthor } from './types';

/**
 * IGitModule - the few index operations the sync gate needs.
 * Paths are relative to the repository root, with forward slashes.
 */
export interface IGitModule {
  getRepoRoot(): Promise<string>;

  /** Every path currently staged in the index */
  getStagedFiles(): Promise<string[]>;

  add(filePaths: string[]): Promise<void>;

  /** Removes paths from the index, keeping the working tree */
  unstage(filePaths: string[]): Promise<void>;

  /** @returns hash of the new commit */
  commit(message: string, author?: CommitAuthor): Promise<string>;
}
