import type { CommitAuthor } from '../git/types';

/**
 * Paths, relative to the repository root, that may ever be committed.
 * Entries ending in `/` admit a whole subtree; others admit one file.
 */
export const SYNC_ALLOW_LIST: readonly string[] = [
  '.ai/state/',
  '.ai/checkpoints/',
  '.ai/config.yaml',
  '.ai/STATUS.md',
  '.ai/DECISIONS.md',
];

/**
 * Never committed, even inside an allowed subtree: leftovers of atomic
 * writes and editor files.
 */
export const SYNC_EXCLUDED_PATTERNS: readonly string[] = [
  '**/*.tmp',
  '**/*.partial/**',
  '**/*.swp',
  '**/*~',
  '**/.DS_Store',
];

export type SyncGateOptions = {
  allowList?: readonly string[];
  excludedPatterns?: readonly string[];
};

export type SyncOptions = {
  message?: string;
  author?: CommitAuthor;
};

export type SyncResult = {
  committedPaths: string[];
  /** Proposed or already-staged paths kept out of the commit */
  rejectedPaths: string[];
  /** null when nothing allowed was staged */
  commitHash: string | null;
};
