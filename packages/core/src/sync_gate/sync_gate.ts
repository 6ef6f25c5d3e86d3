import type { IGitModule } from '../git/git_module';
import { createLogger } from '../logger';
import { createAllowListMatcher, normalizeSyncPath } from './allow_list';
import type { PathMatcher } from './allow_list';
import { SyncAbortedError } from './sync_gate.errors';
import { SYNC_ALLOW_LIST, SYNC_EXCLUDED_PATTERNS } from './sync_gate.types';
import type { SyncGateOptions, SyncOptions, SyncResult } from './sync_gate.types';
import { errorMessage } from '../utils/atomic_write';

const logger = createLogger('[SyncGate] ');

/**
 * SyncGate - keeps every commit inside the allow-list.
 *
 * The index check runs on every sync, whatever was proposed: anything
 * staged outside the list is unstaged first, and if that fails nothing
 * is committed. File content is never read.
 */
export class SyncGate {
  private readonly git: IGitModule;
  private readonly isAllowed: PathMatcher;

  constructor(git: IGitModule, options: SyncGateOptions = {}) {
    this.git = git;
    this.isAllowed = createAllowListMatcher(
      options.allowList ?? SYNC_ALLOW_LIST,
      options.excludedPatterns ?? SYNC_EXCLUDED_PATTERNS,
    );
  }

  isAllowListed(filePath: string): boolean {
    return this.isAllowed(filePath);
  }

  async sync(paths: string[], options: SyncOptions = {}): Promise<SyncResult> {
    const proposed = [...new Set(paths.map(normalizeSyncPath))];
    const allowed = proposed.filter((p) => this.isAllowed(p));
    const rejected = new Set(proposed.filter((p) => !this.isAllowed(p)));

    for (const p of rejected) {
      logger.warn(`AllowListViolation: refusing to stage ${p}`);
    }

    try {
      await this.git.add(allowed);
    } catch (error) {
      throw new SyncAbortedError(`staging failed: ${errorMessage(error)}`, allowed, error);
    }

    const staged = await this.readIndex();
    const outside = staged.filter((p) => !this.isAllowed(p));
    if (outside.length > 0) {
      for (const p of outside) {
        if (!rejected.has(p)) {
          logger.warn(`AllowListViolation: unstaging ${p}`);
        }
        rejected.add(p);
      }
      try {
        await this.git.unstage(outside);
      } catch (error) {
        throw new SyncAbortedError(`unstaging failed: ${errorMessage(error)}`, outside, error);
      }
    }

    const remaining = await this.readIndex();
    const leftover = remaining.filter((p) => !this.isAllowed(p));
    if (leftover.length > 0) {
      throw new SyncAbortedError('paths outside the allow-list are still staged', leftover);
    }

    const rejectedPaths = [...rejected];
    if (remaining.length === 0) {
      logger.info('Nothing allowed is staged; no commit made');
      return { committedPaths: [], rejectedPaths, commitHash: null };
    }

    const committedPaths = [...remaining].sort();
    const message = options.message ?? `state: sync ${committedPaths.length} file(s)`;
    const commitHash = await this.git.commit(message, options.author);
    logger.info(`Committed ${committedPaths.length} file(s) as ${commitHash}`);

    return { committedPaths, rejectedPaths, commitHash };
  }

  private async readIndex(): Promise<string[]> {
    try {
      return (await this.git.getStagedFiles()).map(normalizeSyncPath);
    } catch (error) {
      throw new SyncAbortedError(`reading the index failed: ${errorMessage(error)}`, [], error);
    }
  }
}
