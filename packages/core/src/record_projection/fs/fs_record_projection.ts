import * as fs from 'fs/promises';
import * as path from 'path';
import type { CacheSnapshot, IRecordProjection } from '../record_projection.types';
import { CacheCorruptionError } from '../record_projection.errors';
import { assertCacheSnapshot } from '../cache_indices';
import { isNotFound, readFileIfExists, writeFileAtomic, errorMessage } from '../../utils/atomic_write';

export type FsRecordProjectionOptions = {
  /** Cache directory, usually `.ai_runtime/cache` */
  basePath: string;
};

/**
 * FsRecordProjection - derived cache stored as `index.json`.
 *
 * Written with temp file + rename so a crash never leaves half a snapshot.
 */
export class FsRecordProjection implements IRecordProjection {
  private readonly indexPath: string;

  constructor(options: FsRecordProjectionOptions) {
    this.indexPath = path.join(options.basePath, 'index.json');
  }

  async persist(snapshot: CacheSnapshot): Promise<void> {
    await writeFileAtomic(this.indexPath, JSON.stringify(snapshot, null, 2));
  }

  async read(): Promise<CacheSnapshot | null> {
    const content = await readFileIfExists(this.indexPath);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CacheCorruptionError(this.indexPath, errorMessage(error));
    }
    return assertCacheSnapshot(parsed, this.indexPath);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.indexPath);
      return true;
    } catch {
      return false;
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.indexPath);
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }
  }
}
