import * as fs from 'fs/promises';
import * as path from 'path';
import { TextCheckpointStore } from '../base_checkpoint_store';
import type { CheckpointTier } from '../base_checkpoint_store';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../../utils/atomic_write';

export type FsCheckpointStoreOptions = {
  /** Committed tier, usually `.ai/checkpoints` */
  portableDir: string;
  /** Machine-local tier, usually `.ai_runtime/checkpoints` */
  localDir: string;
};

/**
 * FsCheckpointStore - `<dir>/<worker>/<seq>.yaml|json`, written with
 * temp file + rename so a reader never sees half a checkpoint.
 */
export class FsCheckpointStore extends TextCheckpointStore {
  private readonly dirs: Record<CheckpointTier, string>;

  constructor(options: FsCheckpointStoreOptions) {
    super();
    this.dirs = { portable: options.portableDir, local: options.localDir };
  }

  protected async listFiles(tier: CheckpointTier, workerId: string): Promise<string[]> {
    try {
      return await fs.readdir(path.join(this.dirs[tier], workerId));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  protected async readText(tier: CheckpointTier, workerId: string, fileName: string): Promise<string | null> {
    return readFileIfExists(path.join(this.dirs[tier], workerId, fileName));
  }

  protected async writeText(tier: CheckpointTier, workerId: string, fileName: string, content: string): Promise<string> {
    const target = path.join(this.dirs[tier], workerId, fileName);
    await writeFileAtomic(target, content);
    return target;
  }
}
