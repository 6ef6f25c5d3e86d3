import { TextCheckpointStore } from '../base_checkpoint_store';
import type { CheckpointTier } from '../base_checkpoint_store';

/**
 * MemoryCheckpointStore - keeps checkpoint text in a Map keyed by
 * `tier/worker/file`, so tests exercise the same parse path as the fs store.
 */
export class MemoryCheckpointStore extends TextCheckpointStore {
  private readonly files = new Map<string, string>();

  protected async listFiles(tier: CheckpointTier, workerId: string): Promise<string[]> {
    const prefix = `${tier}/${workerId}/`;
    return [...this.files.keys()].filter((key) => key.startsWith(prefix)).map((key) => key.slice(prefix.length));
  }

  protected async readText(tier: CheckpointTier, workerId: string, fileName: string): Promise<string | null> {
    return this.files.get(`${tier}/${workerId}/${fileName}`) ?? null;
  }

  protected async writeText(tier: CheckpointTier, workerId: string, fileName: string, content: string): Promise<string> {
    const key = `${tier}/${workerId}/${fileName}`;
    this.files.set(key, content);
    return key;
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  /** Simulates moving to a machine without the local tier */
  dropLocalTier(): void {
    for (const key of [...this.files.keys()]) {
      if (key.startsWith('local/')) this.files.delete(key);
    }
  }

  setFile(key: string, content: string): void {
    this.files.set(key, content);
  }

  getFile(key: string): string | undefined {
    return this.files.get(key);
  }
}
