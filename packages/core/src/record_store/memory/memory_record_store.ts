import { TextRecordStore } from '../base_record_store';
import type { Clock } from '../../utils/clock';

/**
 * MemoryRecordStore - keeps collection file text in a Map.
 *
 * Holds raw text rather than parsed records so tests can plant malformed
 * YAML with `setFile` and exercise the same parse path as the fs store.
 */
export class MemoryRecordStore extends TextRecordStore {
  private readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}, clock?: Clock) {
    super(clock);
    for (const [file, content] of Object.entries(initial)) {
      this.files.set(file, content);
    }
  }

  protected async readText(file: string): Promise<string | null> {
    return this.files.get(file) ?? null;
  }

  protected async writeText(file: string, content: string): Promise<void> {
    this.files.set(file, content);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  setFile(file: string, content: string): void {
    this.files.set(file, content);
  }

  getFile(file: string): string | undefined {
    return this.files.get(file);
  }

  removeFile(file: string): void {
    this.files.delete(file);
  }
}
