import { parseRegistry, serializeRegistry } from '../worker_codec';
import type { WorkerRecord, WorkerRegistryStore } from '../worker_supervisor.types';

/**
 * Keeps the serialized registry so every load returns fresh copies, as the
 * fs registry does.
 */
export class MemoryWorkerRegistry implements WorkerRegistryStore {
  private content: string | null = null;

  async load(): Promise<WorkerRecord[]> {
    return this.content === null ? [] : parseRegistry(this.content);
  }

  async save(records: WorkerRecord[]): Promise<void> {
    this.content = serializeRegistry(records);
  }
}
