import { readFileIfExists, writeFileAtomic } from '../../utils/atomic_write';
import { parseRegistry, serializeRegistry } from '../worker_codec';
import type { WorkerRecord, WorkerRegistryStore } from '../worker_supervisor.types';

export type FsWorkerRegistryOptions = {
  /** Usually `.ai_runtime/workers/registry.json` */
  filePath: string;
};

export class FsWorkerRegistry implements WorkerRegistryStore {
  private readonly filePath: string;

  constructor(options: FsWorkerRegistryOptions) {
    this.filePath = options.filePath;
  }

  async load(): Promise<WorkerRecord[]> {
    const content = await readFileIfExists(this.filePath);
    return content === null ? [] : parseRegistry(content);
  }

  async save(records: WorkerRecord[]): Promise<void> {
    await writeFileAtomic(this.filePath, serializeRegistry(records));
  }
}
