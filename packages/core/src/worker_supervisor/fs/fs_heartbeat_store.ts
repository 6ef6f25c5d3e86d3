import * as path from 'path';
import { readFileIfExists, writeFileAtomic } from '../../utils/atomic_write';
import { assertWorkerId } from '../../checkpoint_store/checkpoint_codec';
import { parseHeartbeat, serializeHeartbeat } from '../worker_codec';
import type { Heartbeat, HeartbeatStore } from '../worker_supervisor.types';

export type FsHeartbeatStoreOptions = {
  /** Usually `.ai_runtime/workers/heartbeats` */
  dir: string;
};

/**
 * One `<worker>.json` file per worker, replaced atomically on every beat.
 */
export class FsHeartbeatStore implements HeartbeatStore {
  private readonly dir: string;

  constructor(options: FsHeartbeatStoreOptions) {
    this.dir = options.dir;
  }

  async read(workerId: string): Promise<Heartbeat | null> {
    const content = await readFileIfExists(this.fileFor(workerId));
    return content === null ? null : parseHeartbeat(workerId, content);
  }

  async write(heartbeat: Heartbeat): Promise<void> {
    await writeFileAtomic(this.fileFor(heartbeat.workerId), serializeHeartbeat(heartbeat));
  }

  private fileFor(workerId: string): string {
    assertWorkerId(workerId);
    return path.join(this.dir, `${workerId}.json`);
  }
}
