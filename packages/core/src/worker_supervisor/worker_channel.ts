import { systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { assertWorkerId } from '../checkpoint_store/checkpoint_codec';
import type { ResumableState } from '../checkpoint_store/checkpoint_store.types';
import type { JsonObject } from '../record_store/record_store.types';
import type { Heartbeat, HeartbeatStatus, HeartbeatStore } from './worker_supervisor.types';

export type WorkerProgress = {
  resumableState?: ResumableState;
  notes?: string[];
  scratch?: JsonObject;
};

/**
 * Worker-side handle. Each call replaces the worker's heartbeat file.
 *
 * @example
 * ```typescript
 * const channel = new WorkerChannel('w1', new FsHeartbeatStore({ dir }));
 * await channel.heartbeat({ resumableState: { progressSummary: 'Parsed 2 of 5 files', nextSteps: ['Parse c.ts'] } });
 * await channel.complete();
 * ```
 */
export class WorkerChannel {
  constructor(
    private readonly workerId: string,
    private readonly heartbeats: HeartbeatStore,
    private readonly clock: Clock = systemClock,
  ) {
    assertWorkerId(workerId);
  }

  async heartbeat(progress: WorkerProgress = {}): Promise<Heartbeat> {
    return this.beat('running', progress);
  }

  async complete(progress: WorkerProgress = {}): Promise<Heartbeat> {
    return this.beat('completed', progress);
  }

  private async beat(status: HeartbeatStatus, progress: WorkerProgress): Promise<Heartbeat> {
    const heartbeat: Heartbeat = {
      workerId: this.workerId,
      timestamp: this.clock().toISOString(),
      status,
      ...progress,
    };
    await this.heartbeats.write(heartbeat);
    return heartbeat;
  }
}
