import { parseHeartbeat, serializeHeartbeat } from '../worker_codec';
import type { Heartbeat, HeartbeatStore } from '../worker_supervisor.types';

export class MemoryHeartbeatStore implements HeartbeatStore {
  private readonly files = new Map<string, string>();

  async read(workerId: string): Promise<Heartbeat | null> {
    const content = this.files.get(workerId);
    return content === undefined ? null : parseHeartbeat(workerId, content);
  }

  async write(heartbeat: Heartbeat): Promise<void> {
    this.files.set(heartbeat.workerId, serializeHeartbeat(heartbeat));
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  setRaw(workerId: string, content: string): void {
    this.files.set(workerId, content);
  }

  remove(workerId: string): void {
    this.files.delete(workerId);
  }
}
