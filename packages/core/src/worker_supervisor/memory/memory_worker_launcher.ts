import type { ResumeDirective, WorkerLauncher } from '../worker_supervisor.types';

/**
 * Records directives instead of launching anything.
 */
export class MemoryWorkerLauncher implements WorkerLauncher {
  private readonly directives: ResumeDirective[] = [];
  private failures = 0;

  async resume(directive: ResumeDirective): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error(`Launcher unavailable for ${directive.workerId}`);
    }
    this.directives.push(directive);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  /** Makes the next `count` hand-offs fail */
  failNext(count = 1): void {
    this.failures = count;
  }

  getDirectives(): ResumeDirective[] {
    return [...this.directives];
  }
}
