import * as path from 'path';
import { writeFileAtomic } from '../../utils/atomic_write';
import { createLogger } from '../../logger';
import { renderResumeDirective } from '../resume_directive';
import type { ResumeDirective, WorkerLauncher } from '../worker_supervisor.types';

const logger = createLogger('[ResumeLauncher] ');

export type FsResumeLauncherOptions = {
  /** Usually `.ai_runtime/workers/resume` */
  dir: string;
};

/**
 * Hands a resume over by writing `<worker>.md` for whatever process
 * launches workers to pick up. The file is replaced on every attempt.
 */
export class FsResumeLauncher implements WorkerLauncher {
  private readonly dir: string;

  constructor(options: FsResumeLauncherOptions) {
    this.dir = options.dir;
  }

  async resume(directive: ResumeDirective): Promise<void> {
    const target = path.join(this.dir, `${directive.workerId}.md`);
    await writeFileAtomic(target, renderResumeDirective(directive));
    logger.info(`Resume directive for ${directive.workerId} written to ${target}`);
  }
}
