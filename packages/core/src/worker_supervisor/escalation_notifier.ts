import { createLogger } from '../logger';
import type { EscalationNotice, EscalationNotifier } from './worker_supervisor.types';

const logger = createLogger('[Escalation] ');

/**
 * Default notifier: reports the escalation on the error log so a human
 * watching the orchestrator sees it.
 */
export class LoggingEscalationNotifier implements EscalationNotifier {
  async notify(notice: EscalationNotice): Promise<void> {
    const checkpoint = notice.lastCheckpoint
      ? `last checkpoint ${notice.lastCheckpoint.sequenceNo}`
      : 'no checkpoint';
    logger.error(`${notice.error.message}; ${checkpoint}. Restart the worker once the cause is fixed.`);
  }
}
