import type { EscalationNotice, EscalationNotifier } from '../worker_supervisor.types';

export class MemoryEscalationNotifier implements EscalationNotifier {
  private readonly notices: EscalationNotice[] = [];

  async notify(notice: EscalationNotice): Promise<void> {
    this.notices.push(notice);
  }

  getNotices(): EscalationNotice[] {
    return [...this.notices];
  }
}
