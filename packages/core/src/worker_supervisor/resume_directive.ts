import type { PortableCheckpoint } from '../checkpoint_store/checkpoint_store.types';
import type { ResumeDirective } from './worker_supervisor.types';

export function buildResumeDirective(checkpoint: PortableCheckpoint, attempt: number, issuedAt: Date): ResumeDirective {
  return {
    workerId: checkpoint.workerId,
    checkpointSequence: checkpoint.sequenceNo,
    attempt,
    issuedAt: issuedAt.toISOString(),
    resumableState: checkpoint.resumableState,
  };
}

/**
 * Markdown brief a fresh worker reads before continuing.
 */
export function renderResumeDirective(directive: ResumeDirective): string {
  const state = directive.resumableState;
  const lines = [
    `# Resume worker ${directive.workerId}`,
    '',
    `- Checkpoint: ${directive.checkpointSequence}`,
    `- Attempt: ${directive.attempt}`,
    `- Issued: ${directive.issuedAt}`,
  ];
  if (state.taskId !== undefined) lines.push(`- Task: ${state.taskId}`);
  if (state.role !== undefined) lines.push(`- Role: ${state.role}`);
  if (state.promptRef !== undefined) lines.push(`- Prompt: ${state.promptRef}`);

  lines.push('', '## Progress so far', '', state.progressSummary, '', '## Next steps', '');
  if (state.nextSteps.length === 0) {
    lines.push('_No next steps recorded._');
  } else {
    state.nextSteps.forEach((step, index) => lines.push(`${index + 1}. ${step}`));
  }
  return lines.join('\n') + '\n';
}
