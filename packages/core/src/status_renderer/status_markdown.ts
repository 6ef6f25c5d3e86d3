import type { StatusReport } from './status_report';

const BAR_WIDTH = 20;

export function progressBar(percent: number): string {
  const filled = Math.floor((BAR_WIDTH * percent) / 100);
  return '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
}

function columnTitle(column: string): string {
  return column
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function stamp(generatedAt: Date): string {
  const iso = generatedAt.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

export function renderStatusMarkdown(report: StatusReport, generatedAt: Date): string {
  const lines = ['# Project Status', '', '> Generated from the derived cache. Do not edit by hand.', ''];

  lines.push('## Phase', report.phase, '');
  lines.push(
    '## Progress',
    `[${progressBar(report.percentDone)}] ${report.percentDone}%  (${report.doneTasks}/${report.totalTasks} tasks done)`,
    '',
  );

  lines.push('## Task Summary', '| Column | Count |', '|--------|-------|');
  for (const column of report.columns) {
    lines.push(`| ${column} | ${report.countsByColumn[column] ?? 0} |`);
  }
  lines.push('');

  // Open work first, done collapsed at the end
  for (const column of report.columns.filter((c) => c !== 'done')) {
    const tasks = report.tasksByColumn[column] ?? [];
    if (tasks.length === 0) continue;
    lines.push(`## ${columnTitle(column)} (${tasks.length})`);
    for (const task of tasks) {
      const priority = task.priority ? ` \`${task.priority}\`` : '';
      lines.push(`- **${task.id}**: ${task.title}${priority} (owner: ${task.ownerRole ?? 'unassigned'})`);
    }
    lines.push('');
  }

  const done = report.tasksByColumn['done'] ?? [];
  if (done.length > 0) {
    lines.push(`## Done (${done.length})`);
    for (const task of done) {
      lines.push(`- ~~${task.id}~~: ${task.title}`);
    }
    lines.push('');
  }

  lines.push('## Pending Approvals');
  if (report.pendingApprovals.length === 0) {
    lines.push('None');
  } else {
    for (const approval of report.pendingApprovals) {
      lines.push(`- ${approval.triggerId ?? approval.id} on ${approval.taskId ?? '?'}`);
    }
  }
  lines.push('');

  lines.push('---', `*Last updated: ${stamp(generatedAt)}*`);
  return lines.join('\n') + '\n';
}

export function renderDecisionsMarkdown(report: StatusReport, generatedAt: Date): string {
  const lines = ['# Decisions', '', '> Generated from the derived cache. Do not edit by hand.', ''];

  if (report.decisions.length === 0) {
    lines.push('No decisions recorded.', '');
  }
  for (const decision of report.decisions) {
    lines.push(`## ${decision.id}: ${decision.title}`);
    if (decision.updatedAt) lines.push(`*${decision.updatedAt}*`);
    if (decision.rationale) lines.push('', decision.rationale);
    lines.push('');
  }

  lines.push('---', `*Last updated: ${stamp(generatedAt)}*`);
  return lines.join('\n') + '\n';
}
