import type { JsonObject } from '../record_store/record_store.types';
import type { CacheRow } from '../record_projection/record_projection.types';
import { compareStrings } from '../crypto/checksum';

export const DEFAULT_BOARD_COLUMNS: readonly string[] = ['backlog', 'ready', 'in_progress', 'review', 'done'];

export type ProjectPhase = 'Initialization' | 'Planning' | 'Active Development' | 'Complete';

export type TaskLine = {
  id: string;
  title: string;
  ownerRole: string | null;
  priority: string | null;
};

export type ApprovalLine = {
  id: string;
  triggerId: string | null;
  taskId: string | null;
};

export type DecisionLine = {
  id: string;
  title: string;
  rationale: string | null;
  updatedAt: string | null;
};

export type StatusReport = {
  phase: ProjectPhase;
  totalTasks: number;
  doneTasks: number;
  /** Whole percent, rounded down */
  percentDone: number;
  columns: string[];
  countsByColumn: Record<string, number>;
  tasksByColumn: Record<string, TaskLine[]>;
  pendingApprovals: ApprovalLine[];
  decisions: DecisionLine[];
};

function text(payload: JsonObject, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' ? value : null;
}

function phaseOf(total: number, done: number, inProgress: number): ProjectPhase {
  if (total === 0) return 'Initialization';
  if (done === total) return 'Complete';
  if (inProgress > 0) return 'Active Development';
  return 'Planning';
}

/**
 * Summarizes cache rows for the status documents.
 *
 * Statuses missing from `columns` are appended after them in name order,
 * so no task drops out of the counts.
 */
export function buildStatusReport(rows: CacheRow[], columns: readonly string[] = DEFAULT_BOARD_COLUMNS): StatusReport {
  const tasks = rows.filter((row) => row.kind === 'task');
  const extraColumns = [...new Set(tasks.map((row) => row.status ?? 'backlog'))]
    .filter((status) => !columns.includes(status))
    .sort(compareStrings);
  const allColumns = [...columns, ...extraColumns];

  const countsByColumn: Record<string, number> = {};
  const tasksByColumn: Record<string, TaskLine[]> = {};
  for (const column of allColumns) {
    countsByColumn[column] = 0;
    tasksByColumn[column] = [];
  }
  for (const row of tasks) {
    const column = row.status ?? 'backlog';
    countsByColumn[column] = (countsByColumn[column] ?? 0) + 1;
    tasksByColumn[column]?.push({
      id: row.id,
      title: text(row.payload, 'title') ?? row.id,
      ownerRole: text(row.payload, 'owner_role'),
      priority: text(row.payload, 'priority'),
    });
  }

  const doneTasks = countsByColumn['done'] ?? 0;
  const totalTasks = tasks.length;

  return {
    phase: phaseOf(totalTasks, doneTasks, countsByColumn['in_progress'] ?? 0),
    totalTasks,
    doneTasks,
    percentDone: totalTasks === 0 ? 0 : Math.floor((doneTasks / totalTasks) * 100),
    columns: allColumns,
    countsByColumn,
    tasksByColumn,
    pendingApprovals: rows
      .filter((row) => row.kind === 'approval' && row.status === 'pending')
      .map((row) => ({
        id: row.id,
        triggerId: text(row.payload, 'trigger_id'),
        taskId: text(row.payload, 'task_id'),
      })),
    decisions: rows
      .filter((row) => row.kind === 'decision')
      .map((row) => ({
        id: row.id,
        title: text(row.payload, 'title') ?? row.id,
        rationale: text(row.payload, 'rationale'),
        updatedAt: row.updatedAt,
      })),
  };
}
