import * as path from 'path';
import type { DerivedCache } from '../record_projection/derived_cache';
import type { RecordStoreSnapshot } from '../record_store/record_store.types';
import { createLogger } from '../logger';
import { writeFileAtomic } from '../utils/atomic_write';
import { systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { renderDecisionsMarkdown, renderStatusMarkdown } from './status_markdown';
import { buildStatusReport, DEFAULT_BOARD_COLUMNS } from './status_report';
import type { StatusReport } from './status_report';

const logger = createLogger('[StatusRenderer] ');

export const STATUS_FILE = 'STATUS.md';
export const DECISIONS_FILE = 'DECISIONS.md';

export type StatusRendererOptions = {
  cache: DerivedCache;
  /** Directory receiving STATUS.md and DECISIONS.md, usually `.ai` */
  outputDir: string;
  clock?: Clock;
};

export type RenderedStatus = {
  report: StatusReport;
  statusPath: string;
  decisionsPath: string;
};

/**
 * Board columns declared in `board.yaml`, or null when the board declares none.
 */
export function boardColumns(snapshot: RecordStoreSnapshot): string[] | null {
  const board = snapshot.collections.find((collection) => collection.spec.kind === 'task');
  const columns = board?.extras['columns'];
  if (!Array.isArray(columns)) return null;
  return columns.filter((column): column is string => typeof column === 'string');
}

/**
 * Writes the human-facing documents from the derived cache. Never reads
 * the record files; callers reconcile first when they need fresh numbers.
 */
export class StatusRenderer {
  private readonly cache: DerivedCache;
  private readonly outputDir: string;
  private readonly clock: Clock;

  constructor(options: StatusRendererOptions) {
    this.cache = options.cache;
    this.outputDir = options.outputDir;
    this.clock = options.clock ?? systemClock;
  }

  async render(columns: readonly string[] = DEFAULT_BOARD_COLUMNS): Promise<RenderedStatus> {
    const report = buildStatusReport(await this.cache.listRows(), columns);
    const now = this.clock();

    const statusPath = path.join(this.outputDir, STATUS_FILE);
    const decisionsPath = path.join(this.outputDir, DECISIONS_FILE);
    await writeFileAtomic(statusPath, renderStatusMarkdown(report, now));
    await writeFileAtomic(decisionsPath, renderDecisionsMarkdown(report, now));

    logger.debug(`Rendered ${report.totalTasks} task(s), phase ${report.phase}`);
    return { report, statusPath, decisionsPath };
  }
}
