import type { CommitAuthor } from '../git/types';
import type { LogEvent } from '../event_log/event_log.types';
import type { InboxImportResult } from '../memory_pack/memory_pack.types';
import type { ReconcileResult } from '../reconciler/reconciler';
import type { RenderedStatus } from '../status_renderer/status_renderer';
import type { SyncResult } from '../sync_gate/sync_gate.types';
import type { CheckpointAllResult } from '../worker_supervisor/worker_supervisor';

export type InitResult = {
  projectId: string;
  /** False when the project already had a config; nothing was written */
  created: boolean;
};

export type FlushResult = {
  reconcile: ReconcileResult;
  status: RenderedStatus;
};

export type RecordWriteResult = {
  /** task_transition or approval event, when the write produced one */
  event: LogEvent | null;
  /** True when the write was followed by reconcile and status render */
  flushed: boolean;
};

export type RecoverCacheResult = {
  reconcile: ReconcileResult;
  /** True when the event log was unreadable and had to be cleared */
  eventLogReset: boolean;
};

export type SessionStartResult = FlushResult & {
  purgedEvents: number;
  inbox: InboxImportResult[];
};

export type ForceSyncOptions = {
  /** Also commit the allow-listed files through the sync gate */
  git?: boolean;
  message?: string;
  author?: CommitAuthor;
};

export type ForceSyncResult = FlushResult & {
  checkpoints: CheckpointAllResult;
  /** null unless `git` was requested */
  sync: SyncResult | null;
};
