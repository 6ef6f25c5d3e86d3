import type { JsonObject } from '../record_store/record_store.types';

/**
 * What a worker needs to pick up where it stopped. Shared by both
 * checkpoint tiers; a resume can always be built from this alone.
 */
export type ResumableState = {
  progressSummary: string;
  nextSteps: string[];
  taskId?: string;
  role?: string;
  /** Reference to the prompt or brief the worker was launched with */
  promptRef?: string;
};

export type PortableCheckpoint = {
  workerId: string;
  sequenceNo: number;
  timestamp: string;
  retryCount: number;
  resumableState: ResumableState;
};

export type LocalCheckpointDetail = {
  lastHeartbeatAt: string | null;
  notes: string[];
  /** Opaque worker scratch data */
  scratch: JsonObject;
};

/**
 * Richer, machine-local form of the same checkpoint. Optional for resume.
 */
export type LocalCheckpoint = PortableCheckpoint & {
  detail: LocalCheckpointDetail;
};

export type CheckpointWriteResult = {
  /** Location of the committed YAML form */
  portableRef: string;
  /** Location of the local JSON form */
  localRef: string;
};

/**
 * CheckpointStore - two-tier checkpoint persistence.
 *
 * `write` stores the portable form first, then the local one, each with an
 * atomic replace; it resolves only when both are durable.
 */
export interface CheckpointStore {
  write(checkpoint: LocalCheckpoint): Promise<CheckpointWriteResult>;

  /** One more than the highest sequence number seen in either tier */
  nextSequence(workerId: string): Promise<number>;

  latestPortable(workerId: string): Promise<PortableCheckpoint | null>;

  latestLocal(workerId: string): Promise<LocalCheckpoint | null>;

  /** Readable portable checkpoints, oldest first */
  listPortable(workerId: string): Promise<PortableCheckpoint[]>;
}
