import type { JsonObject } from '../record_store/record_store.types';
import type { PortableCheckpoint, ResumableState } from '../checkpoint_store/checkpoint_store.types';
import type { RetryCeilingExceededError } from './worker_supervisor.errors';

export const WORKER_STATES = [
  'idle',
  'running',
  'stalled',
  'checkpointed',
  'resuming',
  'completed',
  'escalated',
] as const;

export type WorkerState = (typeof WORKER_STATES)[number];

/** States the supervisor never leaves on its own */
export const TERMINAL_STATES: readonly WorkerState[] = ['completed', 'escalated'];

export type WorkerRegistration = {
  workerId: string;
  taskId?: string;
  role?: string;
  promptRef?: string;
};

/**
 * Supervisor-side view of one worker, persisted in the runtime registry.
 */
export type WorkerRecord = {
  workerId: string;
  state: WorkerState;
  retryCount: number;
  registeredAt: string;
  /** Heartbeats older than this belong to a previous run and are ignored */
  startedAt: string;
  stateChangedAt: string;
  lastHeartbeatAt: string | null;
  resumeStartedAt: string | null;
  lastCheckpointSeq: number | null;
  lastResumableState: ResumableState | null;
  lastError: string | null;
  taskId?: string;
  role?: string;
  promptRef?: string;
  notes?: string[];
  scratch?: JsonObject;
};

export type HeartbeatStatus = 'running' | 'completed';

/**
 * What a worker reports about itself. Overwritten on every beat.
 */
export type Heartbeat = {
  workerId: string;
  timestamp: string;
  status: HeartbeatStatus;
  resumableState?: ResumableState;
  notes?: string[];
  scratch?: JsonObject;
};

export type StateTransition = {
  workerId: string;
  from: WorkerState;
  to: WorkerState;
  at: string;
  reason: string;
};

export type TickResult = {
  states: Record<string, WorkerState>;
  transitions: StateTransition[];
};

/**
 * Instructions handed to a fresh worker. Built from the portable
 * checkpoint alone, so it can be issued on any machine.
 */
export type ResumeDirective = {
  workerId: string;
  checkpointSequence: number;
  /** 1 for the first resume after a stall */
  attempt: number;
  issuedAt: string;
  resumableState: ResumableState;
};

export type EscalationNotice = {
  workerId: string;
  retryCount: number;
  maxRetries: number;
  lastCheckpoint: PortableCheckpoint | null;
  error: RetryCeilingExceededError;
  at: string;
};

export interface WorkerLauncher {
  resume(directive: ResumeDirective): Promise<void>;
}

export interface EscalationNotifier {
  notify(notice: EscalationNotice): Promise<void>;
}

export interface WorkerRegistryStore {
  load(): Promise<WorkerRecord[]>;
  save(records: WorkerRecord[]): Promise<void>;
}

export interface HeartbeatStore {
  /** null when the worker never reported */
  read(workerId: string): Promise<Heartbeat | null>;
  write(heartbeat: Heartbeat): Promise<void>;
}
