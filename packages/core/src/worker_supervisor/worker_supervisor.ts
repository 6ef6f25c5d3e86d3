/**
 * WorkerSupervisor - heartbeat polling and checkpoint-based recovery
 *
 * Each tick walks the registered workers in id order and moves them
 * through idle → running → stalled → checkpointed → resuming → running,
 * ending in completed or escalated. A worker that never sends a first
 * heartbeat stalls from idle on the same timeout. A stalled worker is checkpointed and
 * resumed within the same tick when nothing fails along the way.
 *
 * @module worker_supervisor/worker_supervisor
 */

import { assertWorkerId } from '../checkpoint_store/checkpoint_codec';
import type { CheckpointStore, PortableCheckpoint, ResumableState } from '../checkpoint_store/checkpoint_store.types';
import { DEFAULT_RECOVERY_CONFIG } from '../config_manager/config_manager.types';
import type { RecoveryConfig } from '../config_manager/config_manager.types';
import { compareStrings } from '../crypto/checksum';
import type { IEventLog } from '../event_log/event_log.types';
import { createLogger } from '../logger';
import { errorMessage } from '../utils/atomic_write';
import { secondsBetween, systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { LoggingEscalationNotifier } from './escalation_notifier';
import { buildResumeDirective } from './resume_directive';
import {
  HeartbeatFormatError,
  RetryCeilingExceededError,
  TickInProgressError,
  UnknownWorkerError,
  WorkerAlreadyRegisteredError,
} from './worker_supervisor.errors';
import { TERMINAL_STATES } from './worker_supervisor.types';
import type {
  EscalationNotifier,
  Heartbeat,
  HeartbeatStore,
  StateTransition,
  TickResult,
  WorkerLauncher,
  WorkerRecord,
  WorkerRegistration,
  WorkerRegistryStore,
  WorkerState,
} from './worker_supervisor.types';

const logger = createLogger('[WorkerSupervisor] ');

/** stalled → checkpointed → resuming, plus one step of slack */
const MAX_STEPS_PER_WORKER = 4;

export type WorkerSupervisorDependencies = {
  registry: WorkerRegistryStore;
  heartbeats: HeartbeatStore;
  checkpoints: CheckpointStore;
  launcher: WorkerLauncher;
  /** Defaults to LoggingEscalationNotifier */
  notifier?: EscalationNotifier;
  /** Receives worker_stall, worker_checkpoint and worker_resume events */
  eventLog?: IEventLog;
  recovery?: Partial<RecoveryConfig>;
  clock?: Clock;
};

export type CheckpointAllResult = {
  checkpointed: string[];
  failed: string[];
};

type WrittenCheckpoint = {
  sequenceNo: number;
  portableRef: string;
};

export type TickListener = (result: TickResult) => Promise<void> | void;

export class WorkerSupervisor {
  private readonly registry: WorkerRegistryStore;
  private readonly heartbeats: HeartbeatStore;
  private readonly checkpoints: CheckpointStore;
  private readonly launcher: WorkerLauncher;
  private readonly notifier: EscalationNotifier;
  private readonly eventLog: IEventLog | undefined;
  private readonly recovery: RecoveryConfig;
  private readonly clock: Clock;

  private queue: Promise<void> = Promise.resolve();
  private ticking = false;
  private intervalId?: NodeJS.Timeout;

  constructor(dependencies: WorkerSupervisorDependencies) {
    this.registry = dependencies.registry;
    this.heartbeats = dependencies.heartbeats;
    this.checkpoints = dependencies.checkpoints;
    this.launcher = dependencies.launcher;
    this.notifier = dependencies.notifier ?? new LoggingEscalationNotifier();
    this.eventLog = dependencies.eventLog;
    this.recovery = { ...DEFAULT_RECOVERY_CONFIG, ...dependencies.recovery };
    this.clock = dependencies.clock ?? systemClock;
  }

  /**
   * @throws WorkerAlreadyRegisteredError when the id is taken
   * @throws InvalidWorkerIdError when the id is not a single safe path segment
   */
  async register(registration: WorkerRegistration): Promise<WorkerRecord> {
    assertWorkerId(registration.workerId);
    return this.exclusive(async () => {
      const records = await this.registry.load();
      if (records.some((record) => record.workerId === registration.workerId)) {
        throw new WorkerAlreadyRegisteredError(registration.workerId);
      }

      const now = this.clock().toISOString();
      const record: WorkerRecord = {
        workerId: registration.workerId,
        state: 'idle',
        retryCount: 0,
        registeredAt: now,
        startedAt: now,
        stateChangedAt: now,
        lastHeartbeatAt: null,
        resumeStartedAt: null,
        lastCheckpointSeq: null,
        lastResumableState: null,
        lastError: null,
      };
      if (registration.taskId !== undefined) record.taskId = registration.taskId;
      if (registration.role !== undefined) record.role = registration.role;
      if (registration.promptRef !== undefined) record.promptRef = registration.promptRef;

      await this.registry.save([...records, record]);
      logger.info(`Registered worker ${record.workerId}`);
      return record;
    });
  }

  /**
   * Human action after an escalation (or any time): clears retries and
   * puts the worker back to idle. Heartbeats from before the restart are
   * ignored from then on.
   */
  async restart(workerId: string): Promise<WorkerRecord> {
    return this.exclusive(async () => {
      const records = await this.registry.load();
      const record = records.find((candidate) => candidate.workerId === workerId);
      if (!record) {
        throw new UnknownWorkerError(workerId);
      }

      const now = this.clock().toISOString();
      record.state = 'idle';
      record.retryCount = 0;
      record.startedAt = now;
      record.stateChangedAt = now;
      record.lastHeartbeatAt = null;
      record.resumeStartedAt = null;
      record.lastError = null;

      await this.registry.save(records);
      logger.info(`Restarted worker ${workerId}`);
      return record;
    });
  }

  async get(workerId: string): Promise<WorkerRecord | null> {
    const records = await this.registry.load();
    return records.find((record) => record.workerId === workerId) ?? null;
  }

  async list(): Promise<WorkerRecord[]> {
    const records = await this.registry.load();
    return records.sort((a, b) => compareStrings(a.workerId, b.workerId));
  }

  /**
   * One supervision pass over every worker.
   *
   * @throws TickInProgressError when called while a tick is running
   */
  async tick(): Promise<TickResult> {
    if (this.ticking) {
      throw new TickInProgressError();
    }
    this.ticking = true;
    try {
      return await this.exclusive(() => this.runTick());
    } finally {
      this.ticking = false;
    }
  }

  /**
   * Checkpoints every running or resuming worker without changing its
   * state. Used by force-sync so committed checkpoints are current.
   */
  async checkpointAll(): Promise<CheckpointAllResult> {
    return this.exclusive(async () => {
      const records = (await this.registry.load()).sort((a, b) => compareStrings(a.workerId, b.workerId));
      const now = this.clock();
      const result: CheckpointAllResult = { checkpointed: [], failed: [] };

      for (const record of records.filter((r) => r.state === 'running' || r.state === 'resuming')) {
        let written: WrittenCheckpoint;
        try {
          written = await this.writeCheckpoint(record, now);
        } catch (error) {
          record.lastError = errorMessage(error);
          logger.error(`Checkpoint for ${record.workerId} failed: ${record.lastError}`);
          result.failed.push(record.workerId);
          continue;
        }
        record.lastCheckpointSeq = written.sequenceNo;
        result.checkpointed.push(record.workerId);
        await this.eventLog?.append('worker_checkpoint', {
          workerId: record.workerId,
          sequenceNo: written.sequenceNo,
          portableRef: written.portableRef,
          reason: 'force_sync',
        });
      }

      await this.registry.save(records);
      return result;
    });
  }

  /**
   * Starts polling every `tickIntervalSeconds`. Idempotent; a period that
   * fires while the previous tick is still running is skipped.
   */
  start(listener?: TickListener): void {
    if (this.intervalId !== undefined) {
      return;
    }
    this.intervalId = setInterval(() => {
      void this.scheduledTick(listener);
    }, this.recovery.tickIntervalSeconds * 1000);
  }

  stop(): void {
    if (this.intervalId === undefined) {
      return;
    }
    clearInterval(this.intervalId);
    this.intervalId = undefined;
  }

  isRunning(): boolean {
    return this.intervalId !== undefined;
  }

  private async scheduledTick(listener?: TickListener): Promise<void> {
    if (this.ticking) {
      return;
    }
    try {
      const result = await this.tick();
      await listener?.(result);
    } catch (error) {
      logger.error(`Scheduled tick failed: ${errorMessage(error)}`);
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runTick(): Promise<TickResult> {
    const records = (await this.registry.load()).sort((a, b) => compareStrings(a.workerId, b.workerId));
    const transitions: StateTransition[] = [];

    for (const record of records) {
      if (TERMINAL_STATES.includes(record.state)) {
        continue;
      }
      try {
        await this.superviseWorker(record, transitions);
      } catch (error) {
        record.lastError = errorMessage(error);
        logger.error(`Supervising ${record.workerId} failed: ${record.lastError}`);
      }
    }

    await this.registry.save(records);

    const states: Record<string, WorkerState> = {};
    for (const record of records) {
      states[record.workerId] = record.state;
    }
    return { states, transitions };
  }

  private async superviseWorker(record: WorkerRecord, transitions: StateTransition[]): Promise<void> {
    const now = this.clock();
    const heartbeat = await this.readHeartbeat(record);
    if (heartbeat) {
      this.absorbHeartbeat(record, heartbeat);
      if (heartbeat.status === 'completed') {
        this.transition(record, 'completed', 'worker reported completion', now, transitions);
        return;
      }
    }

    for (let step = 0; step < MAX_STEPS_PER_WORKER; step++) {
      const before = record.state;
      await this.advance(record, heartbeat, now, transitions);
      if (record.state === before || TERMINAL_STATES.includes(record.state)) {
        return;
      }
    }
  }

  private async advance(
    record: WorkerRecord,
    heartbeat: Heartbeat | null,
    now: Date,
    transitions: StateTransition[],
  ): Promise<void> {
    switch (record.state) {
      case 'idle': {
        if (heartbeat) {
          this.transition(record, 'running', 'first heartbeat', now, transitions);
          return;
        }
        const waitedFor = secondsBetween(record.stateChangedAt, now);
        if (waitedFor > this.recovery.stallTimeoutSeconds) {
          await this.stall(record, `no first heartbeat after ${Math.floor(waitedFor)}s`, now, transitions);
        }
        return;
      }

      case 'running': {
        const silentFor = secondsBetween(record.lastHeartbeatAt ?? record.stateChangedAt, now);
        if (silentFor > this.recovery.stallTimeoutSeconds) {
          await this.stall(record, `no heartbeat for ${Math.floor(silentFor)}s`, now, transitions);
        }
        return;
      }

      case 'stalled':
        await this.checkpoint(record, now, transitions);
        return;

      case 'checkpointed':
        await this.handOff(record, now, transitions);
        return;

      case 'resuming': {
        const resumeStartedAt = record.resumeStartedAt ?? record.stateChangedAt;
        if (heartbeat && Date.parse(heartbeat.timestamp) > Date.parse(resumeStartedAt)) {
          record.retryCount = 0;
          record.resumeStartedAt = null;
          this.transition(record, 'running', 'heartbeat after resume', now, transitions);
          return;
        }
        if (secondsBetween(resumeStartedAt, now) > this.recovery.stallTimeoutSeconds) {
          record.retryCount += 1;
          if (record.retryCount >= this.recovery.maxRetries) {
            await this.escalate(record, now, transitions);
          } else {
            await this.stall(record, `no heartbeat after resume attempt ${record.retryCount}`, now, transitions);
          }
        }
        return;
      }

      case 'completed':
      case 'escalated':
        return;
    }
  }

  private async stall(record: WorkerRecord, reason: string, now: Date, transitions: StateTransition[]): Promise<void> {
    this.transition(record, 'stalled', reason, now, transitions);
    await this.eventLog?.append('worker_stall', {
      workerId: record.workerId,
      retryCount: record.retryCount,
      lastHeartbeatAt: record.lastHeartbeatAt,
    });
    if (!this.recovery.checkpointEnabled) {
      logger.warn(`Checkpointing is disabled; ${record.workerId} stays stalled until restarted`);
    }
  }

  private async checkpoint(record: WorkerRecord, now: Date, transitions: StateTransition[]): Promise<void> {
    if (!this.recovery.checkpointEnabled) {
      return;
    }

    let written: WrittenCheckpoint;
    try {
      written = await this.writeCheckpoint(record, now);
    } catch (error) {
      record.lastError = errorMessage(error);
      logger.error(`Checkpoint for ${record.workerId} failed, retrying next tick: ${record.lastError}`);
      return;
    }

    const { sequenceNo, portableRef } = written;
    record.lastCheckpointSeq = sequenceNo;
    record.lastError = null;
    this.transition(record, 'checkpointed', `checkpoint ${sequenceNo} written`, now, transitions);
    await this.eventLog?.append('worker_checkpoint', {
      workerId: record.workerId,
      sequenceNo,
      portableRef,
    });
  }

  private async writeCheckpoint(record: WorkerRecord, now: Date): Promise<WrittenCheckpoint> {
    const sequenceNo = await this.checkpoints.nextSequence(record.workerId);
    const { portableRef } = await this.checkpoints.write({
      workerId: record.workerId,
      sequenceNo,
      timestamp: now.toISOString(),
      retryCount: record.retryCount,
      resumableState: this.resumableStateOf(record),
      detail: {
        lastHeartbeatAt: record.lastHeartbeatAt,
        notes: record.notes ?? [],
        scratch: record.scratch ?? {},
      },
    });
    return { sequenceNo, portableRef };
  }

  private async handOff(record: WorkerRecord, now: Date, transitions: StateTransition[]): Promise<void> {
    // Only the portable tier is consulted: it is the one every machine has
    const checkpoint = await this.checkpoints.latestPortable(record.workerId);
    if (!checkpoint) {
      this.transition(record, 'stalled', 'portable checkpoint missing', now, transitions);
      return;
    }

    const directive = buildResumeDirective(checkpoint, record.retryCount + 1, now);
    try {
      await this.launcher.resume(directive);
    } catch (error) {
      record.lastError = errorMessage(error);
      logger.error(`Resume hand-off for ${record.workerId} failed, retrying next tick: ${record.lastError}`);
      return;
    }

    record.resumeStartedAt = now.toISOString();
    record.lastError = null;
    this.transition(
      record,
      'resuming',
      `resume attempt ${directive.attempt} from checkpoint ${checkpoint.sequenceNo}`,
      now,
      transitions,
    );
    await this.eventLog?.append('worker_resume', {
      workerId: record.workerId,
      checkpointSequence: checkpoint.sequenceNo,
      attempt: directive.attempt,
    });
  }

  private async escalate(record: WorkerRecord, now: Date, transitions: StateTransition[]): Promise<void> {
    const error = new RetryCeilingExceededError(record.workerId, record.retryCount, this.recovery.maxRetries);
    this.transition(record, 'escalated', error.message, now, transitions);

    let lastCheckpoint: PortableCheckpoint | null = null;
    try {
      lastCheckpoint = await this.checkpoints.latestPortable(record.workerId);
    } catch (readError) {
      logger.warn(`Escalating ${record.workerId} without its last checkpoint: ${errorMessage(readError)}`);
    }
    try {
      await this.notifier.notify({
        workerId: record.workerId,
        retryCount: record.retryCount,
        maxRetries: this.recovery.maxRetries,
        lastCheckpoint,
        error,
        at: now.toISOString(),
      });
    } catch (notifyError) {
      logger.error(`Escalation notice for ${record.workerId} was not delivered: ${errorMessage(notifyError)}`);
    }
  }

  /**
   * Latest heartbeat of the current run, or null. An unreadable heartbeat
   * counts as silence.
   */
  private async readHeartbeat(record: WorkerRecord): Promise<Heartbeat | null> {
    let heartbeat: Heartbeat | null;
    try {
      heartbeat = await this.heartbeats.read(record.workerId);
    } catch (error) {
      if (error instanceof HeartbeatFormatError) {
        logger.warn(error.message);
        return null;
      }
      throw error;
    }
    if (!heartbeat || Date.parse(heartbeat.timestamp) < Date.parse(record.startedAt)) {
      return null;
    }
    return heartbeat;
  }

  private absorbHeartbeat(record: WorkerRecord, heartbeat: Heartbeat): void {
    if (record.lastHeartbeatAt !== null && Date.parse(heartbeat.timestamp) <= Date.parse(record.lastHeartbeatAt)) {
      return;
    }
    record.lastHeartbeatAt = heartbeat.timestamp;
    if (heartbeat.resumableState) record.lastResumableState = heartbeat.resumableState;
    if (heartbeat.notes) record.notes = heartbeat.notes;
    if (heartbeat.scratch) record.scratch = heartbeat.scratch;
  }

  private resumableStateOf(record: WorkerRecord): ResumableState {
    const state: ResumableState = record.lastResumableState ?? {
      progressSummary: 'No progress was reported before the stall.',
      nextSteps: [],
    };
    return {
      ...(record.taskId !== undefined ? { taskId: record.taskId } : {}),
      ...(record.role !== undefined ? { role: record.role } : {}),
      ...(record.promptRef !== undefined ? { promptRef: record.promptRef } : {}),
      ...state,
    };
  }

  private transition(
    record: WorkerRecord,
    to: WorkerState,
    reason: string,
    now: Date,
    transitions: StateTransition[],
  ): void {
    const from = record.state;
    record.state = to;
    record.stateChangedAt = now.toISOString();
    transitions.push({ workerId: record.workerId, from, to, at: record.stateChangedAt, reason });
    logger.info(`${record.workerId}: ${from} -> ${to} (${reason})`);
  }
}

