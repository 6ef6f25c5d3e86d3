import { WorkerSupervisor } from './worker_supervisor';
import { WorkerChannel } from './worker_channel';
import {
  RetryCeilingExceededError,
  TickInProgressError,
  UnknownWorkerError,
  WorkerAlreadyRegisteredError,
} from './worker_supervisor.errors';
import type { RecoveryConfig } from '../config_manager/config_manager.types';
import type { TickResult } from './worker_supervisor.types';
import { MemoryEscalationNotifier, MemoryHeartbeatStore, MemoryWorkerLauncher, MemoryWorkerRegistry } from './memory';
import { MemoryCheckpointStore } from '../checkpoint_store/memory/memory_checkpoint_store';
import { InvalidWorkerIdError } from '../checkpoint_store/checkpoint_store.errors';
import { MemoryEventLog } from '../event_log/memory/memory_event_log';

const START = Date.parse('2026-03-01T10:00:00.000Z');

describe('WorkerSupervisor', () => {
  let now: Date;
  let heartbeats: MemoryHeartbeatStore;
  let checkpoints: MemoryCheckpointStore;
  let launcher: MemoryWorkerLauncher;
  let notifier: MemoryEscalationNotifier;
  let eventLog: MemoryEventLog;

  const clock = () => now;
  const at = (seconds: number) => {
    now = new Date(START + seconds * 1000);
  };

  function createSupervisor(recovery: Partial<RecoveryConfig> = {}): WorkerSupervisor {
    return new WorkerSupervisor({
      registry: new MemoryWorkerRegistry(),
      heartbeats,
      checkpoints,
      launcher,
      notifier,
      eventLog,
      recovery: { stallTimeoutSeconds: 60, maxRetries: 3, ...recovery },
      clock,
    });
  }

  beforeEach(() => {
    at(0);
    heartbeats = new MemoryHeartbeatStore();
    checkpoints = new MemoryCheckpointStore();
    launcher = new MemoryWorkerLauncher();
    notifier = new MemoryEscalationNotifier();
    eventLog = new MemoryEventLog({ projectId: 'demo', clock });
  });

  describe('register / restart', () => {
    it('should register workers as idle', async () => {
      const supervisor = createSupervisor();

      const record = await supervisor.register({ workerId: 'w1', taskId: 'T-1' });

      expect(record.state).toBe('idle');
      expect(record.retryCount).toBe(0);
      expect(record.registeredAt).toBe('2026-03-01T10:00:00.000Z');
      expect(await supervisor.get('w1')).toEqual(record);
      expect(await supervisor.get('missing')).toBeNull();
    });

    it('should reject duplicate and unsafe worker ids', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });

      await expect(supervisor.register({ workerId: 'w1' })).rejects.toBeInstanceOf(WorkerAlreadyRegisteredError);
      await expect(supervisor.register({ workerId: '../w2' })).rejects.toBeInstanceOf(InvalidWorkerIdError);
    });

    it('should list workers in id order', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w2' });
      await supervisor.register({ workerId: 'w1' });

      const ids = (await supervisor.list()).map((record) => record.workerId);

      expect(ids).toEqual(['w1', 'w2']);
    });

    it('should fail to restart an unknown worker', async () => {
      const supervisor = createSupervisor();

      await expect(supervisor.restart('ghost')).rejects.toBeInstanceOf(UnknownWorkerError);
    });

    it('should ignore heartbeats from before a restart', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });
      at(1);
      await new WorkerChannel('w1', heartbeats, clock).complete();
      expect((await supervisor.tick()).states).toEqual({ w1: 'completed' });

      at(50);
      const restarted = await supervisor.restart('w1');
      at(60);
      const result = await supervisor.tick();

      expect(restarted.state).toBe('idle');
      expect(restarted.startedAt).toBe('2026-03-01T10:00:50.000Z');
      expect(result).toEqual({ states: { w1: 'idle' }, transitions: [] });
    });
  });

  describe('tick', () => {
    it('should move an idle worker to running on its first heartbeat', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });
      at(10);
      await new WorkerChannel('w1', heartbeats, clock).heartbeat();

      const result = await supervisor.tick();

      expect(result.states).toEqual({ w1: 'running' });
      expect(result.transitions).toEqual([
        { workerId: 'w1', from: 'idle', to: 'running', at: '2026-03-01T10:00:10.000Z', reason: 'first heartbeat' },
      ]);
      expect((await supervisor.get('w1'))?.lastHeartbeatAt).toBe('2026-03-01T10:00:10.000Z');
    });

    it('should leave a worker without heartbeats idle until the stall timeout', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });
      at(60);

      const result = await supervisor.tick();

      expect(result).toEqual({ states: { w1: 'idle' }, transitions: [] });
    });

    it('should stall and resume a worker that never sends a first heartbeat', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1', taskId: 'T-1' });
      at(61);

      const result = await supervisor.tick();

      expect(result.states).toEqual({ w1: 'resuming' });
      expect(result.transitions[0]).toEqual({
        workerId: 'w1',
        from: 'idle',
        to: 'stalled',
        at: '2026-03-01T10:01:01.000Z',
        reason: 'no first heartbeat after 61s',
      });
      expect(result.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        'idle->stalled',
        'stalled->checkpointed',
        'checkpointed->resuming',
      ]);
      expect(launcher.getDirectives().map((d) => d.checkpointSequence)).toEqual([1]);
    });

    it('should still notify when the last checkpoint cannot be read at escalation', async () => {
      const supervisor = createSupervisor({ maxRetries: 1 });
      await supervisor.register({ workerId: 'w1' });
      at(61);
      await supervisor.tick();

      jest.spyOn(checkpoints, 'latestPortable').mockRejectedValueOnce(new Error('checkpoint unreadable'));
      at(122);
      const result = await supervisor.tick();

      expect(result.states).toEqual({ w1: 'escalated' });
      const notices = notifier.getNotices();
      expect(notices).toHaveLength(1);
      expect(notices[0]?.lastCheckpoint).toBeNull();
      expect(notices[0]?.error).toBeInstanceOf(RetryCeilingExceededError);
    });

    it('should stall, checkpoint, resume and finally escalate a silent worker', async () => {
      const supervisor = createSupervisor();
      const channel = new WorkerChannel('w1', heartbeats, clock);
      await supervisor.register({ workerId: 'w1', taskId: 'T-1' });
      at(10);
      await channel.heartbeat({
        resumableState: { progressSummary: 'Parsed 2 of 5 files', nextSteps: ['Parse c.ts'] },
      });
      await supervisor.tick();

      at(100);
      const stalledTick = await supervisor.tick();

      expect(stalledTick.states).toEqual({ w1: 'resuming' });
      expect(stalledTick.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        'running->stalled',
        'stalled->checkpointed',
        'checkpointed->resuming',
      ]);
      expect(await checkpoints.latestPortable('w1')).toEqual({
        workerId: 'w1',
        sequenceNo: 1,
        timestamp: '2026-03-01T10:01:40.000Z',
        retryCount: 0,
        resumableState: { taskId: 'T-1', progressSummary: 'Parsed 2 of 5 files', nextSteps: ['Parse c.ts'] },
      });

      at(170);
      expect((await supervisor.tick()).states).toEqual({ w1: 'resuming' });
      at(240);
      expect((await supervisor.tick()).states).toEqual({ w1: 'resuming' });
      at(310);
      const escalatedTick = await supervisor.tick();

      expect(escalatedTick.states).toEqual({ w1: 'escalated' });
      expect(escalatedTick.transitions.map((t) => `${t.from}->${t.to}`)).toEqual(['resuming->escalated']);

      at(1000);
      expect(await supervisor.tick()).toEqual({ states: { w1: 'escalated' }, transitions: [] });

      const directives = launcher.getDirectives();
      expect(directives.map((d) => [d.attempt, d.checkpointSequence])).toEqual([
        [1, 1],
        [2, 2],
        [3, 3],
      ]);

      const notices = notifier.getNotices();
      expect(notices).toHaveLength(1);
      expect(notices[0]?.retryCount).toBe(3);
      expect(notices[0]?.lastCheckpoint?.sequenceNo).toBe(3);
      expect(notices[0]?.error).toBeInstanceOf(RetryCeilingExceededError);
      expect(notices[0]?.error.message).toBe('Worker w1 failed to resume 3 time(s) (ceiling 3)');

      const kinds = (await eventLog.list()).map((event) => event.kind);
      expect(kinds).toEqual([
        'worker_stall',
        'worker_checkpoint',
        'worker_resume',
        'worker_stall',
        'worker_checkpoint',
        'worker_resume',
        'worker_stall',
        'worker_checkpoint',
        'worker_resume',
      ]);
    });

    it('should reset the retry count once a resumed worker reports', async () => {
      const supervisor = createSupervisor();
      const channel = new WorkerChannel('w1', heartbeats, clock);
      await supervisor.register({ workerId: 'w1' });
      at(10);
      await channel.heartbeat();
      await supervisor.tick();
      at(100);
      await supervisor.tick();
      at(170);
      await supervisor.tick();
      expect((await supervisor.get('w1'))?.retryCount).toBe(1);

      at(180);
      await channel.heartbeat();
      const result = await supervisor.tick();

      expect(result.transitions).toEqual([
        { workerId: 'w1', from: 'resuming', to: 'running', at: '2026-03-01T10:03:00.000Z', reason: 'heartbeat after resume' },
      ]);
      const record = await supervisor.get('w1');
      expect(record?.retryCount).toBe(0);
      expect(record?.resumeStartedAt).toBeNull();
    });

    it('should resume from the portable checkpoint alone', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w2', taskId: 'T-9', role: 'builder' });
      at(5);
      await new WorkerChannel('w2', heartbeats, clock).heartbeat({
        resumableState: { progressSummary: 'Drafted intro', nextSteps: ['Write body'] },
        notes: ['outline approved'],
      });
      await supervisor.tick();

      at(200);
      launcher.failNext(1);
      const failedHandOff = await supervisor.tick();

      expect(failedHandOff.states).toEqual({ w2: 'checkpointed' });
      expect((await supervisor.get('w2'))?.lastError).toBe('Launcher unavailable for w2');
      expect((await checkpoints.latestLocal('w2'))?.detail.notes).toEqual(['outline approved']);

      checkpoints.dropLocalTier();
      expect(await checkpoints.latestLocal('w2')).toBeNull();

      at(230);
      const retried = await supervisor.tick();

      expect(retried.states).toEqual({ w2: 'resuming' });
      expect(launcher.getDirectives()).toEqual([
        {
          workerId: 'w2',
          checkpointSequence: 1,
          attempt: 1,
          issuedAt: '2026-03-01T10:03:50.000Z',
          resumableState: {
            taskId: 'T-9',
            role: 'builder',
            progressSummary: 'Drafted intro',
            nextSteps: ['Write body'],
          },
        },
      ]);
      expect((await supervisor.get('w2'))?.lastError).toBeNull();
    });

    it('should keep a worker stalled when the checkpoint write fails', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w3' });
      at(1);
      await new WorkerChannel('w3', heartbeats, clock).heartbeat();
      await supervisor.tick();

      at(100);
      jest.spyOn(checkpoints, 'write').mockRejectedValueOnce(new Error('disk full'));
      const failed = await supervisor.tick();

      expect(failed.states).toEqual({ w3: 'stalled' });
      expect((await supervisor.get('w3'))?.lastError).toBe('disk full');
      expect(await checkpoints.latestPortable('w3')).toBeNull();

      at(110);
      const retried = await supervisor.tick();

      expect(retried.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        'stalled->checkpointed',
        'checkpointed->resuming',
      ]);
      expect((await checkpoints.latestPortable('w3'))?.sequenceNo).toBe(1);
    });

    it('should leave stalled workers alone when checkpointing is disabled', async () => {
      const supervisor = createSupervisor({ checkpointEnabled: false });
      await supervisor.register({ workerId: 'w1' });
      at(1);
      await new WorkerChannel('w1', heartbeats, clock).heartbeat();
      await supervisor.tick();

      at(100);
      const result = await supervisor.tick();

      expect(result.states).toEqual({ w1: 'stalled' });
      expect(await checkpoints.latestPortable('w1')).toBeNull();
      expect(launcher.getDirectives()).toEqual([]);
    });

    it('should complete a worker that reports completion', async () => {
      const supervisor = createSupervisor();
      const channel = new WorkerChannel('w1', heartbeats, clock);
      await supervisor.register({ workerId: 'w1' });
      at(10);
      await channel.heartbeat();
      await supervisor.tick();

      at(20);
      await channel.complete();
      const result = await supervisor.tick();

      expect(result.transitions).toEqual([
        { workerId: 'w1', from: 'running', to: 'completed', at: '2026-03-01T10:00:20.000Z', reason: 'worker reported completion' },
      ]);
      at(5000);
      expect(await supervisor.tick()).toEqual({ states: { w1: 'completed' }, transitions: [] });
    });

    it('should treat an unreadable heartbeat as silence', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });
      heartbeats.setRaw('w1', '{"workerId": "w1"');

      const result = await supervisor.tick();

      expect(result).toEqual({ states: { w1: 'idle' }, transitions: [] });
    });

    it('should refuse a tick while another is running', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });

      const first = supervisor.tick();
      await expect(supervisor.tick()).rejects.toBeInstanceOf(TickInProgressError);
      await expect(first).resolves.toEqual({ states: { w1: 'idle' }, transitions: [] });
    });
  });

  describe('checkpointAll', () => {
    it('should checkpoint running workers without changing their state', async () => {
      const supervisor = createSupervisor();
      await supervisor.register({ workerId: 'w1' });
      await supervisor.register({ workerId: 'w2' });
      at(10);
      await new WorkerChannel('w1', heartbeats, clock).heartbeat({
        resumableState: { progressSummary: 'Halfway', nextSteps: ['Finish'] },
      });
      await supervisor.tick();

      const result = await supervisor.checkpointAll();

      expect(result).toEqual({ checkpointed: ['w1'], failed: [] });
      expect((await supervisor.get('w1'))?.state).toBe('running');
      expect((await supervisor.get('w1'))?.lastCheckpointSeq).toBe(1);
      expect((await checkpoints.latestPortable('w1'))?.resumableState.progressSummary).toBe('Halfway');
      const [event] = await eventLog.list({ kinds: ['worker_checkpoint'] });
      expect(event?.payload).toEqual({
        workerId: 'w1',
        sequenceNo: 1,
        portableRef: 'portable/w1/000001.yaml',
        reason: 'force_sync',
      });
    });
  });

  describe('start / stop', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('should tick on the configured interval until stopped', async () => {
      jest.useFakeTimers();
      const supervisor = createSupervisor({ tickIntervalSeconds: 30 });
      await supervisor.register({ workerId: 'w1' });

      const ticked = new Promise<TickResult>((resolve) => supervisor.start(resolve));
      expect(supervisor.isRunning()).toBe(true);
      jest.advanceTimersByTime(30_000);

      await expect(ticked).resolves.toEqual({ states: { w1: 'idle' }, transitions: [] });
      supervisor.stop();
      expect(supervisor.isRunning()).toBe(false);
    });
  });
});
