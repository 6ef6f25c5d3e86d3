import { MemoryEventLog } from './memory_event_log';
import type { LogEvent } from '../event_log.types';

describe('MemoryEventLog', () => {
  let now: Date;
  let log: MemoryEventLog;

  beforeEach(() => {
    now = new Date('2026-03-01T12:00:00.000Z');
    log = new MemoryEventLog({ projectId: 'alpha', clock: () => now });
  });

  it('should assign strictly increasing sequence numbers with a local origin', async () => {
    const first = await log.append('init');
    const second = await log.append('command_run', { command: 'status' });

    expect(first).toEqual({
      sequenceNo: 1,
      timestamp: '2026-03-01T12:00:00.000Z',
      kind: 'init',
      payload: {},
      origin: { projectId: 'alpha', sequenceNo: 1 },
    });
    expect(second.sequenceNo).toBe(2);
    expect(second.origin).toEqual({ projectId: 'alpha', sequenceNo: 2 });
    expect(await log.lastSequence()).toBe(2);
  });

  it('should filter by sequence, kind and limit', async () => {
    await log.append('init');
    await log.append('task_transition', { taskId: 'T-1' });
    await log.append('approval', { approvalId: 'A-1' });
    await log.append('task_transition', { taskId: 'T-2' });

    expect((await log.list({ sinceSequence: 2 })).map((e) => e.sequenceNo)).toEqual([3, 4]);
    expect((await log.list({ kinds: ['task_transition'] })).map((e) => e.payload)).toEqual([
      { taskId: 'T-1' },
      { taskId: 'T-2' },
    ]);
    expect((await log.list({ limit: 1 })).map((e) => e.sequenceNo)).toEqual([4]);
  });

  it('should renumber imported events and skip ones already present', async () => {
    await log.append('init');
    const foreign: LogEvent[] = [
      { sequenceNo: 1, timestamp: '2026-02-01T00:00:00.000Z', kind: 'init', payload: {}, origin: { projectId: 'beta', sequenceNo: 1 } },
      { sequenceNo: 2, timestamp: '2026-02-02T00:00:00.000Z', kind: 'export', payload: {}, origin: { projectId: 'beta', sequenceNo: 2 } },
    ];

    expect(await log.appendImported(foreign)).toEqual({ imported: 2, skipped: 0 });
    expect(await log.appendImported(foreign)).toEqual({ imported: 0, skipped: 2 });

    const events = await log.list();
    expect(events.map((e) => [e.sequenceNo, e.origin.projectId, e.origin.sequenceNo])).toEqual([
      [1, 'alpha', 1],
      [2, 'beta', 1],
      [3, 'beta', 2],
    ]);
  });

  it('should skip duplicates inside one import batch', async () => {
    const event: LogEvent = {
      sequenceNo: 7,
      timestamp: '2026-02-01T00:00:00.000Z',
      kind: 'approval',
      payload: {},
      origin: { projectId: 'beta', sequenceNo: 7 },
    };

    expect(await log.appendImported([event, event])).toEqual({ imported: 1, skipped: 1 });
  });

  it('should purge by age without reusing sequence numbers', async () => {
    await log.append('init');
    await log.append('command_run');
    now = new Date('2026-06-01T12:00:00.000Z');

    expect(await log.purgeOlderThan(30)).toBe(2);
    expect(await log.list()).toEqual([]);

    const next = await log.append('export');
    expect(next.sequenceNo).toBe(3);
  });

  it('should keep events inside the retention window', async () => {
    await log.append('init');
    now = new Date('2026-03-05T12:00:00.000Z');
    await log.append('command_run');

    expect(await log.purgeOlderThan(2)).toBe(1);
    expect((await log.list()).map((e) => e.kind)).toEqual(['command_run']);
  });
});
