import { Reconciler } from './reconciler';
import { ReconcileError } from './reconciler.errors';
import { MemoryRecordStore } from '../record_store/memory/memory_record_store';
import { MemoryRecordProjection } from '../record_projection/memory/memory_record_projection';
import { CacheCorruptionError } from '../record_projection/record_projection.errors';
import { buildIndices } from '../record_projection/cache_indices';
import { ValidationFailedError } from '../validation/validation.errors';

const BOARD = [
  'columns: [backlog, in_progress, done]',
  'tasks:',
  '  - id: T-1',
  '    title: Write parser',
  '    status: in_progress',
  '  - id: T-2',
  '    title: Write docs',
  '    status: backlog',
  '  - id: T-3',
  '    title: Cut release',
  '    status: backlog',
  '',
].join('\n');

const TEAM = 'roles:\n  - id: dev\n    name: Developer\n';

describe('Reconciler', () => {
  let store: MemoryRecordStore;
  let projection: MemoryRecordProjection;
  let reconciler: Reconciler;

  beforeEach(() => {
    store = new MemoryRecordStore({ 'board.yaml': BOARD, 'team.yaml': TEAM }, () => new Date('2026-01-02T00:00:00.000Z'));
    projection = new MemoryRecordProjection();
    reconciler = new Reconciler({
      recordStore: store,
      projection,
      clock: () => new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  it('should count tasks by status after reconcile', async () => {
    const result = await reconciler.reconcile();

    expect(result.rowCount).toBe(4);
    expect(await reconciler.cache.countBy('task', 'status')).toEqual({ backlog: 2, in_progress: 1 });
  });

  it('should derive rows sorted by collection then id', async () => {
    const { snapshot } = await reconciler.reconcile();

    expect(snapshot.rows.map((r) => r.key)).toEqual(['roles/dev', 'tasks/T-1', 'tasks/T-2', 'tasks/T-3']);
    expect(snapshot.rows[0]).toMatchObject({
      collection: 'roles',
      kind: 'role',
      id: 'dev',
      status: null,
      payload: { name: 'Developer' },
      updatedAt: null,
    });
    expect(snapshot.indices).toEqual({
      countsByKind: { role: 1, task: 3 },
      countsByStatus: { task: { in_progress: 1, backlog: 2 } },
    });
  });

  it('should produce identical rows when rebuilt from an empty cache', async () => {
    const first = await reconciler.reconcile();
    await projection.clear();
    const second = await reconciler.reconcile();

    expect(second.snapshot.rows).toEqual(first.snapshot.rows);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.changed).toBe(true);
  });

  it('should report unchanged when the store did not change', async () => {
    await reconciler.reconcile();
    const again = await reconciler.reconcile();

    expect(again.changed).toBe(false);
  });

  it('should drop rows of deleted records and replace divergent ones', async () => {
    await reconciler.reconcile();
    await store.deleteRecord('task', 'T-3');
    await store.putRecord('task', { id: 'T-1', payload: { title: 'Write parser', status: 'done' } });

    const { snapshot } = await reconciler.reconcile();

    expect(snapshot.rows.map((r) => r.key)).toEqual(['roles/dev', 'tasks/T-1', 'tasks/T-2']);
    expect(await reconciler.cache.getRow('task', 'T-1')).toMatchObject({
      status: 'done',
      updatedAt: '2026-01-02T00:00:00.000Z',
    });
    expect(await reconciler.cache.countBy('task', 'status')).toEqual({ backlog: 1, done: 1 });
  });

  it('should keep the prior cache when a file fails to parse', async () => {
    const { snapshot } = await reconciler.reconcile();
    store.setFile('team.yaml', 'roles:\n  - id: dev\n  - id: dev\n');

    const error = await reconciler.reconcile().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReconcileError);
    if (error instanceof ReconcileError) {
      expect(error.file).toBe('team.yaml');
      expect(error.message).toContain("duplicate id 'dev'");
    }
    expect(await projection.read()).toEqual(snapshot);
  });

  it('should refuse to reconcile a store that fails validation', async () => {
    store.setFile('board.yaml', 'tasks:\n  - id: T-1\n    status: backlog\n');

    const error = await reconciler.reconcile().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReconcileError);
    if (error instanceof ReconcileError) {
      expect(error.file).toBe('board.yaml');
      expect(error.cause).toBeInstanceOf(ValidationFailedError);
    }
    expect(await projection.exists()).toBe(false);
  });

  it('should rebuild over a corrupted cache with recover', async () => {
    projection.setRaw({ rows: 'not rows' });
    await expect(reconciler.cache.getSnapshot()).rejects.toBeInstanceOf(CacheCorruptionError);

    const result = await reconciler.recover();

    expect(result.rowCount).toBe(4);
    expect(await reconciler.cache.countBy('task', 'status')).toEqual({ backlog: 2, in_progress: 1 });
  });

  describe('installSnapshot', () => {
    it('should install a snapshot whose fingerprint matches the store', async () => {
      const { snapshot } = await reconciler.reconcile();
      await projection.clear();

      expect(await reconciler.installSnapshot(snapshot)).toBe(true);
      expect(await projection.read()).toEqual(snapshot);
    });

    it('should ignore a snapshot taken from a different store', async () => {
      const { snapshot } = await reconciler.reconcile();
      await store.putRecord('task', { id: 'T-4', payload: { title: 'New', status: 'backlog' } });
      await projection.clear();

      expect(await reconciler.installSnapshot(snapshot)).toBe(false);
      expect(await projection.exists()).toBe(false);
    });

    it('should ignore a snapshot whose indices disagree with its rows', async () => {
      const { snapshot } = await reconciler.reconcile();
      await projection.clear();

      const tampered = { ...snapshot, indices: { ...snapshot.indices, countsByKind: { task: 99 } } };

      expect(await reconciler.installSnapshot(tampered)).toBe(false);
    });

    it('should ignore a snapshot with missing rows', async () => {
      const { snapshot } = await reconciler.reconcile();
      const rows = snapshot.rows.slice(1);

      expect(await reconciler.installSnapshot({ ...snapshot, rows, indices: buildIndices(rows) })).toBe(false);
    });
  });
});
