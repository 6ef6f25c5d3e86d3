import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StatusRenderer, boardColumns } from './status_renderer';
import { Reconciler } from '../reconciler/reconciler';
import { MemoryRecordProjection } from '../record_projection/memory/memory_record_projection';
import { MemoryRecordStore } from '../record_store/memory/memory_record_store';

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
  '    title: Write tests',
  '    status: backlog',
  '',
].join('\n');

describe('StatusRenderer', () => {
  let tempDir: string;
  const clock = () => new Date('2026-03-01T12:00:00.000Z');

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'status-renderer-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read board columns from the record store', async () => {
    const store = new MemoryRecordStore({ 'board.yaml': BOARD }, clock);

    expect(boardColumns(await store.load())).toEqual(['backlog', 'in_progress', 'done']);
    expect(boardColumns(await new MemoryRecordStore({}, clock).load())).toBeNull();
  });

  it('should write STATUS.md and DECISIONS.md from the reconciled cache', async () => {
    const store = new MemoryRecordStore({ 'board.yaml': BOARD }, clock);
    const reconciler = new Reconciler({ recordStore: store, projection: new MemoryRecordProjection(), clock });
    await reconciler.reconcile();
    const renderer = new StatusRenderer({ cache: reconciler.cache, outputDir: path.join(tempDir, '.ai'), clock });

    const rendered = await renderer.render(['backlog', 'in_progress', 'done']);

    expect(rendered.report.countsByColumn).toEqual({ backlog: 2, in_progress: 1, done: 0 });
    expect(rendered.statusPath).toBe(path.join(tempDir, '.ai', 'STATUS.md'));
    const status = await fs.readFile(rendered.statusPath, 'utf-8');
    expect(status).toContain('## Progress\n[....................] 0%  (0/3 tasks done)\n');
    expect(status).toContain('## Backlog (2)\n- **T-2**: Write docs (owner: unassigned)\n- **T-3**: Write tests (owner: unassigned)\n');
    const decisions = await fs.readFile(rendered.decisionsPath, 'utf-8');
    expect(decisions).toContain('No decisions recorded.\n');
  });

  it('should render an empty project before the first reconcile', async () => {
    const renderer = new StatusRenderer({
      cache: new Reconciler({ recordStore: new MemoryRecordStore({}, clock), projection: new MemoryRecordProjection(), clock }).cache,
      outputDir: tempDir,
      clock,
    });

    const rendered = await renderer.render();

    expect(rendered.report.phase).toBe('Initialization');
    expect(rendered.report.totalTasks).toBe(0);
  });
});
