import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsCheckpointStore } from './fs_checkpoint_store';
import { InvalidWorkerIdError } from '../checkpoint_store.errors';
import type { LocalCheckpoint } from '../checkpoint_store.types';

function checkpoint(sequenceNo: number, overrides: Partial<LocalCheckpoint> = {}): LocalCheckpoint {
  return {
    workerId: 'w1',
    sequenceNo,
    timestamp: '2026-03-01T12:00:00.000Z',
    retryCount: 0,
    resumableState: {
      progressSummary: `Parsed ${sequenceNo} of 5 files`,
      nextSteps: ['Parse lexer.ts', 'Run tests'],
      taskId: 'T-1',
    },
    detail: { lastHeartbeatAt: '2026-03-01T11:58:00.000Z', notes: ['slow disk'], scratch: { cursor: 42 } },
    ...overrides,
  };
}

describe('FsCheckpointStore', () => {
  let tempDir: string;
  let portableDir: string;
  let localDir: string;
  let store: FsCheckpointStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoint-store-test-'));
    portableDir = path.join(tempDir, '.ai', 'checkpoints');
    localDir = path.join(tempDir, '.ai_runtime', 'checkpoints');
    store = new FsCheckpointStore({ portableDir, localDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write a YAML portable form and a JSON local form', async () => {
    const result = await store.write(checkpoint(1));

    expect(result).toEqual({
      portableRef: path.join(portableDir, 'w1', '000001.yaml'),
      localRef: path.join(localDir, 'w1', '000001.json'),
    });
    const yamlText = await fs.readFile(result.portableRef, 'utf-8');
    expect(yamlText).toContain('worker_id: w1\n');
    expect(yamlText).toContain('  progress_summary: Parsed 1 of 5 files\n');
    expect(yamlText).not.toContain('scratch');
    expect(JSON.parse(await fs.readFile(result.localRef, 'utf-8'))).toEqual(checkpoint(1));
    expect(await fs.readdir(path.join(portableDir, 'w1'))).toEqual(['000001.yaml']);
  });

  it('should read back the latest checkpoint of each tier', async () => {
    await store.write(checkpoint(1));
    await store.write(checkpoint(2, { retryCount: 1 }));

    expect(await store.latestPortable('w1')).toEqual({
      workerId: 'w1',
      sequenceNo: 2,
      timestamp: '2026-03-01T12:00:00.000Z',
      retryCount: 1,
      resumableState: {
        progressSummary: 'Parsed 2 of 5 files',
        nextSteps: ['Parse lexer.ts', 'Run tests'],
        taskId: 'T-1',
      },
    });
    expect((await store.latestLocal('w1'))?.detail.scratch).toEqual({ cursor: 42 });
    expect((await store.listPortable('w1')).map((c) => c.sequenceNo)).toEqual([1, 2]);
  });

  it('should number checkpoints after the highest sequence in either tier', async () => {
    expect(await store.nextSequence('w1')).toBe(1);
    await store.write(checkpoint(3));
    await fs.writeFile(path.join(localDir, 'w1', '000007.json'), '{}');

    expect(await store.nextSequence('w1')).toBe(8);
  });

  it('should skip an unreadable newest checkpoint and ignore temp files', async () => {
    await store.write(checkpoint(1));
    await fs.writeFile(path.join(portableDir, 'w1', '000002.yaml'), 'worker_id: [unterminated');
    await fs.writeFile(path.join(portableDir, 'w1', '.000003.yaml.123.abcd.tmp'), 'partial');

    expect((await store.latestPortable('w1'))?.sequenceNo).toBe(1);
    expect((await store.listPortable('w1')).map((c) => c.sequenceNo)).toEqual([1]);
    expect(await store.nextSequence('w1')).toBe(3);
  });

  it('should still serve the portable tier when the local tier is gone', async () => {
    await store.write(checkpoint(1));
    await fs.rm(localDir, { recursive: true, force: true });

    expect(await store.latestLocal('w1')).toBeNull();
    expect((await store.latestPortable('w1'))?.resumableState.nextSteps).toEqual(['Parse lexer.ts', 'Run tests']);
  });

  it('should reject worker ids that are not a single path segment', async () => {
    await expect(store.write(checkpoint(1, { workerId: '../escape' }))).rejects.toBeInstanceOf(InvalidWorkerIdError);
    await expect(store.latestPortable('')).rejects.toBeInstanceOf(InvalidWorkerIdError);
  });
});
