import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsProjectInitializer } from './fs_project_initializer';
import { FsConfigStore } from '../../config_store/fs/fs_config_store';

describe('FsProjectInitializer', () => {
  let tempDir: string;
  let initializer: FsProjectInitializer;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'project-initializer-test-'));
    initializer = new FsProjectInitializer(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create the committed and runtime directories', async () => {
    await initializer.createProjectStructure();

    for (const dir of ['.ai/state', '.ai/checkpoints', '.ai/memory/inbox', '.ai_runtime/cache', '.ai_runtime/workers/heartbeats']) {
      const stats = await fs.stat(path.join(tempDir, dir));
      expect(stats.isDirectory()).toBe(true);
    }
  });

  it('should report initialization once the config is written', async () => {
    expect(await initializer.isInitialized()).toBe(false);

    await initializer.writeConfig({ projectId: 'demo' });

    expect(await initializer.isInitialized()).toBe(true);
    expect(await new FsConfigStore(tempDir).loadConfig()).toEqual({ projectId: 'demo' });
  });

  it('should add the runtime directory to .gitignore once', async () => {
    await fs.writeFile(path.join(tempDir, '.gitignore'), 'node_modules/');

    await initializer.setupGitIntegration();
    await initializer.setupGitIntegration();

    expect(await fs.readFile(path.join(tempDir, '.gitignore'), 'utf-8')).toBe('node_modules/\n.ai_runtime/\n');
  });

  it('should create .gitignore when missing', async () => {
    await initializer.setupGitIntegration();

    expect(await fs.readFile(path.join(tempDir, '.gitignore'), 'utf-8')).toBe('.ai_runtime/\n');
  });

  it('should remove both trees on rollback', async () => {
    await initializer.createProjectStructure();

    await initializer.rollback();

    await expect(fs.access(path.join(tempDir, '.ai'))).rejects.toThrow();
    await expect(fs.access(path.join(tempDir, '.ai_runtime'))).rejects.toThrow();
  });

  it('should keep directories that existed before on rollback', async () => {
    await fs.mkdir(path.join(tempDir, '.ai', 'state'), { recursive: true });
    await fs.writeFile(path.join(tempDir, '.ai', 'state', 'board.yaml'), 'tasks: []\n');

    await initializer.createProjectStructure();
    await initializer.rollback();

    expect(await fs.readFile(path.join(tempDir, '.ai', 'state', 'board.yaml'), 'utf-8')).toBe('tasks: []\n');
    await expect(fs.access(path.join(tempDir, '.ai', 'checkpoints'))).rejects.toThrow();
    await expect(fs.access(path.join(tempDir, '.ai_runtime'))).rejects.toThrow();
  });
});
