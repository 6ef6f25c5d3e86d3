import { ConfigManager } from './config_manager';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { ConfigNotFoundError } from '../config_store/config_store.errors';

describe('ConfigManager', () => {
  let store: MemoryConfigStore;
  let manager: ConfigManager;

  beforeEach(() => {
    store = new MemoryConfigStore();
    manager = new ConfigManager(store);
  });

  it('should return defaults when no config exists', async () => {
    expect(await manager.loadConfig()).toBeNull();
    expect(await manager.getProjectInfo()).toBeNull();
    expect(await manager.getRecoveryConfig()).toEqual({
      stallTimeoutSeconds: 120,
      maxRetries: 3,
      checkpointEnabled: true,
      tickIntervalSeconds: 30,
    });
    expect(await manager.getMemoryConfig()).toEqual({ retentionDays: 90, autoImportInbox: true });
  });

  it('should merge partial sections over defaults', async () => {
    store.setConfig({
      projectId: 'demo',
      recovery: { stallTimeoutSeconds: 10 },
      persistence: { autoFlush: { onApproval: false } },
    });

    expect(await manager.getRecoveryConfig()).toEqual({
      stallTimeoutSeconds: 10,
      maxRetries: 3,
      checkpointEnabled: true,
      tickIntervalSeconds: 30,
    });
    expect(await manager.getPersistenceConfig()).toEqual({
      autoFlush: {
        onTaskTransition: true,
        onApproval: false,
        onWorkerStatusChange: true,
        debounceSeconds: 5,
      },
    });
  });

  it('should fall back to the project id as name', async () => {
    store.setConfig({ projectId: 'demo' });

    expect(await manager.getProjectInfo()).toEqual({ id: 'demo', name: 'demo' });
    const resolved = await manager.resolve();
    expect(resolved.projectName).toBe('demo');
    expect(resolved.memory.retentionDays).toBe(90);
  });

  it('should throw ConfigNotFoundError when resolving without config', async () => {
    await expect(manager.resolve()).rejects.toBeInstanceOf(ConfigNotFoundError);
  });
});
