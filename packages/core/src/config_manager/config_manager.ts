/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to `.ai/config.yaml` with defaults applied.
 * Uses the ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import { ConfigNotFoundError } from '../config_store/config_store.errors';
import {
  DEFAULT_AUTO_FLUSH_CONFIG,
  DEFAULT_MEMORY_CONFIG,
  DEFAULT_RECOVERY_CONFIG,
} from './config_manager.types';
import type {
  IConfigManager,
  MemoryConfig,
  PersistenceConfig,
  ProjectConfig,
  RecoveryConfig,
  ResolvedConfig,
} from './config_manager.types';

/**
 * Fills every optional section of a stored config with its defaults.
 */
export function applyConfigDefaults(config: ProjectConfig): ResolvedConfig {
  return {
    projectId: config.projectId,
    projectName: config.projectName ?? config.projectId,
    recovery: { ...DEFAULT_RECOVERY_CONFIG, ...config.recovery },
    persistence: {
      autoFlush: { ...DEFAULT_AUTO_FLUSH_CONFIG, ...config.persistence?.autoFlush },
    },
    memory: { ...DEFAULT_MEMORY_CONFIG, ...config.memory },
  };
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@hivekeep/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@hivekeep/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ projectId: 'demo' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<ProjectConfig | null> {
    return this.configStore.loadConfig();
  }

  async getProjectInfo(): Promise<{ id: string; name: string } | null> {
    const config = await this.loadConfig();
    if (!config) return null;

    return {
      id: config.projectId,
      name: config.projectName ?? config.projectId,
    };
  }

  async getRecoveryConfig(): Promise<RecoveryConfig> {
    const config = await this.loadConfig();
    return { ...DEFAULT_RECOVERY_CONFIG, ...config?.recovery };
  }

  async getPersistenceConfig(): Promise<PersistenceConfig> {
    const config = await this.loadConfig();
    return {
      autoFlush: { ...DEFAULT_AUTO_FLUSH_CONFIG, ...config?.persistence?.autoFlush },
    };
  }

  async getMemoryConfig(): Promise<MemoryConfig> {
    const config = await this.loadConfig();
    return { ...DEFAULT_MEMORY_CONFIG, ...config?.memory };
  }

  /**
   * Full configuration with defaults.
   * @throws ConfigNotFoundError when the project has no config file
   */
  async resolve(): Promise<ResolvedConfig> {
    const config = await this.loadConfig();
    if (!config) {
      throw new ConfigNotFoundError();
    }
    return applyConfigDefaults(config);
  }
}
