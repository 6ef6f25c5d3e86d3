import type { ConfigStore } from '../config_store';
import type { ProjectConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore for tests.
 */
export class MemoryConfigStore implements ConfigStore {
  private config: ProjectConfig | null = null;

  async loadConfig(): Promise<ProjectConfig | null> {
    return this.config;
  }

  async saveConfig(config: ProjectConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helpers ====================

  setConfig(config: ProjectConfig | null): void {
    this.config = config;
  }

  getConfig(): ProjectConfig | null {
    return this.config;
  }
}
