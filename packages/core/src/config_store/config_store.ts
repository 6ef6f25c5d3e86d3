/**
 * ConfigStore Interface
 *
 * Abstraction for `.ai/config.yaml` persistence: filesystem in production,
 * memory for tests.
 */

import type { ProjectConfig } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * @returns the project configuration, or null when the file does not exist
   * @throws InvalidConfigError when the file exists but is not a valid configuration
   */
  loadConfig(): Promise<ProjectConfig | null>;

  saveConfig(config: ProjectConfig): Promise<void>;
}
