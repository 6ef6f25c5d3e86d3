/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes `.ai/config.yaml`. Also provides static helpers for
 * locating the project root.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import type { ProjectConfig } from '../../config_manager/config_manager.types';
import { InvalidConfigError } from '../config_store.errors';
import { SchemaValidationCache } from '../../validation/schema_cache';
import { readFileIfExists, writeFileAtomic, errorMessage } from '../../utils/atomic_write';

export const PROJECT_DIR = '.ai';
export const CONFIG_FILE = 'config.yaml';

export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, PROJECT_DIR, CONFIG_FILE);
  }

  async loadConfig(): Promise<ProjectConfig | null> {
    const content = await readFileIfExists(this.configPath);
    if (content === null) {
      return null;
    }

    let document: unknown;
    try {
      document = yaml.load(content, { schema: yaml.CORE_SCHEMA });
    } catch (error) {
      throw new InvalidConfigError(this.configPath, [errorMessage(error)]);
    }

    const validate = SchemaValidationCache.getValidator<ProjectConfig>('config');
    if (!validate(document)) {
      const details = (validate.errors ?? []).map(
        (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`,
      );
      throw new InvalidConfigError(this.configPath, details);
    }
    return document;
  }

  async saveConfig(config: ProjectConfig): Promise<void> {
    await writeFileAtomic(this.configPath, yaml.dump(config, { noRefs: true, lineWidth: -1 }));
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for a `.ai` directory.
   *
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);
    while (true) {
      if (existsSync(path.join(currentPath, PROJECT_DIR))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }
}
