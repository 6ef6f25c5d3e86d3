import { promises as fs } from 'fs';
import * as path from 'path';
import type { ProjectConfig } from '../../config_manager/config_manager.types';
import { FsConfigStore } from '../../config_store/fs/fs_config_store';
import { createLogger } from '../../logger';
import { readFileIfExists } from '../../utils/atomic_write';
import type { IProjectInitializer } from '../project_initializer';
import { RUNTIME_DIR, resolveProjectPaths } from '../project_layout';
import type { ProjectPaths } from '../project_layout';

const logger = createLogger('[FsProjectInitializer] ');

const GITIGNORE_ENTRY = `${RUNTIME_DIR}/`;

/**
 * FsProjectInitializer - Filesystem implementation of IProjectInitializer.
 *
 * Creates `.ai/` (state, checkpoints, memory inbox) and `.ai_runtime/`
 * (cache, local checkpoints, worker files) under the project root.
 */
export class FsProjectInitializer implements IProjectInitializer {
  private readonly paths: ProjectPaths;
  private readonly configStore: FsConfigStore;
  /** Topmost directories made by the last createProjectStructure */
  private created: string[] = [];

  constructor(projectRoot: string) {
    this.paths = resolveProjectPaths(projectRoot);
    this.configStore = new FsConfigStore(this.paths.root);
  }

  async createProjectStructure(): Promise<void> {
    const directories = [
      this.paths.stateDir,
      this.paths.portableCheckpointsDir,
      this.paths.inboxDir,
      this.paths.cacheDir,
      this.paths.localCheckpointsDir,
      this.paths.heartbeatsDir,
      this.paths.resumeDir,
    ];
    this.created = [];
    for (const dir of directories) {
      const first = await fs.mkdir(dir, { recursive: true });
      if (first !== undefined) {
        this.created.push(first);
      }
    }
  }

  async isInitialized(): Promise<boolean> {
    return (await readFileIfExists(this.paths.configFile)) !== null;
  }

  async writeConfig(config: ProjectConfig): Promise<void> {
    await this.configStore.saveConfig(config);
  }

  async setupGitIntegration(): Promise<void> {
    const gitignorePath = path.join(this.paths.root, '.gitignore');
    const existing = await readFileIfExists(gitignorePath);

    if (existing === null) {
      await fs.writeFile(gitignorePath, `${GITIGNORE_ENTRY}\n`, 'utf-8');
      return;
    }
    if (existing.split(/\r?\n/).some((line) => line.trim() === GITIGNORE_ENTRY)) {
      return;
    }
    const separator = existing.length === 0 || existing.endsWith('\n') ? '' : '\n';
    await fs.appendFile(gitignorePath, `${separator}${GITIGNORE_ENTRY}\n`, 'utf-8');
    logger.debug(`Added ${GITIGNORE_ENTRY} to ${gitignorePath}`);
  }

  async rollback(): Promise<void> {
    for (const dir of [...this.created].reverse()) {
      await fs.rm(dir, { recursive: true, force: true });
    }
    if (this.created.length > 0) {
      logger.warn(`Rolled back ${this.created.length} created path(s) under ${this.paths.root}`);
    }
    this.created = [];
  }
}
