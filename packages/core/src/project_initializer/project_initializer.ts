import type { ProjectConfig } from '../config_manager/config_manager.types';

/**
 * Public interface for project initialization operations.
 *
 * @example
 * ```typescript
 * const initializer: IProjectInitializer = new FsProjectInitializer('/path/to/project');
 * if (!(await initializer.isInitialized())) {
 *   await initializer.createProjectStructure();
 *   await initializer.writeConfig({ projectId: 'demo' });
 *   await initializer.setupGitIntegration();
 * }
 * ```
 */
export interface IProjectInitializer {
  /**
   * Creates the committed and runtime directory trees. Idempotent.
   */
  createProjectStructure(): Promise<void>;

  /**
   * True once the project has a configuration file.
   */
  isInitialized(): Promise<boolean>;

  writeConfig(config: ProjectConfig): Promise<void>;

  /**
   * Keeps the runtime directory out of version control.
   */
  setupGitIntegration(): Promise<void>;

  /**
   * Removes the directories the last createProjectStructure call made.
   * Directories that already existed are left alone.
   */
  rollback(): Promise<void>;
}
