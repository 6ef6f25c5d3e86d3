/**
 * ConfigManager Types
 *
 * Shape of `.ai/config.yaml`. Every section is optional on disk; the
 * manager fills the gaps from the DEFAULT_* constants below.
 */

export type RecoveryConfig = {
  /** Seconds without a heartbeat before a running worker is stalled */
  stallTimeoutSeconds: number;
  /** Consecutive failed resumes before a worker is escalated */
  maxRetries: number;
  checkpointEnabled: boolean;
  /** Period of the supervisor's polling loop */
  tickIntervalSeconds: number;
};

export type AutoFlushConfig = {
  onTaskTransition: boolean;
  onApproval: boolean;
  onWorkerStatusChange: boolean;
  /** Minimum seconds between two automatic flushes */
  debounceSeconds: number;
};

export type PersistenceConfig = {
  autoFlush: AutoFlushConfig;
};

export type MemoryConfig = {
  /** Events older than this are removed by the retention purge */
  retentionDays: number;
  autoImportInbox: boolean;
};

/**
 * Project configuration as stored on disk.
 */
export type ProjectConfig = {
  projectId: string;
  projectName?: string;
  recovery?: Partial<RecoveryConfig>;
  persistence?: {
    autoFlush?: Partial<AutoFlushConfig>;
  };
  memory?: Partial<MemoryConfig>;
};

/**
 * Project configuration with every default applied.
 */
export type ResolvedConfig = {
  projectId: string;
  projectName: string;
  recovery: RecoveryConfig;
  persistence: PersistenceConfig;
  memory: MemoryConfig;
};

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
  stallTimeoutSeconds: 120,
  maxRetries: 3,
  checkpointEnabled: true,
  tickIntervalSeconds: 30,
};

export const DEFAULT_AUTO_FLUSH_CONFIG: AutoFlushConfig = {
  onTaskTransition: true,
  onApproval: true,
  onWorkerStatusChange: true,
  debounceSeconds: 5,
};

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  retentionDays: 90,
  autoImportInbox: true,
};

export interface IConfigManager {
  loadConfig(): Promise<ProjectConfig | null>;
  getProjectInfo(): Promise<{ id: string; name: string } | null>;
  getRecoveryConfig(): Promise<RecoveryConfig>;
  getPersistenceConfig(): Promise<PersistenceConfig>;
  getMemoryConfig(): Promise<MemoryConfig>;
  resolve(): Promise<ResolvedConfig>;
}
