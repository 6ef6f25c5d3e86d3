import fg from 'fast-glob';
import { applyConfigDefaults } from '../config_manager/config_manager';
import type { ProjectConfig, ResolvedConfig } from '../config_manager/config_manager.types';
import { compareStrings } from '../crypto/checksum';
import type { EventQuery, IEventLog, LogEvent } from '../event_log/event_log.types';
import type { IGitModule } from '../git/git_module';
import { createLogger } from '../logger';
import { MemoryPackService } from '../memory_pack/memory_pack';
import type {
  ExportPackOptions,
  ImportPackResult,
  InboxImportResult,
  PackManifest,
} from '../memory_pack/memory_pack.types';
import type { IProjectInitializer } from '../project_initializer/project_initializer';
import { resolveProjectPaths } from '../project_initializer/project_layout';
import type { ProjectPaths } from '../project_initializer/project_layout';
import { Reconciler } from '../reconciler/reconciler';
import type { ReconcileResult } from '../reconciler/reconciler';
import { ReconcileError } from '../reconciler/reconciler.errors';
import type { DerivedCache } from '../record_projection/derived_cache';
import { CacheCorruptionError } from '../record_projection/record_projection.errors';
import type { CacheRow, IRecordProjection, RowFilter } from '../record_projection/record_projection.types';
import type { RecordStore } from '../record_store/record_store';
import type { CanonicalRecord, JsonObject, RecordInput, RecordKind } from '../record_store/record_store.types';
import { StatusRenderer, boardColumns } from '../status_renderer/status_renderer';
import type { RenderedStatus } from '../status_renderer/status_renderer';
import { DEFAULT_BOARD_COLUMNS } from '../status_renderer/status_report';
import { SyncGate } from '../sync_gate/sync_gate';
import { SYNC_ALLOW_LIST, SYNC_EXCLUDED_PATTERNS } from '../sync_gate/sync_gate.types';
import type { SyncGateOptions, SyncOptions, SyncResult } from '../sync_gate/sync_gate.types';
import type { CheckpointStore } from '../checkpoint_store/checkpoint_store.types';
import { secondsBetween, systemClock } from '../utils/clock';
import type { Clock } from '../utils/clock';
import { SchemaRecordValidator } from '../validation/record_validator';
import type { RecordValidator } from '../validation/record_validator';
import { ValidationFailedError } from '../validation/validation.errors';
import { WorkerSupervisor } from '../worker_supervisor/worker_supervisor';
import type {
  EscalationNotifier,
  HeartbeatStore,
  TickResult,
  WorkerLauncher,
  WorkerRecord,
  WorkerRegistration,
  WorkerRegistryStore,
} from '../worker_supervisor/worker_supervisor.types';
import { OperationGate } from './operation_gate';
import { OperationInProgressError } from './orchestrator.errors';
import type {
  FlushResult,
  ForceSyncOptions,
  ForceSyncResult,
  InitResult,
  RecordWriteResult,
  RecoverCacheResult,
  SessionStartResult,
} from './orchestrator.types';

const logger = createLogger('[Orchestrator] ');

export type OrchestratorWorkerDependencies = {
  registry: WorkerRegistryStore;
  heartbeats: HeartbeatStore;
  launcher: WorkerLauncher;
  notifier?: EscalationNotifier;
};

export type OrchestratorDependencies = {
  /** Written by init(); its defaults drive recovery, flushing and retention */
  config: ProjectConfig;
  /** Repository root holding `.ai/` and `.ai_runtime/` */
  projectRoot: string;
  recordStore: RecordStore;
  projection: IRecordProjection;
  eventLog: IEventLog;
  checkpoints: CheckpointStore;
  workers: OrchestratorWorkerDependencies;
  git: IGitModule;
  initializer: IProjectInitializer;
  validator?: RecordValidator;
  syncGate?: SyncGateOptions;
  clock?: Clock;
};

function statusOf(payload: JsonObject | undefined): string | null {
  const status = payload?.['status'];
  return typeof status === 'string' ? status : null;
}

/**
 * Orchestrator - the single writer.
 *
 * Every mutation of the RecordStore, the derived cache, the event log and
 * the shared repository goes through this facade. Bulk operations are
 * serialized by an OperationGate; record writes are followed by an
 * automatic flush (reconcile + STATUS.md) as the persistence config asks.
 *
 * @example
 * ```typescript
 * const orchestrator = await createFsOrchestrator('/path/to/project', { config: { projectId: 'demo' } });
 * await orchestrator.init();
 * await orchestrator.putRecord('task', { id: 'T-1', payload: { title: 'Write docs', status: 'backlog' } });
 * const counts = await orchestrator.countBy('task', 'status');
 * ```
 */
export class Orchestrator {
  private readonly projectConfig: ProjectConfig;
  private readonly config: ResolvedConfig;
  private readonly paths: ProjectPaths;
  private readonly recordStore: RecordStore;
  private readonly eventLog: IEventLog;
  private readonly initializer: IProjectInitializer;
  private readonly validator: RecordValidator;
  private readonly reconciler: Reconciler;
  private readonly packs: MemoryPackService;
  private readonly syncGate: SyncGate;
  private readonly allowList: readonly string[];
  private readonly excludedPatterns: readonly string[];
  private readonly supervisor: WorkerSupervisor;
  private readonly renderer: StatusRenderer;
  private readonly clock: Clock;
  private readonly gate = new OperationGate();

  /** RecordStore changed since the cache was last rebuilt */
  private cacheStale = false;
  private lastFlushAt: Date | null = null;

  constructor(deps: OrchestratorDependencies) {
    this.projectConfig = deps.config;
    this.config = applyConfigDefaults(deps.config);
    this.paths = resolveProjectPaths(deps.projectRoot);
    this.clock = deps.clock ?? systemClock;
    this.recordStore = deps.recordStore;
    this.eventLog = deps.eventLog;
    this.initializer = deps.initializer;

    this.validator = deps.validator ?? new SchemaRecordValidator();
    this.reconciler = new Reconciler({
      recordStore: deps.recordStore,
      projection: deps.projection,
      validator: this.validator,
      clock: this.clock,
    });
    this.packs = new MemoryPackService({
      projectId: this.config.projectId,
      eventLog: deps.eventLog,
      reconciler: this.reconciler,
      inboxPath: this.paths.inboxDir,
      clock: this.clock,
    });

    this.allowList = deps.syncGate?.allowList ?? SYNC_ALLOW_LIST;
    this.excludedPatterns = deps.syncGate?.excludedPatterns ?? SYNC_EXCLUDED_PATTERNS;
    this.syncGate = new SyncGate(deps.git, {
      allowList: this.allowList,
      excludedPatterns: this.excludedPatterns,
    });

    this.supervisor = new WorkerSupervisor({
      registry: deps.workers.registry,
      heartbeats: deps.workers.heartbeats,
      checkpoints: deps.checkpoints,
      launcher: deps.workers.launcher,
      ...(deps.workers.notifier && { notifier: deps.workers.notifier }),
      eventLog: deps.eventLog,
      recovery: this.config.recovery,
      clock: this.clock,
    });
    this.renderer = new StatusRenderer({
      cache: this.reconciler.cache,
      outputDir: this.paths.aiDir,
      clock: this.clock,
    });
  }

  get projectId(): string {
    return this.config.projectId;
  }

  get settings(): ResolvedConfig {
    return this.config;
  }

  // ==================== Lifecycle ====================

  /**
   * Creates the project layout, writes the config and appends `init`.
   * On an initialized project only missing directories are created.
   */
  async init(): Promise<InitResult> {
    if (await this.initializer.isInitialized()) {
      await this.initializer.createProjectStructure();
      logger.info(`Project ${this.projectId} is already initialized`);
      return { projectId: this.projectId, created: false };
    }

    try {
      await this.initializer.createProjectStructure();
      await this.initializer.writeConfig(this.projectConfig);
      await this.initializer.setupGitIntegration();
    } catch (error) {
      await this.initializer.rollback();
      throw error;
    }

    await this.eventLog.append('init', {
      projectId: this.projectId,
      projectName: this.config.projectName,
    });
    await this.flush();
    logger.info(`Initialized project ${this.projectId} at ${this.paths.root}`);
    return { projectId: this.projectId, created: true };
  }

  /**
   * Start-of-session housekeeping: purge events past retention, import
   * the inbox when configured, then flush.
   */
  async beginSession(): Promise<SessionStartResult> {
    const purgedEvents = await this.packs.purgeEvents(this.config.memory.retentionDays);
    const inbox = this.config.memory.autoImportInbox ? await this.importInbox() : [];
    const flushed = await this.flush();
    return { ...flushed, purgedEvents, inbox };
  }

  /**
   * Appends a `command_run` event for a command the CLI executed.
   */
  async recordCommand(command: string, details: JsonObject = {}): Promise<LogEvent> {
    return this.eventLog.append('command_run', { ...details, command });
  }

  // ==================== Gated operations ====================

  async reconcile(): Promise<ReconcileResult> {
    return this.gate.run('reconcile', () => this.rebuild());
  }

  /**
   * Reconcile, then render STATUS.md and DECISIONS.md.
   */
  async flush(): Promise<FlushResult> {
    return this.gate.run('reconcile', () => this.flushNow());
  }

  async exportPack(target: string, options: ExportPackOptions = {}): Promise<PackManifest> {
    return this.gate.run('export', () => this.packs.exportPack(target, options));
  }

  async importPack(source: string): Promise<ImportPackResult> {
    return this.gate.run('import', async () => {
      const result = await this.packs.importPack(source);
      this.cacheStale = false;
      return result;
    });
  }

  async importInbox(): Promise<InboxImportResult[]> {
    return this.gate.run('import', async () => {
      const results = await this.packs.importInbox();
      if (results.some((r) => r.status === 'imported')) {
        this.cacheStale = false;
      }
      return results;
    });
  }

  /**
   * Commits the given paths after the RecordStore passes validation.
   * @throws ValidationFailedError when any record file is invalid
   */
  async sync(paths: string[], options: SyncOptions = {}): Promise<SyncResult> {
    return this.gate.run('sync', async () => {
      await this.assertValidStore();
      return this.syncGate.sync(paths, options);
    });
  }

  /**
   * Drops the derived cache and rebuilds it. The event log is cleared
   * only when it cannot be read.
   */
  async recoverCache(): Promise<RecoverCacheResult> {
    return this.gate.run('reconcile', async () => {
      let eventLogReset = false;
      try {
        await this.eventLog.list();
      } catch (error) {
        if (!(error instanceof CacheCorruptionError)) throw error;
        logger.warn(`Event log is unreadable, clearing it: ${error.message}`);
        await this.eventLog.clear();
        eventLogReset = true;
      }
      const reconcile = await this.reconciler.recover();
      this.cacheStale = false;
      return { reconcile, eventLogReset };
    });
  }

  /**
   * Brings every committed artifact up to date: reconcile, status
   * documents, a checkpoint for each live worker, and with `git` a
   * commit of the allow-listed files.
   */
  async forceSync(options: ForceSyncOptions = {}): Promise<ForceSyncResult> {
    return this.gate.run('sync', async () => {
      const flushed = await this.flushNow();
      const checkpoints = await this.supervisor.checkpointAll();

      let sync: SyncResult | null = null;
      if (options.git) {
        const syncOptions: SyncOptions = {};
        if (options.message !== undefined) syncOptions.message = options.message;
        if (options.author !== undefined) syncOptions.author = options.author;
        sync = await this.syncGate.sync(await this.allowListedFiles(), syncOptions);
      }
      return { ...flushed, checkpoints, sync };
    });
  }

  // ==================== Record writes ====================

  /**
   * Writes one record. A task whose status changes appends
   * `task_transition`; any approval write appends `approval`.
   */
  async putRecord(kind: RecordKind, input: RecordInput): Promise<RecordWriteResult> {
    const previous = kind === 'task' ? await this.findRecord(kind, input.id) : null;
    await this.recordStore.putRecord(kind, input);
    this.cacheStale = true;

    const { onTaskTransition, onApproval } = this.config.persistence.autoFlush;
    let event: LogEvent | null = null;
    let flushWanted = false;

    if (kind === 'task') {
      const from = statusOf(previous?.payload);
      const to = statusOf(input.payload);
      if (from !== to) {
        event = await this.eventLog.append('task_transition', { taskId: input.id, from, to });
        flushWanted = onTaskTransition;
      }
    } else if (kind === 'approval') {
      event = await this.eventLog.append('approval', {
        approvalId: input.id,
        status: statusOf(input.payload),
      });
      flushWanted = onApproval;
    }

    const flushed = flushWanted ? await this.autoFlush() : false;
    return { event, flushed };
  }

  /**
   * @returns false when no record with that id existed
   */
  async deleteRecord(kind: RecordKind, id: string): Promise<boolean> {
    const removed = await this.recordStore.deleteRecord(kind, id);
    if (removed) {
      this.cacheStale = true;
    }
    return removed;
  }

  // ==================== Status ====================

  /**
   * Renders the status documents from the cache as it is now.
   */
  async renderStatus(): Promise<RenderedStatus> {
    return this.renderer.render(await this.boardColumns());
  }

  // ==================== Workers ====================

  async registerWorker(registration: WorkerRegistration): Promise<WorkerRecord> {
    return this.supervisor.register(registration);
  }

  async restartWorker(workerId: string): Promise<WorkerRecord> {
    return this.supervisor.restart(workerId);
  }

  async getWorker(workerId: string): Promise<WorkerRecord | null> {
    return this.supervisor.get(workerId);
  }

  async listWorkers(): Promise<WorkerRecord[]> {
    return this.supervisor.list();
  }

  async superviseTick(): Promise<TickResult> {
    const result = await this.supervisor.tick();
    await this.afterTick(result);
    return result;
  }

  startSupervision(): void {
    this.supervisor.start((result) => this.afterTick(result));
  }

  stopSupervision(): void {
    this.supervisor.stop();
  }

  isSupervising(): boolean {
    return this.supervisor.isRunning();
  }

  // ==================== Queries ====================

  async listRows(filter: RowFilter = {}): Promise<CacheRow[]> {
    return this.query((cache) => cache.listRows(filter));
  }

  async getRow(kind: RecordKind, id: string): Promise<CacheRow | null> {
    return this.query((cache) => cache.getRow(kind, id));
  }

  async countBy(kind: RecordKind, field: string): Promise<Record<string, number>> {
    return this.query((cache) => cache.countBy(kind, field));
  }

  async listEvents(query: EventQuery = {}): Promise<LogEvent[]> {
    return this.eventLog.list(query);
  }

  // ==================== Internals ====================

  /**
   * Reads through the derived cache, rebuilding first when it is missing
   * or out of date with the RecordStore. A corrupted cache is recovered
   * and the read retried once.
   */
  private async query<T>(read: (cache: DerivedCache) => Promise<T>): Promise<T> {
    try {
      await this.refreshIfOutdated();
      return await read(this.reconciler.cache);
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      logger.warn(`Derived cache is corrupted, rebuilding: ${error.message}`);
      await this.gate.run('reconcile', () => this.reconciler.recover());
      this.cacheStale = false;
      return read(this.reconciler.cache);
    }
  }

  /**
   * Rebuilds when this process wrote the store, when no cache exists, or
   * when the cached fingerprint differs from the store's. An invalid store
   * leaves an existing cache in service.
   */
  private async refreshIfOutdated(): Promise<void> {
    if (this.cacheStale) {
      await this.reconcile();
      return;
    }
    const cached = await this.reconciler.cache.getFingerprint();
    if (cached === null) {
      await this.reconcile();
      return;
    }
    let current: string;
    try {
      current = await this.reconciler.currentFingerprint();
    } catch (error) {
      if (!(error instanceof ReconcileError)) throw error;
      logger.warn(`RecordStore is invalid, serving the existing cache: ${error.message}`);
      return;
    }
    if (current !== cached) {
      logger.debug('Cache fingerprint differs from the RecordStore, reconciling');
      await this.reconcile();
    }
  }

  private async assertValidStore(): Promise<void> {
    const report = await this.validator.validate(await this.recordStore.readFiles());
    if (!report.valid) {
      throw new ValidationFailedError(report.errors);
    }
  }

  private async rebuild(): Promise<ReconcileResult> {
    const result = await this.reconciler.reconcile();
    this.cacheStale = false;
    return result;
  }

  private async flushNow(): Promise<FlushResult> {
    const reconcile = await this.rebuild();
    this.lastFlushAt = this.clock();
    const status = await this.renderer.render(await this.boardColumns());
    return { reconcile, status };
  }

  /**
   * Flush unless one ran within `debounceSeconds` or a gated operation
   * holds the gate. A skipped flush leaves the cache marked stale.
   */
  private async autoFlush(): Promise<boolean> {
    const { debounceSeconds } = this.config.persistence.autoFlush;
    if (this.lastFlushAt !== null && secondsBetween(this.lastFlushAt, this.clock()) < debounceSeconds) {
      logger.debug(`Auto-flush skipped: last flush was under ${debounceSeconds}s ago`);
      return false;
    }
    try {
      await this.gate.run('reconcile', () => this.flushNow());
      return true;
    } catch (error) {
      if (!(error instanceof OperationInProgressError)) throw error;
      logger.debug(`Auto-flush skipped: ${error.message}`);
      return false;
    }
  }

  private async afterTick(result: TickResult): Promise<void> {
    if (result.transitions.length > 0 && this.config.persistence.autoFlush.onWorkerStatusChange) {
      await this.autoFlush();
    }
  }

  private async findRecord(kind: RecordKind, id: string): Promise<CanonicalRecord | null> {
    const snapshot = await this.recordStore.load();
    const collection = snapshot.collections.find((c) => c.spec.kind === kind);
    return collection?.records.find((r) => r.id === id) ?? null;
  }

  private async boardColumns(): Promise<readonly string[]> {
    return boardColumns(await this.recordStore.load()) ?? DEFAULT_BOARD_COLUMNS;
  }

  /**
   * Files on disk under the allow-list, relative to the project root,
   * which is taken to be the repository root.
   */
  private async allowListedFiles(): Promise<string[]> {
    const patterns = this.allowList.map((entry) => (entry.endsWith('/') ? `${entry}**` : entry));
    const files = await fg(patterns, {
      cwd: this.paths.root,
      dot: true,
      onlyFiles: true,
      ignore: [...this.excludedPatterns],
    });
    return files.sort(compareStrings);
  }
}
