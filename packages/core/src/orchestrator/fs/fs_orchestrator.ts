import * as path from 'path';
import { ConfigManager } from '../../config_manager/config_manager';
import type { ProjectConfig } from '../../config_manager/config_manager.types';
import { FsConfigStore } from '../../config_store/fs/fs_config_store';
import { FsCheckpointStore } from '../../checkpoint_store/fs/fs_checkpoint_store';
import { FsEventLog } from '../../event_log/fs/fs_event_log';
import { createExecCommand } from '../../git/exec_command';
import type { IGitModule } from '../../git/git_module';
import { LocalGitModule } from '../../git/local/local_git_module';
import type { ExecCommand } from '../../git/types';
import { FsProjectInitializer } from '../../project_initializer/fs/fs_project_initializer';
import { resolveProjectPaths } from '../../project_initializer/project_layout';
import { FsRecordProjection } from '../../record_projection/fs/fs_record_projection';
import { FsRecordStore } from '../../record_store/fs/fs_record_store';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { FsHeartbeatStore } from '../../worker_supervisor/fs/fs_heartbeat_store';
import { FsResumeLauncher } from '../../worker_supervisor/fs/fs_resume_launcher';
import { FsWorkerRegistry } from '../../worker_supervisor/fs/fs_worker_registry';
import type { EscalationNotifier } from '../../worker_supervisor/worker_supervisor.types';
import { Orchestrator } from '../orchestrator';

export type FsOrchestratorOptions = {
  /** Used when `.ai/config.yaml` does not exist yet, e.g. before init */
  config?: ProjectConfig;
  /** Defaults to LocalGitModule on the project root */
  git?: IGitModule;
  execCommand?: ExecCommand;
  notifier?: EscalationNotifier;
  clock?: Clock;
};

/**
 * Wires an Orchestrator onto the on-disk layout under `projectRoot`.
 *
 * The stored config wins over `options.config`; with neither, the
 * project id is the root directory's name.
 */
export async function createFsOrchestrator(
  projectRoot: string,
  options: FsOrchestratorOptions = {},
): Promise<Orchestrator> {
  const paths = resolveProjectPaths(projectRoot);
  const stored = await new ConfigManager(new FsConfigStore(paths.root)).loadConfig();
  const config = stored ?? options.config ?? { projectId: path.basename(paths.root) };
  const clock = options.clock ?? systemClock;

  const git =
    options.git ??
    new LocalGitModule({
      repoRoot: paths.root,
      execCommand: options.execCommand ?? createExecCommand(paths.root),
    });

  return new Orchestrator({
    config,
    projectRoot: paths.root,
    recordStore: new FsRecordStore({ basePath: paths.stateDir, clock }),
    projection: new FsRecordProjection({ basePath: paths.cacheDir }),
    eventLog: new FsEventLog({ basePath: paths.cacheDir, projectId: config.projectId, clock }),
    checkpoints: new FsCheckpointStore({
      portableDir: paths.portableCheckpointsDir,
      localDir: paths.localCheckpointsDir,
    }),
    workers: {
      registry: new FsWorkerRegistry({ filePath: paths.registryFile }),
      heartbeats: new FsHeartbeatStore({ dir: paths.heartbeatsDir }),
      launcher: new FsResumeLauncher({ dir: paths.resumeDir }),
      ...(options.notifier && { notifier: options.notifier }),
    },
    git,
    initializer: new FsProjectInitializer(paths.root),
    clock,
  });
}
