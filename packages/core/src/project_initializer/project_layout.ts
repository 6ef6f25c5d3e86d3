import * as path from 'path';
import { CONFIG_FILE, PROJECT_DIR } from '../config_store/fs/fs_config_store';

export const RUNTIME_DIR = '.ai_runtime';

/**
 * Every location the orchestrator reads or writes, derived from the
 * project root. `.ai/` is committed; `.ai_runtime/` never is.
 */
export type ProjectPaths = {
  root: string;
  aiDir: string;
  stateDir: string;
  configFile: string;
  portableCheckpointsDir: string;
  inboxDir: string;
  runtimeDir: string;
  cacheDir: string;
  localCheckpointsDir: string;
  workersDir: string;
  registryFile: string;
  heartbeatsDir: string;
  resumeDir: string;
};

export function resolveProjectPaths(projectRoot: string): ProjectPaths {
  const root = path.resolve(projectRoot);
  const aiDir = path.join(root, PROJECT_DIR);
  const runtimeDir = path.join(root, RUNTIME_DIR);
  const workersDir = path.join(runtimeDir, 'workers');
  return {
    root,
    aiDir,
    stateDir: path.join(aiDir, 'state'),
    configFile: path.join(aiDir, CONFIG_FILE),
    portableCheckpointsDir: path.join(aiDir, 'checkpoints'),
    inboxDir: path.join(aiDir, 'memory', 'inbox'),
    runtimeDir,
    cacheDir: path.join(runtimeDir, 'cache'),
    localCheckpointsDir: path.join(runtimeDir, 'checkpoints'),
    workersDir,
    registryFile: path.join(workersDir, 'registry.json'),
    heartbeatsDir: path.join(workersDir, 'heartbeats'),
    resumeDir: path.join(workersDir, 'resume'),
  };
}
