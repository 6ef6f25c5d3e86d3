export type { IProjectInitializer } from './project_initializer';
export { resolveProjectPaths, RUNTIME_DIR } from './project_layout';
export type { ProjectPaths } from './project_layout';

// NOTE: Implementations are exported via subpaths:
// - @hivekeep/core/fs -> FsProjectInitializer
