export { FsProjectInitializer } from './fs_project_initializer';
