export { FsConfigStore, CONFIG_FILE, PROJECT_DIR } from './fs_config_store';
