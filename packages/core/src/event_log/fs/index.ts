export { FsEventLog } from './fs_event_log';
export type { FsEventLogOptions } from './fs_event_log';
