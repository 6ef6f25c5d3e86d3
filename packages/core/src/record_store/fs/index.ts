export { FsRecordStore } from './fs_record_store';
export type { FsRecordStoreOptions } from './fs_record_store';
