export { FsRecordProjection } from './fs_record_projection';
export type { FsRecordProjectionOptions } from './fs_record_projection';
