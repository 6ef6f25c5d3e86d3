export { MemoryRecordProjection } from './memory_record_projection';
