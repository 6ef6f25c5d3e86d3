export { MemoryRecordStore } from './memory_record_store';
