export { MemoryEventLog } from './memory_event_log';
