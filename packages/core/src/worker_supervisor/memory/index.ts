export { MemoryWorkerRegistry } from './memory_worker_registry';
export { MemoryHeartbeatStore } from './memory_heartbeat_store';
export { MemoryWorkerLauncher } from './memory_worker_launcher';
export { MemoryEscalationNotifier } from './memory_escalation_notifier';
