export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Crypto from "./crypto";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Validation from "./validation";

// Persistence core
export * as Records from "./record_store";
export * as Projection from "./record_projection";
export * as EventLog from "./event_log";
export * as Reconciler from "./reconciler";
export * as MemoryPack from "./memory_pack";
export * as SyncGate from "./sync_gate";
export * as Checkpoints from "./checkpoint_store";

// Workers
export * as Workers from "./worker_supervisor";

// Facade
export * as Project from "./project_initializer";
export * as Status from "./status_renderer";
export * as Orchestrator from "./orchestrator";
