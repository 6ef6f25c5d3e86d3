export { SyncGate } from './sync_gate';
export { createAllowListMatcher, normalizeSyncPath } from './allow_list';
export type { PathMatcher } from './allow_list';
export * from './sync_gate.types';
export * from './sync_gate.errors';
