/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface and errors.
 * Implementations live under the subpath entry points:
 * - @hivekeep/core/fs for FsConfigStore
 * - @hivekeep/core/memory for MemoryConfigStore
 */
export type { ConfigStore } from './config_store';
export * from './config_store.errors';
