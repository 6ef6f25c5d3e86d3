export { MemoryPackService } from './memory_pack';
export type { MemoryPackServiceDependencies } from './memory_pack';
export { readPack, writePack } from './pack_codec';
export * from './memory_pack.types';
export * from './memory_pack.errors';
