export type { Store, Stores, StoreName, Serializer, FsStoreOptions } from './store';
export { STORE_NAMES } from './store';
export type { MemoryStoreOptions } from './memory/memory_store';
export { MemoryStore } from './memory/memory_store';
export { FsStore } from './fs/fs_store';
export { createFsStores, createMemoryStores } from './stores';
