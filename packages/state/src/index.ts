export { MemoryKeyValueStore } from './stores/memory-kv-store.js';
export type { MemoryKeyValueStoreOptions, StoreEntry, StoredData } from './stores/memory-kv-store.js';
export { FileKeyValueStore } from './stores/file-kv-store.js';
export type { FileKeyValueStoreOptions } from './stores/file-kv-store.js';
export { FileLearningStore, similarity } from './stores/file-learning-store.js';
export { writeJsonAtomic } from './utils/json-file.js';
