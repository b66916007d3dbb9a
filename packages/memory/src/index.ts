export type { MemoryStorageConfig } from './interfaces/memoryStorageConfig.js';
export { MemoryStorage } from './memoryStorage.js';
