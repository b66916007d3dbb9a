export type { CacheOptions } from './cacheConfig.js';
export * as schema from './db/schema/index.js';
export type {
  ConnectionUrlStorageConfig,
  DatabaseStorageConfig,
  PostgresDatabase,
  PostgresStorageConfig,
} from './interfaces/postgresStorageConfig.js';
export { initialMigrationUrl, readInitialMigration } from './migrations.js';
export { PostgresStorage } from './postgresStorage.js';
