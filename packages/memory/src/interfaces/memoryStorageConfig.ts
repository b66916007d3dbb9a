import type { Logger } from 'pino';

export interface MemoryStorageConfig {
  /** Optional logger; a silent one is used otherwise */
  logger?: Logger;
}
