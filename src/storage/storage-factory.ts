/**
 * Factory for creating repositories based on configuration.
 * Supports both in-memory and Redis backends.
 */

import type { ITestRepository } from './index.js';
import { InMemoryTestRepository } from './in-memory-repository.js';
import { NodeRedisStore, RedisTestRepository } from './redis-repository.js';
import type { IAutomationSettings } from '../infra/config.js';
import { ILogger } from '../infra/logger.js';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

export interface IRepositoryHandle {
  repository: ITestRepository;
  /** Releases the backend connection, if any. */
  close(): Promise<void>;
}

/**
 * Creates the repository selected by STORAGE_TYPE ('memory' unless set).
 * A Redis repository is connected before it is returned.
 */
export async function createRepository(
  settings: Pick<IAutomationSettings, 'storageType' | 'redisUrl'>,
  logger: ILogger
): Promise<IRepositoryHandle> {
  switch (settings.storageType) {
    case 'redis': {
      const url = settings.redisUrl ?? DEFAULT_REDIS_URL;
      const store = new NodeRedisStore(url, logger);
      await store.connect();
      logger.info('Using Redis repository', { url });
      return { repository: new RedisTestRepository(store), close: () => store.disconnect() };
    }

    case 'memory':
      logger.info('Using in-memory repository');
      return { repository: new InMemoryTestRepository(), close: async () => {} };
  }
}
