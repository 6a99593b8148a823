import type { Redis } from 'ioredis';
import type { MessageStore } from '../core/interfaces.js';
import { createRedisClient } from '../infra/redis.js';
import { createLogger } from '../utils/logger.js';
import { MemoryMessageStore } from './memoryMessageStore.js';
import { RedisMessageStore } from './redisMessageStore.js';

export { MemoryMessageStore } from './memoryMessageStore.js';
export { RedisMessageStore } from './redisMessageStore.js';

const logger = createLogger('storage');

export interface StoreHandle {
  store: MessageStore;
  /** Present when the store is Redis-backed; the health check uses it */
  redis?: Redis;
}

/**
 * Redis when a URL is configured, memory otherwise.
 */
export async function createMessageStore(redisUrl?: string): Promise<StoreHandle> {
  if (!redisUrl) {
    logger.info('REDIS_URL not set, using in-memory message store');
    return { store: new MemoryMessageStore() };
  }

  const redis = createRedisClient(redisUrl);
  await redis.connect();
  logger.info('Using Redis message store');
  return { store: new RedisMessageStore(redis), redis };
}
