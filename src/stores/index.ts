import { Redis } from 'ioredis';
import type { AppConfig } from '../config.js';
import type { TokenStore } from '../token-store.js';
import { InMemoryTokenStore } from './memory-store.js';
import { RedisTokenStore } from './redis-store.js';

export { InMemoryTokenStore } from './memory-store.js';
export { RedisTokenStore } from './redis-store.js';

export interface StoreHandle {
  store: TokenStore;
  close(): Promise<void>;
}

type StoreConfig = Pick<AppConfig, 'STORE_DRIVER' | 'REDIS_URL' | 'STORE_TIMEOUT_MS' | 'CLOCK_TOLERANCE_SECONDS'>;

export function createTokenStore(config: StoreConfig): StoreHandle {
  if (config.STORE_DRIVER === 'redis') {
    if (!config.REDIS_URL) {
      throw new Error('REDIS_URL is not configured');
    }
    const redis = new Redis(config.REDIS_URL, {
      lazyConnect: true,
      commandTimeout: config.STORE_TIMEOUT_MS,
      maxRetriesPerRequest: 1,
    });
    return {
      store: new RedisTokenStore({ redis, graceSeconds: config.CLOCK_TOLERANCE_SECONDS }),
      close: async () => {
        await redis.quit();
      },
    };
  }

  return {
    store: new InMemoryTokenStore({ graceSeconds: config.CLOCK_TOLERANCE_SECONDS }),
    close: async () => {},
  };
}
