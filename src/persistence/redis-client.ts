import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';
import type { RedisKeyValueClient } from './types.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_CONNECT_RETRIES = 3;

/** Reconnect backoff in ms, or null once the store should give up on Redis. */
export function retryDelay(times: number): number | null {
  if (times > MAX_CONNECT_RETRIES) return null;
  return Math.min(times * 200, 2000);
}

/**
 * An ioredis connection dedicated to InfraConfig snapshots. The store only
 * ever sees the key-value slice of it, and only while the connection is ready.
 */
export class ConfigStoreConnection {
  private ready = false;

  constructor(private readonly redis: Redis) {
    redis.on('ready', () => {
      this.ready = true;
      logger.info('config_store_redis', 'Redis ready for InfraConfig snapshots');
    });
    redis.on('error', (error: Error) => {
      this.ready = false;
      logger.error('config_store_redis', 'Redis error; snapshots fall back to memory', { error: error.message });
    });
    redis.on('close', () => {
      this.ready = false;
      logger.warn('config_store_redis', 'Redis connection closed');
    });
  }

  static open(url: string): ConfigStoreConnection {
    const redis = new Redis(url, {
      connectTimeout: CONNECT_TIMEOUT_MS,
      commandTimeout: COMMAND_TIMEOUT_MS,
      maxRetriesPerRequest: 2,
      retryStrategy: (times: number) => {
        const delay = retryDelay(times);
        logger.warn('config_store_redis', delay === null ? 'Giving up on Redis' : 'Retrying Redis connection', {
          times,
          delay,
        });
        return delay;
      },
    });
    return new ConfigStoreConnection(redis);
  }

  get isReady(): boolean {
    return this.ready;
  }

  client(): RedisKeyValueClient | null {
    return this.ready ? this.redis : null;
  }

  async close(): Promise<void> {
    this.ready = false;
    await this.redis.quit();
  }
}

let shared: ConfigStoreConnection | null = null;

/** Opens the shared connection when a URL is configured; without one, snapshots stay in memory. */
export function connectConfigStore(url: string | undefined): ConfigStoreConnection | null {
  if (!url) return null;
  if (!shared) shared = ConfigStoreConnection.open(url);
  return shared;
}

export function configStoreClient(): RedisKeyValueClient | null {
  return shared ? shared.client() : null;
}

export async function disconnectConfigStore(): Promise<void> {
  if (!shared) return;
  const connection = shared;
  shared = null;
  await connection.close();
}
