import { getSettings } from '../config/settings.js';
import type { InfraConfig } from '../entity/infra-config.js';
import { deserializeInfraConfig, serializeInfraConfig } from '../entity/serialization.js';
import { logger } from '../observability/logger.js';
import { configStoreClient, connectConfigStore } from './redis-client.js';
import { StoreError, type InfraConfigStore, type RedisKeyValueClient, type StoreStats } from './types.js';

const KEY_PREFIX = 'infra-config:';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export class InMemoryInfraConfigStore implements InfraConfigStore {
  private snapshots: Map<string, string> = new Map();

  async save(config: InfraConfig): Promise<void> {
    this.snapshots.set(config.instanceId, serializeInfraConfig(config));
  }

  async load(instanceId: string): Promise<InfraConfig | null> {
    const serialized = this.snapshots.get(instanceId);
    return serialized === undefined ? null : deserializeInfraConfig(serialized);
  }

  async delete(instanceId: string): Promise<boolean> {
    return this.snapshots.delete(instanceId);
  }

  async getStats(): Promise<StoreStats> {
    return { type: 'memory', healthy: true, count: this.snapshots.size };
  }
}

export interface RedisStoreOptions {
  /** Returns a usable client, or null while Redis is down. */
  client?: () => RedisKeyValueClient | null;
  /** 0 keeps snapshots until deleted. */
  ttlSeconds?: number;
}

export class RedisInfraConfigStore implements InfraConfigStore {
  private readonly client: () => RedisKeyValueClient | null;
  private readonly ttlSeconds: number;

  constructor(options: RedisStoreOptions = {}) {
    this.client = options.client ?? configStoreClient;
    this.ttlSeconds = options.ttlSeconds ?? getSettings().configStoreTtlSeconds;
  }

  isAvailable(): boolean {
    return this.client() !== null;
  }

  async save(config: InfraConfig): Promise<void> {
    const redis = this.require('save', config.instanceId);
    const key = KEY_PREFIX + config.instanceId;
    const serialized = serializeInfraConfig(config);

    try {
      if (this.ttlSeconds > 0) {
        await redis.setex(key, this.ttlSeconds, serialized);
      } else {
        await redis.set(key, serialized);
      }
    } catch (error) {
      throw new StoreError('save', config.instanceId, errorMessage(error));
    }
  }

  async load(instanceId: string): Promise<InfraConfig | null> {
    const redis = this.require('load', instanceId);

    let serialized: string | null;
    try {
      serialized = await redis.get(KEY_PREFIX + instanceId);
    } catch (error) {
      throw new StoreError('load', instanceId, errorMessage(error));
    }

    return serialized === null ? null : deserializeInfraConfig(serialized);
  }

  async delete(instanceId: string): Promise<boolean> {
    const redis = this.require('delete', instanceId);
    try {
      return (await redis.del(KEY_PREFIX + instanceId)) > 0;
    } catch (error) {
      throw new StoreError('delete', instanceId, errorMessage(error));
    }
  }

  async getStats(): Promise<StoreStats> {
    return { type: 'redis', healthy: this.isAvailable() };
  }

  private require(operation: StoreError['operation'], instanceId: string): RedisKeyValueClient {
    const redis = this.client();
    if (!redis) {
      throw new StoreError(operation, instanceId, 'Redis unavailable');
    }
    return redis;
  }
}

/**
 * Always keeps an in-memory copy; mirrors to Redis when enabled. Reads
 * prefer Redis while it is reachable. A Redis outage degrades the store
 * to memory and is logged; snapshot and parse errors still propagate.
 */
export class HybridInfraConfigStore implements InfraConfigStore {
  constructor(
    private readonly memory: InMemoryInfraConfigStore,
    private readonly redis: RedisInfraConfigStore | null
  ) {}

  async save(config: InfraConfig): Promise<void> {
    await this.memory.save(config);
    if (!this.redis) return;

    try {
      await this.redis.save(config);
    } catch (error) {
      this.degrade(error, 'save', config.instanceId);
    }
  }

  async load(instanceId: string): Promise<InfraConfig | null> {
    if (this.redis?.isAvailable()) {
      try {
        const stored = await this.redis.load(instanceId);
        if (stored) return stored;
      } catch (error) {
        this.degrade(error, 'load', instanceId);
      }
    }
    return this.memory.load(instanceId);
  }

  async delete(instanceId: string): Promise<boolean> {
    const removed = await this.memory.delete(instanceId);
    if (!this.redis) return removed;

    try {
      return (await this.redis.delete(instanceId)) || removed;
    } catch (error) {
      this.degrade(error, 'delete', instanceId);
      return removed;
    }
  }

  async getStats(): Promise<StoreStats> {
    const memory = await this.memory.getStats();
    return {
      type: this.redis ? 'hybrid' : 'memory',
      healthy: this.redis ? this.redis.isAvailable() : true,
      count: memory.count,
    };
  }

  private degrade(error: unknown, operation: StoreError['operation'], instanceId: string): void {
    if (!(error instanceof StoreError)) throw error;

    logger.warn('infra_config_store_degraded', 'Redis unavailable, using in-memory snapshot', {
      operation,
      instanceId,
      error: error.message,
    });
  }
}

/** Memory store, mirrored to Redis when a URL is configured. */
export function createInfraConfigStore(redisUrl: string | undefined = getSettings().redisUrl): InfraConfigStore {
  const connection = connectConfigStore(redisUrl);
  return new HybridInfraConfigStore(
    new InMemoryInfraConfigStore(),
    connection ? new RedisInfraConfigStore({ client: () => connection.client() }) : null
  );
}
