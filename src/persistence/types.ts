import type { InfraConfig } from '../entity/infra-config.js';

export interface StoreStats {
  type: 'memory' | 'redis' | 'hybrid';
  healthy: boolean;
  count?: number;
}

export interface InfraConfigStore {
  save(config: InfraConfig): Promise<void>;
  load(instanceId: string): Promise<InfraConfig | null>;
  delete(instanceId: string): Promise<boolean>;
  getStats(): Promise<StoreStats>;
}

/** The slice of the ioredis client the Redis store talks to. */
export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export class StoreError extends Error {
  constructor(
    public readonly operation: 'save' | 'load' | 'delete',
    public readonly instanceId: string,
    message: string
  ) {
    super(`InfraConfig store ${operation} failed for ${instanceId}: ${message}`);
    this.name = 'StoreError';
  }
}
