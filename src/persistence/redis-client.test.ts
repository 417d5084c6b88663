import { Redis } from 'ioredis';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigStoreConnection, configStoreClient, connectConfigStore, retryDelay } from './redis-client.js';

describe('retryDelay', () => {
  it('backs off linearly up to the retry limit', () => {
    expect(retryDelay(1)).toBe(200);
    expect(retryDelay(3)).toBe(600);
    expect(retryDelay(4)).toBeNull();
  });
});

describe('ConfigStoreConnection', () => {
  // lazyConnect keeps ioredis from opening a socket; events are emitted by hand.
  const redis = new Redis({ lazyConnect: true });

  afterEach(() => {
    redis.removeAllListeners();
  });

  it('hands out the client only while ready', () => {
    const connection = new ConfigStoreConnection(redis);
    expect(connection.client()).toBeNull();

    redis.emit('ready');
    expect(connection.isReady).toBe(true);
    expect(connection.client()).toBe(redis);

    redis.emit('error', new Error('connection reset'));
    expect(connection.client()).toBeNull();

    redis.emit('ready');
    redis.emit('close');
    expect(connection.isReady).toBe(false);
  });
});

describe('connectConfigStore', () => {
  it('stays in memory without a URL', () => {
    expect(connectConfigStore(undefined)).toBeNull();
    expect(connectConfigStore('')).toBeNull();
    expect(configStoreClient()).toBeNull();
  });
});
