export type { ICounterStore, CounterStoreCallOptions } from './ICounterStore';
export type { CounterStoreOperation } from './CounterStoreError';
export { CounterStoreError } from './CounterStoreError';
export { InMemoryCounterStore } from './InMemoryCounterStore';
export type { RedisCounterClient, RedisCounterStoreOptions } from './RedisCounterStore';
export { RedisCounterStore, createRedisClient, DEFAULT_SCAN_COUNT } from './RedisCounterStore';
export type { CounterStoreConfig, ConnectableRedisClient, RedisClientFactory } from './CounterStoreFactory';
export { CounterStoreFactory } from './CounterStoreFactory';
export { bucketKey, matchPattern, truncateTimestamp, DEFAULT_KEY_PREFIX } from './bucketKeys';
