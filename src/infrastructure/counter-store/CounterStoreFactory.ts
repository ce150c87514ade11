import type { ICounterStore } from './ICounterStore';
import type { RedisCounterClient } from './RedisCounterStore';
import { RedisCounterStore, createRedisClient } from './RedisCounterStore';
import { InMemoryCounterStore } from './InMemoryCounterStore';

export interface CounterStoreConfig {
    redisUrl?: string;
    forceInMemory?: boolean;
    scanCount?: number;
    keyPrefix?: string;
}

/**
 * Redis client that is connected by the factory. An ioredis client satisfies it.
 */
export interface ConnectableRedisClient extends RedisCounterClient {
    connect(): Promise<void>;
    disconnect(): void;
}

export type RedisClientFactory = (redisUrl: string) => ConnectableRedisClient;

/**
 * Factory for creating counter store instances.
 * Automatically detects Redis availability and falls back to in-memory.
 */
export class CounterStoreFactory {
    /**
     * Creates a counter store instance.
     *
     * Strategy:
     * 1. If forceInMemory is true → InMemoryCounterStore
     * 2. If redisUrl is provided → Try RedisCounterStore, fallback to InMemoryCounterStore on error
     * 3. Otherwise → InMemoryCounterStore
     */
    static async create(
        config: CounterStoreConfig = {},
        createClient: RedisClientFactory = createRedisClient
    ): Promise<ICounterStore> {
        // Force in-memory mode (useful for tests)
        if (config.forceInMemory) {
            console.log('Using InMemoryCounterStore (forced)');
            return new InMemoryCounterStore(config.keyPrefix);
        }

        if (config.redisUrl) {
            const client = createClient(config.redisUrl);
            try {
                await client.connect();
                console.log('Using RedisCounterStore (distributed rate limiting enabled)');
                return new RedisCounterStore(client, {
                    scanCount: config.scanCount,
                    keyPrefix: config.keyPrefix,
                });
            } catch (error) {
                // Stop the reconnect loop before falling back
                client.disconnect();
                console.warn(
                    'Failed to connect to Redis, falling back to InMemoryCounterStore:',
                    error instanceof Error ? error.message : error
                );
            }
        }

        console.log('Using InMemoryCounterStore (single-worker mode)');
        return new InMemoryCounterStore(config.keyPrefix);
    }
}
