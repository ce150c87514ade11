import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CounterStoreFactory } from './CounterStoreFactory';
import { InMemoryCounterStore } from './InMemoryCounterStore';
import { RedisCounterStore } from './RedisCounterStore';
import { FakeRedis } from '../../test/FakeRedis';

describe('CounterStoreFactory', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should create an in-memory store when forced', async () => {
        const createClient = vi.fn(() => new FakeRedis());

        const store = await CounterStoreFactory.create(
            { forceInMemory: true, redisUrl: 'redis://localhost:6379' },
            createClient
        );

        expect(store).toBeInstanceOf(InMemoryCounterStore);
        expect(createClient).not.toHaveBeenCalled();
    });

    it('should create an in-memory store without a Redis URL', async () => {
        const store = await CounterStoreFactory.create({});

        expect(store).toBeInstanceOf(InMemoryCounterStore);
    });

    it('should create a Redis store once connected', async () => {
        const redis = new FakeRedis();
        const createClient = vi.fn(() => redis);

        const store = await CounterStoreFactory.create(
            { redisUrl: 'redis://localhost:6379', keyPrefix: 'api' },
            createClient
        );
        await store.set({ userId: 'u1', endpoint: '/ping' }, 0, 1000, 1000);

        expect(store).toBeInstanceOf(RedisCounterStore);
        expect(createClient).toHaveBeenCalledWith('redis://localhost:6379');
        expect([...redis.data.keys()]).toEqual(['api:u1#%2Fping#0']);
    });

    it('should fall back to in-memory when Redis cannot connect', async () => {
        const redis = new FakeRedis();
        redis.failWith('connect', new Error('ECONNREFUSED'));

        const store = await CounterStoreFactory.create({ redisUrl: 'redis://localhost:6379' }, () => redis);

        expect(store).toBeInstanceOf(InMemoryCounterStore);
        expect(redis.calls.at(-1)).toEqual({ command: 'quit', args: ['disconnect'] });
        expect(console.warn).toHaveBeenCalledWith(
            'Failed to connect to Redis, falling back to InMemoryCounterStore:',
            'ECONNREFUSED'
        );
    });
});
