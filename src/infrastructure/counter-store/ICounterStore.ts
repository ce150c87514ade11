import type { RateLimiterKey } from '../../domain/models/RateLimiterConfig';

export interface CounterStoreCallOptions {
    /** Aborts waiting on the backend call (request closed, deadline reached) */
    signal?: AbortSignal;
}

/**
 * Storage for time-bucketed request counters.
 * Implementations own every bucket; callers only ever see aggregate counts.
 */
export interface ICounterStore {
    /**
     * Sums every live bucket for the user and endpoint.
     * Resolves to 0 when no bucket exists.
     */
    get(key: RateLimiterKey, options?: CounterStoreCallOptions): Promise<number>;

    /**
     * Increments the bucket that `timestamp` falls in.
     *
     * @param timestamp - Request time (Date or epoch milliseconds)
     * @param windowInterval - Bucket width in milliseconds; the timestamp is floored to it
     * @param ttl - Bucket lifetime in milliseconds, applied when the bucket is created
     */
    set(
        key: RateLimiterKey,
        timestamp: Date | number,
        windowInterval: number,
        ttl: number,
        options?: CounterStoreCallOptions
    ): Promise<void>;

    /**
     * Deletes every bucket for the user and endpoint.
     * Administrative; the limiter never calls it.
     */
    reset(key: RateLimiterKey): Promise<void>;

    /**
     * Closes any open connections (e.g., Redis connection).
     * Should be called on application shutdown.
     */
    disconnect(): Promise<void>;
}
