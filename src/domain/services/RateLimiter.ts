import type { EndpointConfig, RateLimiterConfig, RateLimiterKey } from '../models/RateLimiterConfig';
import { normalizeRateLimiterConfig } from '../models/RateLimiterConfig';
import type { ICounterStore } from '../../infrastructure/counter-store/ICounterStore';
import type { AllowRequestOptions, IRateLimiter } from './IRateLimiter';

/**
 * Decision returned when the counter store cannot be read or written.
 * Must stay true: a store outage must not become an outage of the service behind the limiter.
 */
export const FAIL_OPEN = true;

export type RateLimiterLogger = Pick<Console, 'warn' | 'error'>;

export interface RateLimiterOptions {
    /**
     * Upper bound for store calls within one decision, in milliseconds.
     * Unset or 0 means only the caller's signal applies.
     */
    storeTimeoutMs?: number;

    /** Clock used to place requests into buckets */
    now?: () => number;

    logger?: RateLimiterLogger;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Sliding window counter limiter.
 *
 * Flow:
 * 1. Endpoints without configuration are not limited
 * 2. Sum the caller's live buckets from the store
 * 3. Under the limit → record the request in the current bucket and admit
 * 4. At or over the limit → reject without recording
 *
 * Steps 2 and 3 are separate store calls, so concurrent requests for the same key
 * can overshoot maxRequests by the number of requests in flight.
 */
export class RateLimiter implements IRateLimiter {
    private readonly config: Readonly<RateLimiterConfig>;
    private readonly storeTimeoutMs: number;
    private readonly now: () => number;
    private readonly logger: RateLimiterLogger;

    constructor(
        config: Record<string, Partial<EndpointConfig>>,
        private readonly store: ICounterStore,
        options: RateLimiterOptions = {}
    ) {
        this.config = normalizeRateLimiterConfig(config);
        this.storeTimeoutMs = options.storeTimeoutMs ?? 0;
        this.now = options.now ?? (() => Date.now());
        this.logger = options.logger ?? console;
    }

    /**
     * Returns the normalized limits for an endpoint, or undefined when it is not limited.
     */
    getEndpointConfig(endpoint: string): EndpointConfig | undefined {
        return Object.hasOwn(this.config, endpoint) ? this.config[endpoint] : undefined;
    }

    async allowRequest(endpoint: string, userId: string, options: AllowRequestOptions = {}): Promise<boolean> {
        const conf = this.getEndpointConfig(endpoint);
        if (!conf) {
            return true;
        }

        const key: RateLimiterKey = { userId, endpoint };
        const timestamp = this.now();
        const signal = this.deadline(options.signal);

        let count: number;
        try {
            count = await this.store.get(key, { signal });
        } catch (error) {
            this.logger.error(
                `Error retrieving request count for ${userId} on ${endpoint}, allowing request:`,
                describeError(error)
            );
            return FAIL_OPEN;
        }

        if (count === 0 || count < conf.maxRequests) {
            try {
                await this.store.set(key, timestamp, conf.slidingWindowInterval, conf.timeWindow, { signal });
            } catch (error) {
                // The caller is not penalized for a failed write
                this.logger.error(
                    `Error recording request for ${userId} on ${endpoint}:`,
                    describeError(error)
                );
            }
            return true;
        }

        return false;
    }

    private deadline(signal?: AbortSignal): AbortSignal | undefined {
        if (this.storeTimeoutMs <= 0) {
            return signal;
        }
        const timeout = AbortSignal.timeout(this.storeTimeoutMs);
        return signal ? AbortSignal.any([signal, timeout]) : timeout;
    }
}
