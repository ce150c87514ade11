export type { IRateLimiter, AllowRequestOptions } from './IRateLimiter';
export type { RateLimiterOptions, RateLimiterLogger } from './RateLimiter';
export { RateLimiter, FAIL_OPEN } from './RateLimiter';
