/**
 * E*TRADE API
 */

export { EtradeApiError, EtradeClient } from './client.js';
export type { EtradeClientOptions, SessionProvider } from './client.js';
export { EtradeCache } from './cache.js';
export { ETRADE_RATE_LIMITS, EtradeRateLimiter, moduleForPath } from './rate-limiter.js';
export type { ApiModule, ModuleLimit, RateLimits } from './rate-limiter.js';
export type * from './types.js';
