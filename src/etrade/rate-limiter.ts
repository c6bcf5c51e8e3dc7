/**
 * Client-side throttle for E*TRADE API requests
 *
 * E*TRADE meters each API module separately, so market data, account and
 * order calls are counted in their own one-second windows. A 429 from any
 * module pauses every module for the Retry-After period.
 */

export type ApiModule = 'market' | 'accounts' | 'orders';

export interface ModuleLimit {
  maxRequests: number;
  windowMs: number;
}

export type RateLimits = Record<ApiModule, ModuleLimit>;

export const ETRADE_RATE_LIMITS: RateLimits = {
  market: { maxRequests: 4, windowMs: 1000 },
  accounts: { maxRequests: 2, windowMs: 1000 },
  orders: { maxRequests: 2, windowMs: 1000 },
};

/**
 * Module a v1 API path is metered under
 */
export function moduleForPath(path: string): ApiModule {
  if (path.startsWith('/market/')) return 'market';
  if (path.includes('/orders/')) return 'orders';
  return 'accounts';
}

export class EtradeRateLimiter {
  private limits: RateLimits;
  private sent: Record<ApiModule, number[]> = { market: [], accounts: [], orders: [] };
  private pausedUntil = 0;

  constructor(limits: Partial<RateLimits> = {}) {
    this.limits = { ...ETRADE_RATE_LIMITS, ...limits };
  }

  /**
   * Milliseconds to wait before the next request to a module (0 = go now)
   */
  acquirePermit(module: ApiModule): number {
    const now = Date.now();
    if (this.pausedUntil > now) {
      return this.pausedUntil - now;
    }

    const { maxRequests, windowMs } = this.limits[module];
    const recent = this.sent[module].filter((ts) => ts > now - windowMs);
    this.sent[module] = recent;

    const oldest = recent[0];
    if (recent.length < maxRequests || oldest === undefined) {
      return 0;
    }
    return oldest + windowMs - now;
  }

  recordRequest(module: ApiModule): void {
    this.sent[module].push(Date.now());
  }

  /**
   * Pause all modules after a 429. Unreadable Retry-After values count as
   * one second.
   */
  handleRateLimit(retryAfterSeconds: number): void {
    const seconds = Number.isFinite(retryAfterSeconds) && retryAfterSeconds >= 0 ? retryAfterSeconds : 1;
    this.pausedUntil = Date.now() + seconds * 1000;
  }
}
