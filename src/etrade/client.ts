/**
 * E*TRADE API v1 client
 *
 * Every call goes through the session facade, so a request made with an
 * expired or idle token transparently renews or re-authorizes first.
 *
 * Features:
 * - Short-lived caching of market-data responses
 * - Client-side rate limiting, with Retry-After handling on 429
 * - Response validation and normalisation
 */

import { randomUUID } from 'node:crypto';
import type * as z from 'zod';
import { createLogger } from '../logging.js';
import type { AuthenticatedSession, QueryParams, ResolvedAccount } from '../session/types.js';
import { EtradeCache, type CacheConfig } from './cache.js';
import { EtradeRateLimiter, moduleForPath, type RateLimits } from './rate-limiter.js';
import {
  historyResponseSchema,
  newsResponseSchema,
  placeResponseSchema,
  portfolioResponseSchema,
  previewResponseSchema,
  quoteResponseSchema,
  type Candle,
  type HistoryParams,
  type LivePosition,
  type NewsDigest,
  type OrderPreview,
  type OrderRequest,
  type PlacedOrder,
  type Quote,
} from './types.js';

const log = createLogger('etrade-client');

/**
 * Source of authenticated sessions (the session facade)
 */
export interface SessionProvider {
  getSession(): Promise<AuthenticatedSession>;
}

export interface EtradeClientOptions {
  /** Enable market-data caching (default: true) */
  enableCache?: boolean;
  cacheConfig?: Partial<CacheConfig>;
  /** Per-module request limits (default: ETRADE_RATE_LIMITS) */
  rateLimits?: Partial<RateLimits>;
  /** Attempts per request when rate limited (default: 3) */
  maxRetries?: number;
}

export class EtradeApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public errorBody?: string
  ) {
    super(message);
    this.name = 'EtradeApiError';
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }

  get isUnauthorized(): boolean {
    return this.statusCode === 401;
  }
}

interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  cacheable?: boolean;
}

export class EtradeClient {
  private sessions: SessionProvider;
  private baseUrl: string;
  private cache: EtradeCache | null;
  private rateLimiter: EtradeRateLimiter;
  private maxRetries: number;

  constructor(sessions: SessionProvider, apiBaseUrl: string, options: EtradeClientOptions = {}) {
    this.sessions = sessions;
    this.baseUrl = `${apiBaseUrl}/v1`;
    this.cache = (options.enableCache ?? true) ? new EtradeCache(options.cacheConfig) : null;
    this.rateLimiter = new EtradeRateLimiter(options.rateLimits);
    this.maxRetries = options.maxRetries ?? 3;
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getCacheStats() {
    return this.cache?.getStats() ?? null;
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const cacheKey = options.cacheable && this.cache ? EtradeCache.generateKey(path, options.params) : null;
    if (cacheKey && this.cache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        return schema.parse(cached.data);
      }
    }

    const session = await this.sessions.getSession();
    const apiModule = moduleForPath(path);
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const waitMs = this.rateLimiter.acquirePermit(apiModule);
      if (waitMs > 0) {
        await this.delay(waitMs);
      }

      this.rateLimiter.recordRequest(apiModule);
      const response = await session.request(method, `${this.baseUrl}${path}`, {
        params: options.params,
        body: options.body,
      });

      if (response.status === 429) {
        const header = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
        const retryAfter = Number.isFinite(header) ? header : 1;
        this.rateLimiter.handleRateLimit(retryAfter);
        lastError = new EtradeApiError(`Rate limited, retry after ${retryAfter}s`, 429);
        log.warn(`${method} ${path} rate limited (attempt ${attempt + 1}/${this.maxRetries})`);
        continue;
      }

      if (!response.ok) {
        const errorBody = await response.text();
        throw new EtradeApiError(
          `E*TRADE API error: ${response.status} ${response.statusText}`,
          response.status,
          errorBody
        );
      }

      const payload: unknown = await response.json();
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new EtradeApiError(
          `Unexpected E*TRADE response for ${path}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
          response.status,
          JSON.stringify(payload)
        );
      }

      if (cacheKey && this.cache) {
        this.cache.set(cacheKey, payload);
      }
      return parsed.data;
    }

    throw lastError ?? new Error('Request failed after retries');
  }

  private async requireAccount(): Promise<ResolvedAccount> {
    const session = await this.sessions.getSession();
    if (!session.account) {
      throw new EtradeApiError('No E*TRADE account is available for this session', 404);
    }
    return session.account;
  }

  // ============================================
  // Market data
  // ============================================

  async getQuote(symbol: string): Promise<Quote> {
    const data = await this.request('GET', `/market/quote/${encodeURIComponent(symbol)}.json`, quoteResponseSchema, {
      params: { detailFlag: 'ALL' },
      cacheable: true,
    });

    const quote = data.QuoteResponse.QuoteData[0];
    if (!quote) {
      throw new EtradeApiError(`No quote returned for ${symbol}`, 404);
    }
    const all = quote.All;
    return {
      symbol: quote.Product?.symbol ?? symbol.toUpperCase(),
      lastPrice: all?.lastTrade ?? null,
      changePct: all?.changeClosePercentage ?? null,
      volume: all?.totalVolume ?? null,
      bid: all?.bid ?? null,
      ask: all?.ask ?? null,
      high: all?.high ?? null,
      low: all?.low ?? null,
      open: all?.open ?? null,
      previousClose: all?.previousClose ?? null,
      asOf: quote.dateTime ?? null,
    };
  }

  async getHistory(symbol: string, params: HistoryParams = {}): Promise<Candle[]> {
    const data = await this.request('GET', `/market/history/${encodeURIComponent(symbol)}.json`, historyResponseSchema, {
      params: { interval: params.interval ?? '1day', period: params.period ?? '3months' },
      cacheable: true,
    });

    const rows = 'IntradayCandleResponse' in data
      ? data.IntradayCandleResponse.Candle
      : data.HistoricalQuoteResponse.QuoteData;

    return rows.map((row) => ({
      date: row.dateTime,
      open: row.open ?? null,
      high: row.high ?? null,
      low: row.low ?? null,
      close: row.close ?? null,
      volume: row.volume ?? row.totalVolume ?? null,
    }));
  }

  async getNews(symbol: string): Promise<NewsDigest> {
    const data = await this.request('GET', '/market/news.json', newsResponseSchema, {
      params: { symbols: symbol },
      cacheable: true,
    });

    const headlines = data.NewsResponse.News
      .map((item) => item.headline)
      .filter((headline): headline is string => Boolean(headline));
    return { symbol: symbol.toUpperCase(), headlines };
  }

  // ============================================
  // Accounts
  // ============================================

  async listPositions(): Promise<LivePosition[]> {
    const account = await this.requireAccount();
    const data = await this.request(
      'GET',
      `/accounts/${encodeURIComponent(account.accountIdKey)}/portfolio.json`,
      portfolioResponseSchema
    );

    return data.PortfolioResponse.AccountPortfolio.flatMap((portfolio) =>
      portfolio.Position.map((position) => ({
        symbol: position.Product.symbol.toUpperCase(),
        quantity: position.quantity,
        costBasis: position.costPerShare ?? position.pricePaid ?? null,
        marketValue: position.marketValue ?? null,
      }))
    );
  }

  // ============================================
  // Orders
  // ============================================

  async previewOrder(order: OrderRequest): Promise<OrderPreview> {
    const account = await this.requireAccount();
    const clientOrderId = randomUUID().replace(/-/g, '').slice(0, 20);
    const data = await this.request(
      'POST',
      `/accounts/${encodeURIComponent(account.accountIdKey)}/orders/preview.json`,
      previewResponseSchema,
      { body: { PreviewOrderRequest: buildOrderPayload(order, clientOrderId) } }
    );

    const response = data.PreviewOrderResponse;
    log.info(`Order preview ${response.PreviewIds[0].previewId}: ${order.action} ${order.quantity} ${order.symbol}`);
    return {
      previewId: response.PreviewIds[0].previewId,
      clientOrderId,
      order,
      estimatedTotal: response.totalOrderValue ?? null,
      estimatedCommission: response.estimatedCommission ?? null,
    };
  }

  /**
   * Place an order previously previewed with `previewOrder`
   */
  async placeOrder(preview: OrderPreview): Promise<PlacedOrder> {
    const account = await this.requireAccount();
    const data = await this.request(
      'POST',
      `/accounts/${encodeURIComponent(account.accountIdKey)}/orders/place.json`,
      placeResponseSchema,
      {
        body: {
          PlaceOrderRequest: {
            ...buildOrderPayload(preview.order, preview.clientOrderId),
            PreviewIds: [{ previewId: preview.previewId }],
          },
        },
      }
    );

    const orderId = data.PlaceOrderResponse.OrderIds[0].orderId;
    log.info(`Order ${orderId} placed: ${preview.order.action} ${preview.order.quantity} ${preview.order.symbol}`);
    return { orderId, clientOrderId: preview.clientOrderId, order: preview.order };
  }
}

function buildOrderPayload(order: OrderRequest, clientOrderId: string) {
  return {
    orderType: 'EQ',
    clientOrderId,
    Order: [
      {
        allOrNone: false,
        priceType: order.priceType,
        orderTerm: 'GOOD_FOR_DAY',
        marketSession: 'REGULAR',
        ...(order.priceType === 'LIMIT' && order.limitPrice !== undefined ? { limitPrice: order.limitPrice } : {}),
        Instrument: [
          {
            Product: { securityType: 'EQ', symbol: order.symbol.toUpperCase() },
            orderAction: order.action,
            quantityType: 'QUANTITY',
            quantity: order.quantity,
          },
        ],
      },
    ],
  };
}
