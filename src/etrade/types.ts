/**
 * E*TRADE API response shapes and the normalised types the server uses
 */

import * as z from 'zod';

const numeric = z.union([z.number(), z.string()]).transform((value) => Number(value));

// ============================================
// Market data
// ============================================

export const quoteResponseSchema = z.object({
  QuoteResponse: z.object({
    QuoteData: z
      .array(
        z.object({
          dateTime: z.string().optional(),
          Product: z.object({ symbol: z.string() }).optional(),
          All: z
            .object({
              lastTrade: numeric.optional(),
              changeClosePercentage: numeric.optional(),
              totalVolume: numeric.optional(),
              bid: numeric.optional(),
              ask: numeric.optional(),
              high: numeric.optional(),
              low: numeric.optional(),
              open: numeric.optional(),
              previousClose: numeric.optional(),
            })
            .optional(),
        })
      )
      .default([]),
  }),
});

export interface Quote {
  symbol: string;
  lastPrice: number | null;
  changePct: number | null;
  volume: number | null;
  bid: number | null;
  ask: number | null;
  high: number | null;
  low: number | null;
  open: number | null;
  previousClose: number | null;
  asOf: string | null;
}

const candleSchema = z.object({
  dateTime: z.union([z.string(), z.number()]).transform(String),
  open: numeric.optional(),
  high: numeric.optional(),
  low: numeric.optional(),
  close: numeric.optional(),
  volume: numeric.optional(),
  totalVolume: numeric.optional(),
});

export const historyResponseSchema = z.union([
  z.object({ IntradayCandleResponse: z.object({ Candle: z.array(candleSchema).default([]) }) }),
  z.object({ HistoricalQuoteResponse: z.object({ QuoteData: z.array(candleSchema).default([]) }) }),
]);

export interface Candle {
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface HistoryParams {
  interval?: string;
  period?: string;
}

export const newsResponseSchema = z.object({
  NewsResponse: z.object({
    News: z.array(z.object({ headline: z.string().optional() })).default([]),
  }),
});

export interface NewsDigest {
  symbol: string;
  headlines: string[];
}

// ============================================
// Accounts
// ============================================

export const portfolioResponseSchema = z.object({
  PortfolioResponse: z.object({
    AccountPortfolio: z
      .array(
        z.object({
          Position: z
            .array(
              z.object({
                Product: z.object({ symbol: z.string() }),
                quantity: numeric,
                pricePaid: numeric.optional(),
                costPerShare: numeric.optional(),
                marketValue: numeric.optional(),
              })
            )
            .default([]),
        })
      )
      .default([]),
  }),
});

export interface LivePosition {
  symbol: string;
  quantity: number;
  costBasis: number | null;
  marketValue: number | null;
}

// ============================================
// Orders
// ============================================

export type OrderAction = 'BUY' | 'SELL';
export type PriceType = 'MARKET' | 'LIMIT';

export interface OrderRequest {
  symbol: string;
  action: OrderAction;
  quantity: number;
  priceType: PriceType;
  limitPrice?: number;
}

export const previewResponseSchema = z.object({
  PreviewOrderResponse: z.object({
    PreviewIds: z.array(z.object({ previewId: z.union([z.number(), z.string()]).transform(String) })).min(1),
    Order: z.array(z.record(z.string(), z.unknown())).default([]),
    totalOrderValue: numeric.optional(),
    estimatedCommission: numeric.optional(),
  }),
});

export interface OrderPreview {
  previewId: string;
  clientOrderId: string;
  order: OrderRequest;
  estimatedTotal: number | null;
  estimatedCommission: number | null;
}

export const placeResponseSchema = z.object({
  PlaceOrderResponse: z.object({
    OrderIds: z.array(z.object({ orderId: z.union([z.number(), z.string()]).transform(String) })).min(1),
  }),
});

export interface PlacedOrder {
  orderId: string;
  clientOrderId: string;
  order: OrderRequest;
}
