import { describe, expect, it } from 'vitest';
import { EtradeApiError, EtradeClient, type SessionProvider } from '../../src/etrade/client.js';
import { EtradeSession } from '../../src/session/etrade-session.js';
import { jsonResponse, stubFetch, textResponse, type FetchMock } from '../helpers.js';

const API = 'https://apisb.etrade.com';

function sessions(withAccount = true): SessionProvider {
  const session = new EtradeSession(
    { key: 'test-key', secret: 'test-secret' },
    { token: 'tok', tokenSecret: 'tok-secret' },
    'EtradeMCP/test'
  );
  if (withAccount) {
    session.attachAccount({ accountId: '12345678', accountIdKey: 'key-1' });
  }
  return { getSession: async () => session };
}

function requestBody(fetchMock: FetchMock, call: number): unknown {
  const body = fetchMock.mock.calls[call]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

const quoteBody = {
  QuoteResponse: {
    QuoteData: [
      {
        dateTime: '15:59:59 EST 03-02-2026',
        Product: { symbol: 'AAPL' },
        All: {
          lastTrade: '187.5',
          changeClosePercentage: 1.2,
          totalVolume: 1000,
          bid: 187.4,
          ask: 187.6,
          high: 188,
          low: 186,
          open: 186.5,
          previousClose: 185.3,
        },
      },
    ],
  },
};

describe('EtradeClient', () => {
  it('normalizes a quote and caches it briefly', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => jsonResponse(quoteBody));
    const client = new EtradeClient(sessions(), API);

    const quote = await client.getQuote('AAPL');

    expect(quote).toEqual({
      symbol: 'AAPL',
      lastPrice: 187.5,
      changePct: 1.2,
      volume: 1000,
      bid: 187.4,
      ask: 187.6,
      high: 188,
      low: 186,
      open: 186.5,
      previousClose: 185.3,
      asOf: '15:59:59 EST 03-02-2026',
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${API}/v1/market/quote/AAPL.json?detailFlag=ALL`);
    expect(new Headers(fetchMock.mock.calls[0]?.[1]?.headers).get('Accept')).toBe('application/json');

    expect(await client.getQuote('AAPL')).toEqual(quote);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(client.getCacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('fills missing quote fields with null', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(jsonResponse({ QuoteResponse: { QuoteData: [{}] } }));
    const client = new EtradeClient(sessions(), API, { enableCache: false });

    expect(await client.getQuote('msft')).toMatchObject({ symbol: 'MSFT', lastPrice: null, asOf: null });
  });

  it('reports an unknown symbol as 404', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(jsonResponse({ QuoteResponse: {} }));
    const client = new EtradeClient(sessions(), API);

    await expect(client.getQuote('ZZZZ')).rejects.toMatchObject({ name: 'EtradeApiError', statusCode: 404 });
  });

  it('wraps HTTP errors', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(textResponse('{"Error":{"message":"Invalid symbol"}}', 400));
    const client = new EtradeClient(sessions(), API);

    const failure = client.getQuote('AAPL');
    await expect(failure).rejects.toBeInstanceOf(EtradeApiError);
    await expect(failure).rejects.toMatchObject({ statusCode: 400, errorBody: '{"Error":{"message":"Invalid symbol"}}' });
  });

  it('retries after a 429', async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '0' } }))
      .mockResolvedValueOnce(jsonResponse(quoteBody));
    const client = new EtradeClient(sessions(), API, { enableCache: false });

    expect((await client.getQuote('AAPL')).lastPrice).toBe(187.5);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured retries', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '0' } }));
    const client = new EtradeClient(sessions(), API, { enableCache: false, maxRetries: 2 });

    await expect(client.getQuote('AAPL')).rejects.toMatchObject({ statusCode: 429 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('treats a non-numeric Retry-After as one second', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(new Response('slow down', { status: 429, headers: { 'Retry-After': 'soon' } }));
    const client = new EtradeClient(sessions(), API, { enableCache: false, maxRetries: 1 });

    await expect(client.getQuote('AAPL')).rejects.toMatchObject({
      statusCode: 429,
      message: 'Rate limited, retry after 1s',
    });
  });

  it('reads daily history', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(
      jsonResponse({
        HistoricalQuoteResponse: {
          QuoteData: [
            { dateTime: '2026-02-27', open: 180, high: 184, low: 179, close: 183, totalVolume: '5000' },
            { dateTime: 20260302, close: 185 },
          ],
        },
      })
    );
    const client = new EtradeClient(sessions(), API);

    expect(await client.getHistory('AAPL')).toEqual([
      { date: '2026-02-27', open: 180, high: 184, low: 179, close: 183, volume: 5000 },
      { date: '20260302', open: null, high: null, low: null, close: 185, volume: null },
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${API}/v1/market/history/AAPL.json?interval=1day&period=3months`);
  });

  it('collects news headlines', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(
      jsonResponse({ NewsResponse: { News: [{ headline: 'Apple ships update' }, {}, { headline: 'Chip supply eases' }] } })
    );
    const client = new EtradeClient(sessions(), API);

    expect(await client.getNews('aapl')).toEqual({
      symbol: 'AAPL',
      headlines: ['Apple ships update', 'Chip supply eases'],
    });
  });

  it('lists positions of the resolved account', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValue(
      jsonResponse({
        PortfolioResponse: {
          AccountPortfolio: [
            {
              Position: [
                { Product: { symbol: 'aapl' }, quantity: 10, costPerShare: 150.25, marketValue: 1875 },
                { Product: { symbol: 'MSFT' }, quantity: '3', pricePaid: 400 },
              ],
            },
          ],
        },
      })
    );
    const client = new EtradeClient(sessions(), API);

    expect(await client.listPositions()).toEqual([
      { symbol: 'AAPL', quantity: 10, costBasis: 150.25, marketValue: 1875 },
      { symbol: 'MSFT', quantity: 3, costBasis: 400, marketValue: null },
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${API}/v1/accounts/key-1/portfolio.json`);
  });

  it('requires a resolved account for account endpoints', async () => {
    const fetchMock = stubFetch();
    const client = new EtradeClient(sessions(false), API);

    await expect(client.listPositions()).rejects.toMatchObject({ statusCode: 404 });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('previews and places an order', async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse({
          PreviewOrderResponse: { PreviewIds: [{ previewId: 987 }], totalOrderValue: 1870.5, estimatedCommission: 0 },
        })
      )
      .mockResolvedValueOnce(jsonResponse({ PlaceOrderResponse: { OrderIds: [{ orderId: 55 }] } }));
    const client = new EtradeClient(sessions(), API);
    const order = { symbol: 'aapl', action: 'BUY' as const, quantity: 10, priceType: 'LIMIT' as const, limitPrice: 187 };

    const preview = await client.previewOrder(order);

    expect(preview).toMatchObject({ previewId: '987', order, estimatedTotal: 1870.5, estimatedCommission: 0 });
    expect(preview.clientOrderId).toMatch(/^[0-9a-f]{20}$/);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${API}/v1/accounts/key-1/orders/preview.json`);
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(requestBody(fetchMock, 0)).toEqual({
      PreviewOrderRequest: {
        orderType: 'EQ',
        clientOrderId: preview.clientOrderId,
        Order: [
          {
            allOrNone: false,
            priceType: 'LIMIT',
            orderTerm: 'GOOD_FOR_DAY',
            marketSession: 'REGULAR',
            limitPrice: 187,
            Instrument: [
              {
                Product: { securityType: 'EQ', symbol: 'AAPL' },
                orderAction: 'BUY',
                quantityType: 'QUANTITY',
                quantity: 10,
              },
            ],
          },
        ],
      },
    });

    const placed = await client.placeOrder(preview);

    expect(placed).toEqual({ orderId: '55', clientOrderId: preview.clientOrderId, order });
    expect(fetchMock.mock.calls[1]?.[0]).toBe(`${API}/v1/accounts/key-1/orders/place.json`);
    expect(requestBody(fetchMock, 1)).toMatchObject({
      PlaceOrderRequest: { clientOrderId: preview.clientOrderId, PreviewIds: [{ previewId: '987' }] },
    });
  });
});
