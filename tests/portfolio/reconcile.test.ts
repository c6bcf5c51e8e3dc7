import { describe, expect, it } from 'vitest';
import { reconcilePortfolio } from '../../src/portfolio/reconcile.js';

describe('reconcilePortfolio', () => {
  it('classifies every symbol on either side', () => {
    const report = reconcilePortfolio(
      {
        AAPL: { quantity: 10, costBasis: 150 },
        MSFT: { quantity: 5, costBasis: 400 },
        TSLA: { quantity: 2, costBasis: 200 },
      },
      [
        { symbol: 'AAPL', quantity: 10, costBasis: 150, marketValue: 1875 },
        { symbol: 'MSFT', quantity: 3, costBasis: 390, marketValue: null },
        { symbol: 'NVDA', quantity: 7, costBasis: null, marketValue: null },
      ]
    );

    expect(report).toEqual({
      inSync: false,
      entries: [
        { symbol: 'AAPL', localQuantity: 10, liveQuantity: 10, difference: 0, status: 'match' },
        { symbol: 'MSFT', localQuantity: 5, liveQuantity: 3, difference: -2, status: 'quantity-mismatch' },
        { symbol: 'NVDA', localQuantity: 0, liveQuantity: 7, difference: 7, status: 'missing-local' },
        { symbol: 'TSLA', localQuantity: 2, liveQuantity: 0, difference: -2, status: 'missing-live' },
      ],
      counts: { 'match': 1, 'quantity-mismatch': 1, 'missing-live': 1, 'missing-local': 1 },
    });
  });

  it('sums live lots of the same symbol', () => {
    const report = reconcilePortfolio({ GOOG: { quantity: 5, costBasis: 140 } }, [
      { symbol: 'GOOG', quantity: 2, costBasis: 130, marketValue: null },
      { symbol: 'goog', quantity: 3, costBasis: 150, marketValue: null },
    ]);

    expect(report.inSync).toBe(true);
    expect(report.entries).toEqual([
      { symbol: 'GOOG', localQuantity: 5, liveQuantity: 5, difference: 0, status: 'match' },
    ]);
  });

  it('is in sync when both sides are empty', () => {
    expect(reconcilePortfolio({}, [])).toEqual({
      inSync: true,
      entries: [],
      counts: { 'match': 0, 'quantity-mismatch': 0, 'missing-live': 0, 'missing-local': 0 },
    });
  });
});
