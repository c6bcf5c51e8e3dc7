/**
 * Compare the simulated portfolio with live account positions
 */

import type { LivePosition } from '../etrade/types.js';
import type { Holdings, ReconciliationEntry, ReconciliationReport, ReconciliationStatus } from './types.js';

const QUANTITY_TOLERANCE = 1e-6;

export function reconcilePortfolio(local: Holdings, live: LivePosition[]): ReconciliationReport {
  const liveBySymbol = new Map<string, number>();
  for (const position of live) {
    const symbol = position.symbol.toUpperCase();
    liveBySymbol.set(symbol, (liveBySymbol.get(symbol) ?? 0) + position.quantity);
  }

  const localBySymbol = new Map<string, number>();
  for (const [symbol, holding] of Object.entries(local)) {
    localBySymbol.set(symbol.toUpperCase(), holding.quantity);
  }

  const symbols = [...new Set([...localBySymbol.keys(), ...liveBySymbol.keys()])].sort();
  const counts: Record<ReconciliationStatus, number> = {
    'match': 0,
    'quantity-mismatch': 0,
    'missing-live': 0,
    'missing-local': 0,
  };

  const entries = symbols.map((symbol): ReconciliationEntry => {
    const localQuantity = localBySymbol.get(symbol);
    const liveQuantity = liveBySymbol.get(symbol);

    let status: ReconciliationStatus;
    if (liveQuantity === undefined) {
      status = 'missing-live';
    } else if (localQuantity === undefined) {
      status = 'missing-local';
    } else if (Math.abs(localQuantity - liveQuantity) <= QUANTITY_TOLERANCE) {
      status = 'match';
    } else {
      status = 'quantity-mismatch';
    }
    counts[status]++;

    return {
      symbol,
      localQuantity: localQuantity ?? 0,
      liveQuantity: liveQuantity ?? 0,
      difference: (liveQuantity ?? 0) - (localQuantity ?? 0),
      status,
    };
  });

  return {
    inSync: entries.every((entry) => entry.status === 'match'),
    entries,
    counts,
  };
}
