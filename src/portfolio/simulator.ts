/**
 * Simulated trade execution against the local portfolio.
 * No order reaches the brokerage.
 */

import { createLogger } from '../logging.js';
import type { PortfolioStore } from './portfolio-store.js';
import type { SimulatedTrade, SimulationResult } from './types.js';

const log = createLogger('simulator');

export class Simulator {
  private portfolio: PortfolioStore;

  constructor(portfolio: PortfolioStore) {
    this.portfolio = portfolio;
  }

  async execute(trade: SimulatedTrade): Promise<SimulationResult> {
    const symbol = trade.symbol.toUpperCase();
    if (!Number.isInteger(trade.quantity) || trade.quantity <= 0) {
      return { status: 'rejected', reason: `Quantity must be a positive whole number (got ${trade.quantity})` };
    }
    if (!(trade.price > 0)) {
      return { status: 'rejected', reason: `Price must be positive (got ${trade.price})` };
    }

    let realizedPnl: number | null = null;

    if (trade.action === 'BUY') {
      this.portfolio.addHolding(symbol, trade.quantity, trade.price);
    } else {
      const current = this.portfolio.getHolding(symbol);
      const held = current?.quantity ?? 0;
      if (!current || held < trade.quantity) {
        log.warn(`SIMULATION - cannot sell ${trade.quantity} ${symbol}, only ${held} held`);
        return { status: 'rejected', reason: `Cannot sell ${trade.quantity} shares of ${symbol}; only ${held} held` };
      }

      realizedPnl = (trade.price - current.costBasis) * trade.quantity;
      const remaining = held - trade.quantity;
      if (remaining === 0) {
        this.portfolio.removeHolding(symbol);
      } else {
        // Selling part of a position leaves the per-share cost unchanged
        this.portfolio.setHolding(symbol, { quantity: remaining, costBasis: current.costBasis });
      }
    }

    await this.portfolio.save();
    log.info(`SIMULATION - no real money used. ${trade.action} ${trade.quantity} ${symbol} at $${trade.price.toFixed(2)}`);

    return {
      status: 'filled',
      fill: {
        symbol,
        action: trade.action,
        quantity: trade.quantity,
        price: trade.price,
        holding: this.portfolio.getHolding(symbol),
        realizedPnl,
        executedAt: new Date().toISOString(),
      },
    };
  }
}
