/**
 * Simulated portfolio persisted as a JSON file
 */

import { createLogger } from '../logging.js';
import { readJsonFile, writeJsonFile } from './json-file.js';
import { holdingsSchema, type Holding, type Holdings } from './types.js';

const log = createLogger('portfolio');

export class PortfolioStore {
  private filePath: string;
  private holdings: Holdings;

  private constructor(filePath: string, holdings: Holdings) {
    this.filePath = filePath;
    this.holdings = holdings;
  }

  /**
   * Load holdings. A missing or unreadable file starts an empty portfolio.
   */
  static async load(filePath: string): Promise<PortfolioStore> {
    const result = await readJsonFile(filePath);
    if (result.status === 'missing') {
      log.info(`${filePath} not found, starting with an empty portfolio`);
      return new PortfolioStore(filePath, {});
    }
    if (result.status === 'invalid') {
      log.error(`Error decoding ${filePath}: ${result.error.message}. Starting with an empty portfolio.`);
      return new PortfolioStore(filePath, {});
    }

    const parsed = holdingsSchema.safeParse(result.value);
    if (!parsed.success) {
      log.error(`Invalid portfolio in ${filePath}. Starting with an empty portfolio.`);
      return new PortfolioStore(filePath, {});
    }

    const holdings: Holdings = {};
    for (const [symbol, holding] of Object.entries(parsed.data)) {
      holdings[symbol.toUpperCase()] = holding;
    }
    log.info(`Portfolio loaded from ${filePath}`);
    return new PortfolioStore(filePath, holdings);
  }

  /** Snapshot of the current holdings */
  getHoldings(): Holdings {
    return structuredClone(this.holdings);
  }

  getHolding(symbol: string): Holding | null {
    const holding = this.holdings[symbol.toUpperCase()];
    return holding ? { ...holding } : null;
  }

  /**
   * Add shares at the given average cost, re-weighting the position's
   * cost basis. Negative quantities are rejected.
   */
  addHolding(symbol: string, quantity: number, averageCost: number): Holding | null {
    if (quantity < 0) {
      log.error(`Cannot add negative quantity for ${symbol}`);
      return null;
    }

    const key = symbol.toUpperCase();
    const existing = this.holdings[key];
    if (!existing) {
      this.holdings[key] = { quantity, costBasis: averageCost };
      return { ...this.holdings[key] };
    }

    const totalQuantity = existing.quantity + quantity;
    const totalCost = existing.quantity * existing.costBasis + quantity * averageCost;
    this.holdings[key] = {
      quantity: totalQuantity,
      costBasis: totalQuantity > 0 ? totalCost / totalQuantity : 0,
    };
    return { ...this.holdings[key] };
  }

  setHolding(symbol: string, holding: Holding): void {
    this.holdings[symbol.toUpperCase()] = { ...holding };
  }

  removeHolding(symbol: string): boolean {
    const key = symbol.toUpperCase();
    if (!(key in this.holdings)) return false;
    delete this.holdings[key];
    return true;
  }

  async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.holdings);
    log.debug(`Portfolio saved to ${this.filePath}`);
  }
}
