/**
 * Recommendation service
 *
 * Gathers market data through the brokerage client, asks the engine for
 * an analysis and screens it against the user's risk profile.
 */

import type { EtradeClient } from '../etrade/client.js';
import type { Candle, NewsDigest, Quote } from '../etrade/types.js';
import { createLogger } from '../logging.js';
import { RISK_PROFILES, type RiskProfile } from '../portfolio/types.js';
import type { UserConfigStore } from '../portfolio/user-config.js';
import { parseRecommendation } from './parser.js';
import type { RecommendationEngine, RecommendationOutcome } from './types.js';

const log = createLogger('recommendations');

type MarketData = Pick<EtradeClient, 'getQuote' | 'getHistory' | 'getNews'>;

function riskRank(level: RiskProfile): number {
  return RISK_PROFILES.indexOf(level);
}

export function exceedsRiskProfile(level: RiskProfile | null, profile: RiskProfile): boolean {
  return level !== null && riskRank(level) > riskRank(profile);
}

export class RecommendationService {
  private market: MarketData;
  private engine: RecommendationEngine;
  private userConfig: Pick<UserConfigStore, 'getRiskProfile'>;

  constructor(market: MarketData, engine: RecommendationEngine, userConfig: Pick<UserConfigStore, 'getRiskProfile'>) {
    this.market = market;
    this.engine = engine;
    this.userConfig = userConfig;
  }

  async recommend(ticker: string): Promise<RecommendationOutcome> {
    const symbol = ticker.trim().toUpperCase();
    if (!symbol) {
      throw new Error('Ticker symbol is required');
    }

    // The quote is required; history and news only enrich the prompt
    const quote: Quote = await this.market.getQuote(symbol);
    const missingData: string[] = [];

    let history: Candle[] = [];
    try {
      history = await this.market.getHistory(symbol);
    } catch (error) {
      missingData.push('history');
      log.warn(`History unavailable for ${symbol}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let news: NewsDigest | null = null;
    try {
      news = await this.market.getNews(symbol);
    } catch (error) {
      missingData.push('news');
      log.warn(`News unavailable for ${symbol}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const riskProfile = this.userConfig.getRiskProfile();
    const raw = await this.engine.generate({ ticker: symbol, quote, history, news, riskProfile });
    const recommendation = parseRecommendation(raw, symbol);
    const withheld = exceedsRiskProfile(recommendation.riskLevel, riskProfile);

    if (withheld) {
      log.info(`${symbol} recommendation (${recommendation.riskLevel} risk) withheld for ${riskProfile} profile`);
    }

    return { recommendation, withheld, riskProfile, missingData };
  }
}
