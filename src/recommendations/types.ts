/**
 * Recommendation types
 */

import type { Candle, NewsDigest, Quote } from '../etrade/types.js';
import type { RiskProfile } from '../portfolio/types.js';

export interface AnalysisInput {
  ticker: string;
  quote: Quote | null;
  history: Candle[];
  news: NewsDigest | null;
  riskProfile: RiskProfile;
}

export type SuggestedAction = 'BUY' | 'SELL' | 'HOLD';

export interface Recommendation {
  ticker: string;
  /** 0-100, null when the model gave none */
  confidence: number | null;
  riskLevel: RiskProfile | null;
  suggestedAction: SuggestedAction | null;
  timeHorizon: string;
  reasoning: string;
}

export interface RecommendationOutcome {
  recommendation: Recommendation;
  /** Set when the recommendation's risk exceeds the user's profile */
  withheld: boolean;
  riskProfile: RiskProfile;
  /** Market data that could not be fetched and was left out of the analysis */
  missingData: string[];
}

/**
 * Text generator behind recommendations. Market data in, raw model text out.
 */
export interface RecommendationEngine {
  readonly description: string;
  generate(input: AnalysisInput): Promise<string>;
}
