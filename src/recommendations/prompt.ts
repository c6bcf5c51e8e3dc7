/**
 * Analysis prompt
 */

import type { AnalysisInput } from './types.js';

const HISTORY_ROWS = 5;

function value(v: number | string | null | undefined): string {
  return v === null || v === undefined ? 'N/A' : String(v);
}

export function buildAnalysisPrompt(input: AnalysisInput): string {
  const { ticker, quote, history, news, riskProfile } = input;
  const lines: string[] = [
    `Analyze the following stock data for ${ticker} and provide a structured investment recommendation.`,
    'Focus on pattern recognition (breakouts, reversals, momentum setups), profit potential and strict risk management.',
    `The recommendation must fit the user's risk profile: ${riskProfile}.`,
    '',
    'Real-time quote:',
    `  Last Price: ${value(quote?.lastPrice)}`,
    `  Change (%): ${value(quote?.changePct)}`,
    `  Volume: ${value(quote?.volume)}`,
    `  Bid: ${value(quote?.bid)}  Ask: ${value(quote?.ask)}`,
    `  High: ${value(quote?.high)}  Low: ${value(quote?.low)}`,
    '',
    'Recent history:',
  ];

  if (history.length > 0) {
    history.slice(-HISTORY_ROWS).forEach((candle, i) => {
      lines.push(
        `  Day ${i + 1}: Date=${candle.date}, Open=${value(candle.open)}, High=${value(candle.high)}, ` +
          `Low=${value(candle.low)}, Close=${value(candle.close)}, Volume=${value(candle.volume)}`
      );
    });
  } else {
    lines.push('  No historical data available.');
  }

  lines.push('', 'Latest headlines:');
  if (news && news.headlines.length > 0) {
    news.headlines.slice(0, 3).forEach((headline) => lines.push(`  - ${headline}`));
  } else {
    lines.push('  None available.');
  }

  lines.push(
    '',
    'Respond with a single JSON object and nothing else, using these keys:',
    '{"ticker": string, "confidence": number 0-100, "riskLevel": "Low"|"Medium"|"High",',
    ' "suggestedAction": "BUY"|"SELL"|"HOLD", "timeHorizon": string, "reasoning": string}'
  );

  return lines.join('\n');
}
