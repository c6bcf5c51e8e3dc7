/**
 * Turn raw model text into a Recommendation.
 *
 * Models are asked for JSON; when they answer with `Key: value` lines
 * instead, those are read. Fields the model left out become null/'N/A'.
 */

import * as z from 'zod';
import type { RiskProfile } from '../portfolio/types.js';
import type { Recommendation, SuggestedAction } from './types.js';

const NOT_AVAILABLE = 'N/A';

const rawRecommendationSchema = z.object({
  ticker: z.string().optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
  riskLevel: z.string().optional(),
  suggestedAction: z.string().optional(),
  timeHorizon: z.string().optional(),
  reasoning: z.string().optional(),
});

type RawRecommendation = z.infer<typeof rawRecommendationSchema>;
type Field = keyof RawRecommendation;

/** Line-format keys, lower-cased with non-letters removed */
const LINE_KEYS: Partial<Record<string, Field>> = {
  ticker: 'ticker',
  confidence: 'confidence',
  risklevel: 'riskLevel',
  suggestedaction: 'suggestedAction',
  action: 'suggestedAction',
  expectedtimehorizon: 'timeHorizon',
  timehorizon: 'timeHorizon',
  reasoningsummary: 'reasoning',
  reasoning: 'reasoning',
};

function extractJson(raw: string): RawRecommendation | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let candidate: unknown;
  try {
    candidate = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = rawRecommendationSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

function extractLines(raw: string): RawRecommendation {
  const result: Partial<Record<Field, string>> = {};
  for (const line of raw.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;
    const key = LINE_KEYS[line.slice(0, separator).toLowerCase().replace(/[^a-z]/g, '')];
    const fieldValue = line.slice(separator + 1).trim();
    if (key && fieldValue && !(key in result)) {
      result[key] = fieldValue;
    }
  }
  return result;
}

export function normalizeConfidence(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  const numeric = typeof value === 'number' ? value : parseFloat(value.replace(/[%\s]/g, ''));
  if (!Number.isFinite(numeric)) return null;
  return Math.min(100, Math.max(0, Math.round(numeric)));
}

export function normalizeRiskLevel(value: string | undefined): RiskProfile | null {
  switch (value?.trim().toLowerCase()) {
    case 'low':
      return 'Low';
    case 'medium':
      return 'Medium';
    case 'high':
      return 'High';
    default:
      return null;
  }
}

export function normalizeAction(value: string | undefined): SuggestedAction | null {
  const action = value?.trim().toUpperCase().split(/\s+/)[0];
  return action === 'BUY' || action === 'SELL' || action === 'HOLD' ? action : null;
}

export function parseRecommendation(raw: string, ticker: string): Recommendation {
  const fields = extractJson(raw) ?? extractLines(raw);
  return {
    ticker: (fields.ticker?.trim() || ticker).toUpperCase(),
    confidence: normalizeConfidence(fields.confidence),
    riskLevel: normalizeRiskLevel(fields.riskLevel),
    suggestedAction: normalizeAction(fields.suggestedAction),
    timeHorizon: fields.timeHorizon?.trim() || NOT_AVAILABLE,
    reasoning: fields.reasoning?.trim() || NOT_AVAILABLE,
  };
}
