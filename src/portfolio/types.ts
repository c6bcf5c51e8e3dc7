/**
 * Local portfolio types
 */

import * as z from 'zod';

export const holdingSchema = z.object({
  quantity: z.number().nonnegative(),
  costBasis: z.number().nonnegative(),
});

export const holdingsSchema = z.record(z.string(), holdingSchema);

/** One position in the simulated portfolio; costBasis is per share */
export type Holding = z.infer<typeof holdingSchema>;

/** Holdings keyed by upper-case symbol */
export type Holdings = z.infer<typeof holdingsSchema>;

export type TradeAction = 'BUY' | 'SELL';

export interface SimulatedTrade {
  symbol: string;
  action: TradeAction;
  quantity: number;
  price: number;
}

export interface SimulatedFill extends SimulatedTrade {
  /** Holding after the trade (null when fully sold) */
  holding: Holding | null;
  /** Realised profit or loss on a sale */
  realizedPnl: number | null;
  executedAt: string;
}

export type SimulationResult =
  | { status: 'filled'; fill: SimulatedFill }
  | { status: 'rejected'; reason: string };

export type ReconciliationStatus = 'match' | 'quantity-mismatch' | 'missing-live' | 'missing-local';

export interface ReconciliationEntry {
  symbol: string;
  localQuantity: number;
  liveQuantity: number;
  difference: number;
  status: ReconciliationStatus;
}

export interface ReconciliationReport {
  inSync: boolean;
  entries: ReconciliationEntry[];
  counts: Record<ReconciliationStatus, number>;
}

export const RISK_PROFILES = ['Low', 'Medium', 'High'] as const;

export type RiskProfile = (typeof RISK_PROFILES)[number];
