/**
 * Execution report types: per-trade records and the run summary.
 */

import type { LegResult } from "../ledger/types";

export type TradeOutcomeKind = "verified" | "mismatch" | "leg-failed";

export type StopReason =
  | "target-reached"
  | "cancelled"
  | "fatal-error"
  | "insufficient-collateral"
  | "position-exhausted"
  | "consecutive-failures";

export interface TradeRecord {
  sequence: number;
  kind: TradeOutcomeKind;
  legA: LegResult;
  legB: LegResult;
  expectedSpreadBps: bigint;
  /** Null unless both legs report an average price */
  actualSpreadBps: bigint | null;
  /** Positive is adverse */
  legASlippageBps: bigint | null;
  legBSlippageBps: bigint | null;
  /** Expected minus actual spread; positive is adverse */
  spreadSlippageBps: bigint | null;
  settledAt: Date;
}

export interface SlippageStats {
  count: number;
  /** Truncated mean; 0n when count is 0 */
  meanBps: bigint;
  /** Most adverse observation; null when count is 0 */
  worstBps: bigint | null;
}

export interface LegTotals {
  grossFilledBase: bigint;
  netFilledBase: bigint;
}

export interface SessionSummary {
  stopReason: StopReason;
  tradesCompleted: number;
  targetTrades: number;
  failedTrades: number;
  rebalances: number;
  cumulativeDiffBase: bigint;
  imbalanceValueQuote: bigint;
  legA: LegTotals;
  legB: LegTotals;
  /** Fee totals keyed by asset */
  fees: Record<string, bigint>;
  slippage: {
    legA: SlippageStats;
    legB: SlippageStats;
    spread: SlippageStats;
  };
  initialPerpPositionBase: bigint | null;
  finalPerpPositionBase: bigint | null;
  startedAt: Date;
  finishedAt: Date;
}
