/**
 * Strategy domain types: paired snapshots, gate decisions and trade intents.
 */

import type { OrderBookLevel, OrderBookSnapshot, OrderSide } from "@/adapters/types";

import type { HedgeDirection } from "./config";

/** Leg A is the spot venue, leg B the perpetual venue. */
export type LegId = "A" | "B";

/**
 * Latest snapshot of each venue, both fresher than the configured bound
 * at `pairedAt`.
 */
export interface SnapshotPair {
  spot: OrderBookSnapshot;
  perp: OrderBookSnapshot;
  pairedAt: number;
}

/** The top-of-book level each leg trades against. */
export interface QuotedLevels {
  legA: OrderBookLevel;
  legB: OrderBookLevel;
}

export type SkipReason =
  | "missing top of book on venue A"
  | "missing top of book on venue B"
  | "invalid reference price"
  | "anomalous spread"
  | "spread below minimum"
  | "insufficient depth on venue A"
  | "insufficient depth on venue B";

export type Decision =
  | {
      action: "skip";
      reason: SkipReason;
      /** Null when no spread could be computed */
      spreadBps: bigint | null;
    }
  | {
      action: "trade";
      sizeBase: bigint;
      spreadBps: bigint;
      levels: QuotedLevels;
    };

export interface LegIntent {
  leg: LegId;
  side: OrderSide;
  quantityBase: bigint;
  /** Price of the level this leg consumes */
  expectedPriceQuote: bigint;
  reduceOnly: boolean;
}

export interface TradeIntent {
  symbol: string;
  direction: HedgeDirection;
  legA: LegIntent;
  legB: LegIntent;
  /** Spread that approved the trade */
  spreadBps: bigint;
  /** Spot leg price, used to value the ledger imbalance */
  referencePriceQuote: bigint;
}
