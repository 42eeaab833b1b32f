/**
 * Ledger and leg result types.
 */

import type { Fee, OrderSide, TerminalOrderState } from "@/adapters/types";

import type { LegId } from "../strategy/types";

/**
 * `idle`: no imbalance. `accumulating`: trades recorded, imbalance may be
 * nonzero. `rebalance-pending`: a correction is in flight.
 */
export type LedgerPhase = "idle" | "accumulating" | "rebalance-pending";

/**
 * `open-short` sells on the perpetual venue, `buy-spot` buys on the spot
 * venue.
 */
export type RebalanceAction = "open-short" | "buy-spot";

/** How a leg's filled quantity was established. */
export type FillSource = "status" | "balance-delta" | "none";

/**
 * Final state of one leg. `timeout` means the order never reported a
 * terminal state; `dispatch-failed` means no order is known to exist.
 */
export type LegState = TerminalOrderState | "timeout" | "dispatch-failed";

export interface LegResult {
  venue: string;
  leg: LegId;
  side: OrderSide;
  orderId: string | null;
  clientOrderId: string | null;
  requestedBase: bigint;
  /** Gross filled quantity as reported or inferred */
  filledBase: bigint;
  /** Filled quantity less any fee charged in the base asset */
  netFilledBase: bigint;
  avgPriceQuote: bigint | null;
  fee: Fee | null;
  state: LegState;
  source: FillSource;
}

export interface LedgerSnapshot {
  phase: LedgerPhase;
  /** Σ (legB.net - legA.net) plus rebalance corrections */
  cumulativeDiffBase: bigint;
  /** Imbalance valued at the last reference price */
  valueQuote: bigint;
  referencePriceQuote: bigint;
  tradesExecuted: number;
  rebalancesExecuted: number;
}
