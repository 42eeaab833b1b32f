/**
 * Execution types: leg orders, fill settlement and paired trade outcomes.
 */

import type { FatalAdapterError } from "@/adapters/errors";
import type { OrderFill, OrderSide, TerminalOrderState, VenueAdapter } from "@/adapters/types";
import type { LegResult } from "@/domains/ledger";
import type { TradeRecord } from "@/domains/reporting";
import type { LegId, TradeIntent } from "@/domains/strategy";

export interface FillPollingConfig {
  /** Delay between status polls of an open order */
  fillPollIntervalMs: number;
  /** Give up and report the last observed fill after this long */
  fillTimeoutMs: number;
}

export interface SettlementConfig extends FillPollingConfig {
  /**
   * Infer the filled quantity from the venue's balance or position change
   * when a filled order reports zero quantity.
   */
  balanceDeltaFallback: boolean;
}

export const DEFAULT_SETTLEMENT_CONFIG: SettlementConfig = {
  fillPollIntervalMs: 500,
  fillTimeoutMs: 20_000,
  balanceDeltaFallback: true,
};

/**
 * One market order on one leg.
 */
export interface LegOrder {
  adapter: VenueAdapter;
  leg: LegId;
  symbol: string;
  side: OrderSide;
  quantityBase: bigint;
  reduceOnly: boolean;
  /** Lets spot venues size market buys in quote */
  referencePriceQuote?: bigint;
}

/**
 * How an order left the status poller. `timeout` means no terminal state
 * was seen; `fill` is then the last pending fill.
 */
export interface OrderSettlement {
  state: TerminalOrderState | "timeout";
  fill: OrderFill;
  /** Set when the venue reported a fatal fault while polling */
  fatal: FatalAdapterError | null;
}

export interface SettledLeg {
  result: LegResult;
  fatal: FatalAdapterError | null;
}

interface OutcomeLegs {
  intent: TradeIntent;
  legA: LegResult;
  legB: LegResult;
}

/**
 * Result of one paired trade. A `leg-failed` outcome with a null record
 * means neither order was placed and nothing was recorded.
 */
export type PairedOutcome =
  | (OutcomeLegs & { kind: "verified"; record: TradeRecord })
  | (OutcomeLegs & { kind: "mismatch"; reason: string; record: TradeRecord })
  | (OutcomeLegs & { kind: "leg-failed"; reason: string; record: TradeRecord | null });
