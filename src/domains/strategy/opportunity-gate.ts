/**
 * Opportunity gate: decides whether a snapshot pair is worth trading and
 * safely fillable at the configured size.
 *
 * Checks run in a fixed order and the first failing one names the skip
 * reason, so logs and metrics stay comparable between runs.
 */

import { applyBps } from "@/lib/decimal";

import type { HedgeConfig } from "./config";
import {
  hasDepth,
  selectLevels,
  spreadAtLeast,
  spreadExceeds,
  spreadTerms,
  toSpreadBps,
} from "./spread";
import type { Decision, SnapshotPair, TradeIntent } from "./types";

export type GateConfig = Pick<
  HedgeConfig,
  "direction" | "tradeSizeBase" | "minSpreadBps" | "maxSpreadBps" | "depthMultiplierBps"
>;

export const evaluateOpportunity = (pair: SnapshotPair, config: GateConfig): Decision => {
  const { legA, legB } = selectLevels(config.direction, pair.spot, pair.perp);

  if (!legA) {
    return { action: "skip", reason: "missing top of book on venue A", spreadBps: null };
  }
  if (!legB) {
    return { action: "skip", reason: "missing top of book on venue B", spreadBps: null };
  }

  if (legA.priceQuote <= 0n || legB.priceQuote <= 0n) {
    return { action: "skip", reason: "invalid reference price", spreadBps: null };
  }

  const terms = spreadTerms(config.direction, legA.priceQuote, legB.priceQuote);
  const spreadBps = toSpreadBps(terms);

  if (spreadExceeds(terms, config.maxSpreadBps)) {
    return { action: "skip", reason: "anomalous spread", spreadBps };
  }
  if (!spreadAtLeast(terms, config.minSpreadBps)) {
    return { action: "skip", reason: "spread below minimum", spreadBps };
  }

  const size = config.tradeSizeBase;
  if (!hasDepth(legA.quantityBase, size, config.depthMultiplierBps)) {
    return { action: "skip", reason: "insufficient depth on venue A", spreadBps };
  }
  if (!hasDepth(legB.quantityBase, size, config.depthMultiplierBps)) {
    return { action: "skip", reason: "insufficient depth on venue B", spreadBps };
  }

  return { action: "trade", sizeBase: size, spreadBps, levels: { legA, legB } };
};

/**
 * Turn an approved decision into per-leg orders. In `open` the spot buy is
 * enlarged by the fee compensation so the base left after a base-charged
 * fee matches the short.
 */
export const buildTradeIntent = (
  decision: Extract<Decision, { action: "trade" }>,
  config: Pick<HedgeConfig, "symbol" | "direction" | "feeCompensationBps">,
): TradeIntent => {
  const { sizeBase, levels } = decision;
  const opening = config.direction === "open";

  return {
    symbol: config.symbol,
    direction: config.direction,
    legA: {
      leg: "A",
      side: opening ? "BUY" : "SELL",
      quantityBase: opening ? applyBps(sizeBase, config.feeCompensationBps) : sizeBase,
      expectedPriceQuote: levels.legA.priceQuote,
      reduceOnly: false,
    },
    legB: {
      leg: "B",
      side: opening ? "SELL" : "BUY",
      quantityBase: sizeBase,
      expectedPriceQuote: levels.legB.priceQuote,
      reduceOnly: !opening,
    },
    spreadBps: decision.spreadBps,
    referencePriceQuote: levels.legA.priceQuote,
  };
};
