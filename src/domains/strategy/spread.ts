/**
 * Cross-venue spread arithmetic.
 *
 * `open` buys spot at the ask on A and sells the perp at the bid on B, so
 * the captured spread is `(bidB - askA) / askA`. `close` reverses both
 * legs: `(bidA - askB) / askB`.
 */

import type { OrderBookLevel, OrderBookSnapshot } from "@/adapters/types";
import { BPS_PER_UNIT } from "@/lib/decimal";

import type { HedgeDirection } from "./config";

export interface LegLevels {
  legA: OrderBookLevel | null;
  legB: OrderBookLevel | null;
}

/**
 * Levels consumed by each leg for `direction`.
 */
export const selectLevels = (
  direction: HedgeDirection,
  spot: OrderBookSnapshot,
  perp: OrderBookSnapshot,
): LegLevels =>
  direction === "open"
    ? { legA: spot.bestAsk, legB: perp.bestBid }
    : { legA: spot.bestBid, legB: perp.bestAsk };

export interface SpreadTerms {
  /** Selling price minus buying price */
  numeratorQuote: bigint;
  /** Buying price */
  denominatorQuote: bigint;
}

export const spreadTerms = (
  direction: HedgeDirection,
  legAPriceQuote: bigint,
  legBPriceQuote: bigint,
): SpreadTerms =>
  direction === "open"
    ? { numeratorQuote: legBPriceQuote - legAPriceQuote, denominatorQuote: legAPriceQuote }
    : { numeratorQuote: legAPriceQuote - legBPriceQuote, denominatorQuote: legBPriceQuote };

/**
 * Spread in basis points, truncated toward zero. Only for reporting;
 * threshold checks compare the terms directly.
 */
export const toSpreadBps = ({ numeratorQuote, denominatorQuote }: SpreadTerms): bigint =>
  (numeratorQuote * BPS_PER_UNIT) / denominatorQuote;

/** `spread >= thresholdBps`, exact. Requires a positive denominator. */
export const spreadAtLeast = (terms: SpreadTerms, thresholdBps: bigint): boolean =>
  terms.numeratorQuote * BPS_PER_UNIT >= thresholdBps * terms.denominatorQuote;

/** `|spread| > ceilingBps`, exact. Requires a positive denominator. */
export const spreadExceeds = (terms: SpreadTerms, ceilingBps: bigint): boolean => {
  const magnitude = terms.numeratorQuote < 0n ? -terms.numeratorQuote : terms.numeratorQuote;
  return magnitude * BPS_PER_UNIT > ceilingBps * terms.denominatorQuote;
};

/** `available >= required * multiplierBps / 10000`, exact. */
export const hasDepth = (
  availableBase: bigint,
  requiredBase: bigint,
  multiplierBps: bigint,
): boolean => availableBase * BPS_PER_UNIT >= requiredBase * multiplierBps;
