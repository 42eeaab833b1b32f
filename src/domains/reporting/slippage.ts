/**
 * Realized slippage against the top-of-book prices a trade was approved on.
 */

import type { OrderSide } from "@/adapters/types";
import { BPS_PER_UNIT } from "@/lib/decimal";

import type { SlippageStats } from "./types";

/**
 * Slippage of a fill in bps, positive when adverse: paying more than
 * expected on a buy, receiving less on a sell. Truncated toward zero.
 */
export const calculateSlippageBps = (
  side: OrderSide,
  expectedPriceQuote: bigint,
  actualPriceQuote: bigint,
): bigint => {
  if (expectedPriceQuote <= 0n) return 0n;
  const adverse =
    side === "BUY" ? actualPriceQuote - expectedPriceQuote : expectedPriceQuote - actualPriceQuote;
  return (adverse * BPS_PER_UNIT) / expectedPriceQuote;
};

export const summarizeSlippage = (observations: readonly bigint[]): SlippageStats => {
  if (observations.length === 0) return { count: 0, meanBps: 0n, worstBps: null };

  let total = 0n;
  let worst = observations[0] ?? 0n;
  for (const value of observations) {
    total += value;
    if (value > worst) worst = value;
  }
  return {
    count: observations.length,
    meanBps: total / BigInt(observations.length),
    worstBps: worst,
  };
};
