/**
 * Exposure reads backing the balance-delta fill fallback.
 *
 * Some venues report a filled market order with zero quantity. The fill is
 * then inferred from how far the venue's exposure moved: the base balance
 * on the spot venue, the signed position on the perpetual venue. Any other
 * balance change in the same window (a manual trade, a transfer) is
 * attributed to the order, so the inferred amount is capped at the
 * requested quantity and should be read as an estimate.
 */

import { findBalance, netPositionBase, splitSymbol } from "@/adapters/types";
import type { VenueAdapter } from "@/adapters/types";
import { absBigInt, minBigInt } from "@/lib/decimal";

/** Spot base balance (total, held included) or signed perp position */
export const readExposureBase = async (adapter: VenueAdapter, symbol: string): Promise<bigint> => {
  if (adapter.market === "spot") {
    const { base } = splitSymbol(symbol);
    return findBalance(await adapter.fetchBalances(), base).totalBase;
  }
  return netPositionBase(await adapter.fetchPositions(symbol), symbol);
};

export const inferFilledFromDelta = (
  beforeBase: bigint,
  afterBase: bigint,
  requestedBase: bigint,
): bigint => minBigInt(absBigInt(afterBase - beforeBase), requestedBase);
