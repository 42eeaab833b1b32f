/**
 * Collateral guard: checks each venue can carry the next trade before any
 * order goes out, pulling idle funds from the venue's earn product when it
 * falls short.
 */

import { isFatalAdapterError } from "@/adapters/errors";
import type { VenueAdapter } from "@/adapters/types";
import { findBalance, netPositionBase, splitSymbol } from "@/adapters/types";
import { InsufficientCollateralError } from "@/domains/errors";
import type { LegResult } from "@/domains/ledger";
import type { HedgeConfig, TradeIntent } from "@/domains/strategy";
import { QUOTE_SCALE, applyBps, calculateNotionalQuote, maxBigInt } from "@/lib/decimal";
import type { Logger } from "@/lib/logger";

/** Headroom on the spot quote balance for price movement before the fill */
export const SPOT_BUFFER_BPS = 200n;
/** Headroom on the perpetual initial margin */
export const MARGIN_BUFFER_BPS = 500n;
/** Redeem slightly more than the requirement */
export const REDEEM_BUFFER_BPS = 100n;
/** Smallest quote redemption worth a request */
export const MIN_REDEEM_QUOTE = 50n * QUOTE_SCALE;

export type CollateralGuardConfig = Pick<
  HedgeConfig,
  "symbol" | "direction" | "redeemIdleFunds" | "parkSpotInEarn"
> & {
  /** Leverage in effect on the perpetual venue */
  leverage: number;
};

export interface CollateralGuardDeps {
  spot: VenueAdapter;
  perp: VenueAdapter;
  logger: Logger;
}

export type CollateralCheck = { kind: "ok" } | { kind: "position-exhausted"; reason: string };

export interface CollateralGuard {
  /**
   * @throws {InsufficientCollateralError} when a venue is short even after
   * redeeming idle funds
   */
  ensure(intent: TradeIntent): Promise<CollateralCheck>;
  /** Move base bought on the spot leg into the earn product, when enabled */
  park(legA: LegResult): Promise<void>;
}

export const createCollateralGuard = (
  config: CollateralGuardConfig,
  deps: CollateralGuardDeps,
): CollateralGuard => {
  const { spot, perp, logger } = deps;
  const { base, quote } = splitSymbol(config.symbol);

  const availableOf = async (adapter: VenueAdapter, asset: string): Promise<bigint> =>
    findBalance(await adapter.fetchBalances(), asset).availableBase;

  const redeem = async (
    adapter: VenueAdapter,
    asset: string,
    amount: bigint,
  ): Promise<boolean> => {
    if (!config.redeemIdleFunds || !adapter.redeemIdleFunds) return false;
    try {
      const redeemed = await adapter.redeemIdleFunds(asset, amount);
      logger.info("Redeemed idle funds", { venue: adapter.venue, asset, amount, redeemed });
      return redeemed;
    } catch (error) {
      if (isFatalAdapterError(error)) throw error;
      logger.warn("Idle fund redemption failed", {
        venue: adapter.venue,
        asset,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  };

  /** Available balance after topping up from earn, if it was short */
  const topUp = async (
    adapter: VenueAdapter,
    asset: string,
    requiredBase: bigint,
    minimumRedeem: bigint,
  ): Promise<bigint> => {
    const available = await availableOf(adapter, asset);
    if (available >= requiredBase) return available;
    const amount = maxBigInt(applyBps(requiredBase - available, REDEEM_BUFFER_BPS), minimumRedeem);
    if (!(await redeem(adapter, asset, amount))) return available;
    return availableOf(adapter, asset);
  };

  const requireBalance = async (
    adapter: VenueAdapter,
    asset: string,
    requiredBase: bigint,
  ): Promise<void> => {
    const available = await topUp(adapter, asset, requiredBase, MIN_REDEEM_QUOTE);
    if (available < requiredBase) {
      throw new InsufficientCollateralError(adapter.venue, asset, requiredBase, available);
    }
  };

  const ensureOpen = async (intent: TradeIntent): Promise<CollateralCheck> => {
    const spotQuote = applyBps(
      calculateNotionalQuote(intent.legA.quantityBase, intent.legA.expectedPriceQuote),
      SPOT_BUFFER_BPS,
    );
    const marginQuote = applyBps(
      calculateNotionalQuote(intent.legB.quantityBase, intent.legB.expectedPriceQuote) /
        BigInt(config.leverage),
      MARGIN_BUFFER_BPS,
    );
    await requireBalance(spot, quote, spotQuote);
    await requireBalance(perp, quote, marginQuote);
    return { kind: "ok" };
  };

  const ensureClose = async (intent: TradeIntent): Promise<CollateralCheck> => {
    const spotBase = await topUp(spot, base, intent.legA.quantityBase, 0n);
    if (spotBase < intent.legA.quantityBase) {
      return { kind: "position-exhausted", reason: `${base} balance below trade size` };
    }
    const shortBase = -netPositionBase(await perp.fetchPositions(config.symbol), config.symbol);
    if (shortBase < intent.legB.quantityBase) {
      return { kind: "position-exhausted", reason: "short position below trade size" };
    }
    return { kind: "ok" };
  };

  const park = async (legA: LegResult): Promise<void> => {
    if (!config.parkSpotInEarn || config.direction !== "open") return;
    if (!spot.subscribeIdleFunds || legA.netFilledBase <= 0n) return;
    try {
      const parked = await spot.subscribeIdleFunds(base, legA.netFilledBase);
      logger.info("Parked spot fill in earn", { asset: base, amount: legA.netFilledBase, parked });
    } catch (error) {
      if (isFatalAdapterError(error)) throw error;
      logger.warn("Parking spot fill failed", {
        asset: base,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return {
    ensure: (intent) => (config.direction === "open" ? ensureOpen(intent) : ensureClose(intent)),
    park,
  };
};
