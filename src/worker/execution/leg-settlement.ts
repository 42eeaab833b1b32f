/**
 * Dispatch and settlement of single legs, shared by the paired executor
 * and the rebalancer.
 */

import type { FatalAdapterError } from "@/adapters/errors";
import { isAmbiguousPlacementError, isFatalAdapterError } from "@/adapters/errors";
import type { Fee, OrderHandle } from "@/adapters/types";
import { splitSymbol } from "@/adapters/types";
import type { FillSource, LegResult } from "@/domains/ledger";
import type { Logger } from "@/lib/logger";

import { inferFilledFromDelta, readExposureBase } from "./balance-delta";
import { awaitOrderSettlement } from "./fill-confirmation";
import type { LegOrder, SettledLeg, SettlementConfig } from "./types";

export interface PlacementResult {
  /** Null when the venue definitely did not take the order */
  handle: OrderHandle | null;
  clientOrderId: string;
  error: unknown;
}

export const placeLeg = (order: LegOrder, clientOrderId: string): Promise<OrderHandle> =>
  order.adapter.placeMarketOrder({
    symbol: order.symbol,
    side: order.side,
    quantityBase: order.quantityBase,
    reduceOnly: order.reduceOnly,
    referencePriceQuote: order.referencePriceQuote,
    clientOrderId,
  });

/**
 * Interpret a settled placement. A placement that failed ambiguously may
 * still have reached the book, so it is tracked by client order id.
 */
export const resolvePlacement = (
  order: LegOrder,
  clientOrderId: string,
  settled: PromiseSettledResult<OrderHandle>,
  logger: Logger,
): PlacementResult => {
  if (settled.status === "fulfilled") {
    return { handle: settled.value, clientOrderId, error: null };
  }

  const error: unknown = settled.reason;
  const context = {
    venue: order.adapter.venue,
    leg: order.leg,
    side: order.side,
    clientOrderId,
    error: error instanceof Error ? error.message : String(error),
  };

  if (isAmbiguousPlacementError(error)) {
    logger.warn("Order placement outcome unknown, tracking by client order id", context);
    return {
      handle: {
        venue: order.adapter.venue,
        symbol: order.symbol,
        orderId: null,
        clientOrderId,
        side: order.side,
        quantityBase: order.quantityBase,
      },
      clientOrderId,
      error,
    };
  }

  logger.warn("Order placement failed", context);
  return { handle: null, clientOrderId, error };
};

/** Fatal error carried by a placement, if any */
export const placementFatal = (placement: PlacementResult): FatalAdapterError | null =>
  isFatalAdapterError(placement.error) ? placement.error : null;

const baseFee = (fee: Fee | null, baseAsset: string): bigint =>
  fee !== null && fee.asset === baseAsset ? fee.amount : 0n;

const unplacedLeg = (order: LegOrder, clientOrderId: string): LegResult => ({
  venue: order.adapter.venue,
  leg: order.leg,
  side: order.side,
  orderId: null,
  clientOrderId,
  requestedBase: order.quantityBase,
  filledBase: 0n,
  netFilledBase: 0n,
  avgPriceQuote: null,
  fee: null,
  state: "dispatch-failed",
  source: "none",
});

export interface SettleLegOptions {
  config: SettlementConfig;
  logger: Logger;
  /** Exposure read just before dispatch; null disables the fallback */
  exposureBeforeBase: bigint | null;
}

/**
 * Wait for a placed leg to settle and work out what it filled. Never
 * rejects: faults come back on the result so the sibling leg can finish.
 */
export const settleLeg = async (
  order: LegOrder,
  placement: PlacementResult,
  options: SettleLegOptions,
): Promise<SettledLeg> => {
  const { config, logger, exposureBeforeBase } = options;
  const { handle } = placement;
  if (!handle) {
    return { result: unplacedLeg(order, placement.clientOrderId), fatal: null };
  }

  const settlement = await awaitOrderSettlement(order.adapter, handle, config, logger);
  const { base } = splitSymbol(order.symbol);
  let fatal = settlement.fatal;
  const { fill } = settlement;
  let source: FillSource = "status";
  let filledBase = fill.filledQuantityBase;
  let netFilledBase = filledBase - baseFee(fill.fee, base);

  if (settlement.state === "filled" && filledBase === 0n) {
    source = "none";
    if (config.balanceDeltaFallback && exposureBeforeBase !== null) {
      try {
        const afterBase = await readExposureBase(order.adapter, order.symbol);
        filledBase = inferFilledFromDelta(exposureBeforeBase, afterBase, order.quantityBase);
        // The exposure move is already net of any base-asset fee
        netFilledBase = filledBase;
        source = "balance-delta";
        logger.warn("Filled order reported zero quantity, inferred fill from exposure", {
          venue: order.adapter.venue,
          leg: order.leg,
          clientOrderId: handle.clientOrderId,
          exposureBeforeBase,
          exposureAfterBase: afterBase,
          inferredBase: filledBase,
        });
      } catch (error) {
        if (isFatalAdapterError(error)) fatal = fatal ?? error;
        logger.warn("Exposure read for fill inference failed", {
          venue: order.adapter.venue,
          leg: order.leg,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  return {
    result: {
      venue: order.adapter.venue,
      leg: order.leg,
      side: order.side,
      orderId: handle.orderId,
      clientOrderId: handle.clientOrderId,
      requestedBase: order.quantityBase,
      filledBase,
      netFilledBase: netFilledBase > 0n ? netFilledBase : 0n,
      avgPriceQuote: fill.avgFillPriceQuote,
      fee: fill.fee,
      state: settlement.state,
      source,
    },
    fatal,
  };
};

/**
 * Exposure of `order`'s venue before dispatch, or null when it cannot be
 * read. A fatal fault is rethrown since nothing has been placed yet.
 */
export const captureExposureBase = async (
  order: LegOrder,
  logger: Logger,
): Promise<bigint | null> => {
  try {
    return await readExposureBase(order.adapter, order.symbol);
  } catch (error) {
    if (isFatalAdapterError(error)) throw error;
    logger.warn("Pre-trade exposure read failed, fill inference disabled for this leg", {
      venue: order.adapter.venue,
      leg: order.leg,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
};
