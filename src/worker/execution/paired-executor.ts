/**
 * Paired executor: fires both legs of a trade concurrently, waits for them
 * to settle, checks the fills against each other and records the result
 * into the position ledger exactly once.
 *
 * Dispatch is never retried. Whatever filled is recorded, even when the
 * sibling leg failed, so the rebalancer can correct the imbalance later.
 */

import type { FatalAdapterError } from "@/adapters/errors";
import { createClientOrderId } from "@/adapters/client-order-id";
import type { VenueAdapter } from "@/adapters/types";
import type { LegResult, PositionLedger } from "@/domains/ledger";
import { type TradeJournal, type TradeOutcomeKind, buildTradeRecord } from "@/domains/reporting";
import type { HedgeConfig, TradeIntent } from "@/domains/strategy";
import { BPS_PER_UNIT, absBigInt, maxBigInt } from "@/lib/decimal";
import type { Logger } from "@/lib/logger";

import {
  captureExposureBase,
  placeLeg,
  placementFatal,
  resolvePlacement,
  settleLeg,
} from "./leg-settlement";
import type { LegOrder, PairedOutcome, SettlementConfig } from "./types";

export type PairedExecutorConfig = SettlementConfig & Pick<HedgeConfig, "fillToleranceBps">;

export interface PairedExecutorDeps {
  spot: VenueAdapter;
  perp: VenueAdapter;
  ledger: PositionLedger;
  journal: TradeJournal;
  logger: Logger;
}

export interface PairedExecutor {
  /**
   * Execute `intent`. Resolves with the outcome for every leg-level
   * failure; rejects only with a `FatalAdapterError`, and only after the
   * ledger record is made.
   */
  execute(intent: TradeIntent): Promise<PairedOutcome>;
}

/**
 * Reason the two legs do not count as a hedged pair, or null when they do.
 * Net quantities are compared, so a base-asset fee on the spot buy is
 * already accounted for.
 */
export const checkLegFills = (
  legA: LegResult,
  legB: LegResult,
  fillToleranceBps: bigint,
): string | null => {
  if (legA.state === "timeout" || legB.state === "timeout") {
    return "ambiguous order status";
  }
  const a = legA.netFilledBase;
  const b = legB.netFilledBase;
  if (a === 0n || b === 0n) {
    return "zero fill";
  }
  if (absBigInt(a - b) * BPS_PER_UNIT > fillToleranceBps * maxBigInt(a, b)) {
    return `fills differ by more than ${fillToleranceBps} bps`;
  }
  return null;
};

const legOrders = (
  intent: TradeIntent,
  deps: Pick<PairedExecutorDeps, "spot" | "perp">,
): [LegOrder, LegOrder] => [
  {
    adapter: deps.spot,
    leg: "A",
    symbol: intent.symbol,
    side: intent.legA.side,
    quantityBase: intent.legA.quantityBase,
    reduceOnly: intent.legA.reduceOnly,
    referencePriceQuote: intent.legA.expectedPriceQuote,
  },
  {
    adapter: deps.perp,
    leg: "B",
    symbol: intent.symbol,
    side: intent.legB.side,
    quantityBase: intent.legB.quantityBase,
    reduceOnly: intent.legB.reduceOnly,
    referencePriceQuote: intent.legB.expectedPriceQuote,
  },
];

/**
 * @example
 * ```typescript
 * const executor = createPairedExecutor(
 *   { ...DEFAULT_SETTLEMENT_CONFIG, fillToleranceBps: 100n },
 *   { spot, perp, ledger, journal, logger },
 * );
 * const outcome = await executor.execute(buildTradeIntent(decision, hedgeConfig));
 * if (outcome.kind !== "verified") consecutiveFailures++;
 * ```
 */
export const createPairedExecutor = (
  config: PairedExecutorConfig,
  deps: PairedExecutorDeps,
): PairedExecutor => {
  const { ledger, journal, logger } = deps;

  const execute = async (intent: TradeIntent): Promise<PairedOutcome> => {
    const [orderA, orderB] = legOrders(intent, deps);

    const [exposureA, exposureB] = config.balanceDeltaFallback
      ? await Promise.all([
          captureExposureBase(orderA, logger),
          captureExposureBase(orderB, logger),
        ])
      : [null, null];

    const clientIdA = createClientOrderId();
    const clientIdB = createClientOrderId();
    // Both placements are in flight before either is awaited
    const [settledA, settledB] = await Promise.allSettled([
      placeLeg(orderA, clientIdA),
      placeLeg(orderB, clientIdB),
    ]);
    const placementA = resolvePlacement(orderA, clientIdA, settledA, logger);
    const placementB = resolvePlacement(orderB, clientIdB, settledB, logger);

    const [settledLegA, settledLegB] = await Promise.all([
      settleLeg(orderA, placementA, { config, logger, exposureBeforeBase: exposureA }),
      settleLeg(orderB, placementB, { config, logger, exposureBeforeBase: exposureB }),
    ]);
    const legA = settledLegA.result;
    const legB = settledLegB.result;
    const fatal: FatalAdapterError | null =
      placementFatal(placementA) ??
      placementFatal(placementB) ??
      settledLegA.fatal ??
      settledLegB.fatal;

    if (!placementA.handle && !placementB.handle) {
      logger.error("Both legs failed to dispatch, nothing recorded", undefined, {
        symbol: intent.symbol,
      });
      if (fatal) throw fatal;
      return {
        kind: "leg-failed",
        reason: "both legs failed to dispatch",
        intent,
        legA,
        legB,
        record: null,
      };
    }

    const failedLeg = !placementA.handle ? "A" : !placementB.handle ? "B" : null;
    const reason = failedLeg
      ? `leg ${failedLeg} failed to dispatch`
      : checkLegFills(legA, legB, config.fillToleranceBps);
    const kind: TradeOutcomeKind = failedLeg ? "leg-failed" : reason ? "mismatch" : "verified";

    ledger.recordTrade(legA, legB, intent.referencePriceQuote);
    const record = buildTradeRecord(journal.nextSequence(), kind, intent, legA, legB);
    journal.appendTrade(record);

    const ledgerState = ledger.snapshot();
    const context = {
      symbol: intent.symbol,
      direction: intent.direction,
      outcome: kind,
      legAFilledBase: legA.netFilledBase,
      legBFilledBase: legB.netFilledBase,
      legASource: legA.source,
      legBSource: legB.source,
      cumulativeDiffBase: ledgerState.cumulativeDiffBase,
      imbalanceValueQuote: ledgerState.valueQuote,
    };
    if (reason === null) {
      logger.info("Paired trade verified", {
        ...context,
        expectedSpreadBps: record.expectedSpreadBps,
        actualSpreadBps: record.actualSpreadBps,
      });
    } else {
      logger.warn("Paired trade failed verification", { ...context, reason });
    }

    if (fatal) throw fatal;
    if (reason === null) return { kind: "verified", intent, legA, legB, record };
    return failedLeg
      ? { kind: "leg-failed", reason, intent, legA, legB, record }
      : { kind: "mismatch", reason, intent, legA, legB, record };
  };

  return { execute };
};
