/**
 * Rebalancer: one corrective market order that brings the ledger
 * imbalance back toward zero.
 *
 * `needsRebalance()` is read fresh on every run, so a second run right
 * after a successful one is a no-op.
 */

import { createClientOrderId } from "@/adapters/client-order-id";
import type { VenueAdapter } from "@/adapters/types";
import type { LegResult, PositionLedger, RebalanceAction } from "@/domains/ledger";
import type { TradeJournal } from "@/domains/reporting";
import type { Logger } from "@/lib/logger";

import {
  captureExposureBase,
  placeLeg,
  placementFatal,
  resolvePlacement,
  settleLeg,
} from "./leg-settlement";
import type { LegOrder, SettlementConfig } from "./types";

export type RebalanceOutcome =
  | { kind: "noop" }
  | { kind: "rebalanced"; action: RebalanceAction; leg: LegResult }
  | { kind: "failed"; action: RebalanceAction; reason: string; leg: LegResult };

export interface RebalancerDeps {
  spot: VenueAdapter;
  perp: VenueAdapter;
  ledger: PositionLedger;
  journal: TradeJournal;
  logger: Logger;
}

export interface RebalancerConfig extends SettlementConfig {
  symbol: string;
}

export interface Rebalancer {
  /** Rejects only with a `FatalAdapterError`, after the ledger is settled */
  run(): Promise<RebalanceOutcome>;
}

export const createRebalancer = (config: RebalancerConfig, deps: RebalancerDeps): Rebalancer => {
  const { ledger, journal, logger } = deps;

  const run = async (): Promise<RebalanceOutcome> => {
    if (!ledger.needsRebalance()) return { kind: "noop" };
    const plan = ledger.directionToCorrect();
    if (!plan) return { kind: "noop" };

    const { referencePriceQuote, valueQuote } = ledger.snapshot();
    const order: LegOrder =
      plan.action === "open-short"
        ? {
            adapter: deps.perp,
            leg: "B",
            symbol: config.symbol,
            side: "SELL",
            quantityBase: plan.quantityBase,
            reduceOnly: false,
          }
        : {
            adapter: deps.spot,
            leg: "A",
            symbol: config.symbol,
            side: "BUY",
            quantityBase: plan.quantityBase,
            reduceOnly: false,
            referencePriceQuote,
          };

    logger.info("Rebalancing", {
      action: plan.action,
      venue: order.adapter.venue,
      quantityBase: plan.quantityBase,
      imbalanceValueQuote: valueQuote,
    });

    ledger.beginRebalance();
    let exposureBeforeBase: bigint | null;
    try {
      exposureBeforeBase = config.balanceDeltaFallback
        ? await captureExposureBase(order, logger)
        : null;
    } catch (error) {
      ledger.abortRebalance();
      throw error;
    }

    const clientOrderId = createClientOrderId();
    const [settled] = await Promise.allSettled([placeLeg(order, clientOrderId)]);
    const placement = resolvePlacement(order, clientOrderId, settled, logger);
    const { result: leg, fatal: pollFatal } = await settleLeg(order, placement, {
      config,
      logger,
      exposureBeforeBase,
    });
    const fatal = placementFatal(placement) ?? pollFatal;

    let outcome: RebalanceOutcome;
    if (leg.netFilledBase > 0n) {
      const priceQuote = leg.avgPriceQuote ?? referencePriceQuote;
      ledger.recordRebalance(plan.action, leg.netFilledBase, priceQuote);
      journal.appendRebalance(leg);
      outcome = { kind: "rebalanced", action: plan.action, leg };
      logger.info("Rebalance filled", {
        action: plan.action,
        filledBase: leg.netFilledBase,
        source: leg.source,
        cumulativeDiffBase: ledger.snapshot().cumulativeDiffBase,
      });
    } else {
      ledger.abortRebalance();
      if (leg.state !== "dispatch-failed") journal.appendRebalance(leg);
      const reason = leg.state === "dispatch-failed" ? "dispatch failed" : `no fill (${leg.state})`;
      outcome = { kind: "failed", action: plan.action, reason, leg };
      logger.warn("Rebalance failed", { action: plan.action, reason });
    }

    if (fatal) throw fatal;
    return outcome;
  };

  return { run };
};
