/**
 * Position ledger: the running signed imbalance between the two legs.
 *
 * The only session-durable state. The paired executor and the rebalancer
 * are its sole writers, and both run through one serial queue.
 */

import { absBigInt, calculateNotionalQuote } from "@/lib/decimal";

import { LedgerStateError } from "../errors";
import type { HedgeDirection } from "../strategy/config";
import type { LedgerPhase, LedgerSnapshot, LegResult, RebalanceAction } from "./types";

export interface PositionLedgerConfig {
  direction: HedgeDirection;
  rebalanceThresholdQuote: bigint;
}

export interface RebalancePlan {
  action: RebalanceAction;
  quantityBase: bigint;
}

export interface PositionLedger {
  recordTrade(legA: LegResult, legB: LegResult, referencePriceQuote: bigint): void;
  needsRebalance(): boolean;
  /** Correction that brings exposure back to zero, or null when flat */
  directionToCorrect(): RebalancePlan | null;
  beginRebalance(): void;
  recordRebalance(action: RebalanceAction, filledBase: bigint, priceQuote: bigint): void;
  abortRebalance(): void;
  snapshot(): LedgerSnapshot;
}

/**
 * @example
 * ```typescript
 * const ledger = createPositionLedger({
 *   direction: "open",
 *   rebalanceThresholdQuote: 600_000_000n, // 6 USDT
 * });
 * ledger.recordTrade(legA, legB, askA);
 * if (ledger.needsRebalance()) {
 *   const plan = ledger.directionToCorrect();
 * }
 * ```
 */
export const createPositionLedger = (config: PositionLedgerConfig): PositionLedger => {
  // Exposure is -diff when opening (long spot, short perp) and +diff when closing
  const exposureSign = config.direction === "open" ? -1n : 1n;

  let phase: LedgerPhase = "idle";
  let phaseBeforeRebalance: LedgerPhase = "idle";
  let cumulativeDiffBase = 0n;
  let referencePriceQuote = 0n;
  let tradesExecuted = 0;
  let rebalancesExecuted = 0;

  const valueQuote = (): bigint => calculateNotionalQuote(cumulativeDiffBase, referencePriceQuote);

  const recordTrade = (legA: LegResult, legB: LegResult, priceQuote: bigint): void => {
    if (phase === "rebalance-pending") {
      throw new LedgerStateError("Cannot record a trade while a rebalance is pending");
    }
    cumulativeDiffBase += legB.netFilledBase - legA.netFilledBase;
    if (priceQuote > 0n) referencePriceQuote = priceQuote;
    tradesExecuted++;
    phase = "accumulating";
  };

  const needsRebalance = (): boolean =>
    phase !== "rebalance-pending" && absBigInt(valueQuote()) >= config.rebalanceThresholdQuote;

  const directionToCorrect = (): RebalancePlan | null => {
    const exposureBase = exposureSign * cumulativeDiffBase;
    if (exposureBase === 0n) return null;
    return {
      action: exposureBase > 0n ? "open-short" : "buy-spot",
      quantityBase: absBigInt(exposureBase),
    };
  };

  const beginRebalance = (): void => {
    if (phase === "rebalance-pending") {
      throw new LedgerStateError("A rebalance is already pending");
    }
    phaseBeforeRebalance = phase;
    phase = "rebalance-pending";
  };

  const recordRebalance = (
    action: RebalanceAction,
    filledBase: bigint,
    priceQuote: bigint,
  ): void => {
    if (phase !== "rebalance-pending") {
      throw new LedgerStateError(`Cannot record a rebalance in phase ${phase}`);
    }
    // Selling on the perp lowers exposure; buying spot raises it
    const exposureChange = action === "open-short" ? -filledBase : filledBase;
    cumulativeDiffBase += exposureSign * exposureChange;
    if (priceQuote > 0n) referencePriceQuote = priceQuote;
    rebalancesExecuted++;
    phase = cumulativeDiffBase === 0n ? "idle" : "accumulating";
  };

  const abortRebalance = (): void => {
    if (phase !== "rebalance-pending") {
      throw new LedgerStateError(`Cannot abort a rebalance in phase ${phase}`);
    }
    phase = phaseBeforeRebalance;
  };

  return {
    recordTrade,
    needsRebalance,
    directionToCorrect,
    beginRebalance,
    recordRebalance,
    abortRebalance,
    snapshot: () => ({
      phase,
      cumulativeDiffBase,
      valueQuote: valueQuote(),
      referencePriceQuote,
      tradesExecuted,
      rebalancesExecuted,
    }),
  };
};
