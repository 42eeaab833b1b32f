/**
 * Run summary assembled from trade records and the final ledger state.
 */

import type { LedgerSnapshot, LegResult } from "../ledger/types";
import { summarizeSlippage } from "./slippage";
import type { LegTotals, SessionSummary, StopReason, TradeRecord } from "./types";

export interface SummaryInput {
  stopReason: StopReason;
  targetTrades: number;
  records: readonly TradeRecord[];
  /** Fee-bearing rebalance legs, counted in fee totals */
  rebalanceLegs?: readonly LegResult[];
  ledger: LedgerSnapshot;
  initialPerpPositionBase: bigint | null;
  finalPerpPositionBase: bigint | null;
  startedAt: Date;
  finishedAt: Date;
}

const totals = (legs: readonly LegResult[]): LegTotals =>
  legs.reduce(
    (sum, leg) => ({
      grossFilledBase: sum.grossFilledBase + leg.filledBase,
      netFilledBase: sum.netFilledBase + leg.netFilledBase,
    }),
    { grossFilledBase: 0n, netFilledBase: 0n },
  );

const present = (values: readonly (bigint | null)[]): bigint[] =>
  values.filter((value): value is bigint => value !== null);

export const summarizeSession = (input: SummaryInput): SessionSummary => {
  const { records, ledger } = input;

  const fees: Record<string, bigint> = {};
  const legs = [
    ...records.flatMap((record) => [record.legA, record.legB]),
    ...(input.rebalanceLegs ?? []),
  ];
  for (const leg of legs) {
    if (leg.fee) fees[leg.fee.asset] = (fees[leg.fee.asset] ?? 0n) + leg.fee.amount;
  }

  return {
    stopReason: input.stopReason,
    tradesCompleted: records.filter((record) => record.kind === "verified").length,
    targetTrades: input.targetTrades,
    failedTrades: records.filter((record) => record.kind !== "verified").length,
    rebalances: ledger.rebalancesExecuted,
    cumulativeDiffBase: ledger.cumulativeDiffBase,
    imbalanceValueQuote: ledger.valueQuote,
    legA: totals(records.map((record) => record.legA)),
    legB: totals(records.map((record) => record.legB)),
    fees,
    slippage: {
      legA: summarizeSlippage(present(records.map((record) => record.legASlippageBps))),
      legB: summarizeSlippage(present(records.map((record) => record.legBSlippageBps))),
      spread: summarizeSlippage(present(records.map((record) => record.spreadSlippageBps))),
    },
    initialPerpPositionBase: input.initialPerpPositionBase,
    finalPerpPositionBase: input.finalPerpPositionBase,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
  };
};
