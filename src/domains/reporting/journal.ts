import type { LegResult } from "../ledger/types";
import type { TradeRecord } from "./types";

/**
 * Append-only record of what a session executed, read back for the run
 * summary. Writers are the paired executor and the rebalancer.
 */
export interface TradeJournal {
  appendTrade(record: TradeRecord): void;
  appendRebalance(leg: LegResult): void;
  /** Next trade sequence number, starting at 1 */
  nextSequence(): number;
  trades(): readonly TradeRecord[];
  rebalanceLegs(): readonly LegResult[];
}

export const createTradeJournal = (): TradeJournal => {
  const trades: TradeRecord[] = [];
  const rebalanceLegs: LegResult[] = [];

  return {
    appendTrade: (record) => {
      trades.push(record);
    },
    appendRebalance: (leg) => {
      rebalanceLegs.push(leg);
    },
    nextSequence: () => trades.length + 1,
    trades: () => [...trades],
    rebalanceLegs: () => [...rebalanceLegs],
  };
};
