import type { LegResult } from "../ledger/types";
import { spreadTerms, toSpreadBps } from "../strategy/spread";
import type { TradeIntent } from "../strategy/types";
import { calculateSlippageBps } from "./slippage";
import type { TradeOutcomeKind, TradeRecord } from "./types";

const legSlippage = (result: LegResult, expectedPriceQuote: bigint): bigint | null =>
  result.avgPriceQuote === null || result.netFilledBase === 0n
    ? null
    : calculateSlippageBps(result.side, expectedPriceQuote, result.avgPriceQuote);

/**
 * Per-trade record with the spread actually captured. Spread figures need
 * an average price on both legs.
 */
export const buildTradeRecord = (
  sequence: number,
  kind: TradeOutcomeKind,
  intent: TradeIntent,
  legA: LegResult,
  legB: LegResult,
  settledAt: Date = new Date(),
): TradeRecord => {
  const actualSpreadBps =
    legA.avgPriceQuote !== null &&
    legB.avgPriceQuote !== null &&
    legA.avgPriceQuote > 0n &&
    legB.avgPriceQuote > 0n
      ? toSpreadBps(spreadTerms(intent.direction, legA.avgPriceQuote, legB.avgPriceQuote))
      : null;

  return {
    sequence,
    kind,
    legA,
    legB,
    expectedSpreadBps: intent.spreadBps,
    actualSpreadBps,
    legASlippageBps: legSlippage(legA, intent.legA.expectedPriceQuote),
    legBSlippageBps: legSlippage(legB, intent.legB.expectedPriceQuote),
    spreadSlippageBps: actualSpreadBps === null ? null : intent.spreadBps - actualSpreadBps,
    settledAt,
  };
};
