export { calculateSlippageBps, summarizeSlippage } from "./slippage";
export { createTradeJournal, type TradeJournal } from "./journal";
export { buildTradeRecord } from "./trade-record";
export { summarizeSession, type SummaryInput } from "./summary";
export type {
  LegTotals,
  SessionSummary,
  SlippageStats,
  StopReason,
  TradeOutcomeKind,
  TradeRecord,
} from "./types";
