/**
 * Hedge strategy: configuration, spread arithmetic and the opportunity gate.
 */

export type {
  Decision,
  LegId,
  LegIntent,
  QuotedLevels,
  SkipReason,
  SnapshotPair,
  TradeIntent,
} from "./types";

// Config
export type { HedgeConfig, HedgeDirection } from "./config";
export { DEFAULT_HEDGE_CONFIG, HedgeConfigSchema, createHedgeConfig } from "./config";

// Spread
export {
  hasDepth,
  selectLevels,
  spreadAtLeast,
  spreadExceeds,
  spreadTerms,
  toSpreadBps,
} from "./spread";
export type { LegLevels, SpreadTerms } from "./spread";

// Gate
export { buildTradeIntent, evaluateOpportunity } from "./opportunity-gate";
export type { GateConfig } from "./opportunity-gate";
