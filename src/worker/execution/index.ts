/**
 * Execution: paired trades, single-leg rebalances and the fill
 * settlement they share.
 */

export type {
  FillPollingConfig,
  LegOrder,
  OrderSettlement,
  PairedOutcome,
  SettledLeg,
  SettlementConfig,
} from "./types";
export { DEFAULT_SETTLEMENT_CONFIG } from "./types";

export { EMPTY_FILL, awaitOrderSettlement } from "./fill-confirmation";
export { inferFilledFromDelta, readExposureBase } from "./balance-delta";
export {
  captureExposureBase,
  placeLeg,
  placementFatal,
  resolvePlacement,
  settleLeg,
  type PlacementResult,
  type SettleLegOptions,
} from "./leg-settlement";

export {
  checkLegFills,
  createPairedExecutor,
  type PairedExecutor,
  type PairedExecutorConfig,
  type PairedExecutorDeps,
} from "./paired-executor";

export {
  createRebalancer,
  type RebalanceOutcome,
  type Rebalancer,
  type RebalancerConfig,
  type RebalancerDeps,
} from "./rebalancer";
