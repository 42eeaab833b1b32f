export {
  createHedgeSession,
  type HedgeSession,
  type HedgeSessionDeps,
  type SessionHealth,
  type SessionState,
} from "./hedge-session";
export {
  createCollateralGuard,
  type CollateralCheck,
  type CollateralGuard,
  type CollateralGuardConfig,
} from "./collateral";
export {
  PROMETHEUS_CONTENT_TYPE,
  createSessionMetrics,
  type FailureReason,
  type SessionMetrics,
} from "./metrics";
export { DEFAULT_LEVERAGE, prepareVenues, type VenueSetup, type VenueSetupConfig } from "./setup";
