export {
  createPositionLedger,
  type PositionLedger,
  type PositionLedgerConfig,
  type RebalancePlan,
} from "./position-ledger";
export type {
  FillSource,
  LedgerPhase,
  LedgerSnapshot,
  LegResult,
  LegState,
  RebalanceAction,
} from "./types";
