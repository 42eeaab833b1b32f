/**
 * Venue adapter exports.
 */

export type {
  Balance,
  Fee,
  LimitOrderParams,
  MarginMode,
  MarketKind,
  MarketOrderParams,
  OrderBookLevel,
  OrderBookSnapshot,
  OrderFill,
  OrderHandle,
  OrderPollResult,
  OrderSide,
  Position,
  PositionSide,
  TerminalOrderState,
  VenueAdapter,
} from "./types";

export {
  findBalance,
  isMarketOrderParams,
  isOrderBookSnapshot,
  isOrderHandle,
  marketOrderParamsSchema,
  netPositionBase,
  orderBookLevelSchema,
  orderBookSnapshotSchema,
  orderHandleSchema,
  orderSideSchema,
  splitSymbol,
} from "./types";

export {
  FatalAdapterError,
  RejectedOrderError,
  StreamDisconnectError,
  VenueError,
  createVenueError,
  isAmbiguousPlacementError,
  isFatalAdapterError,
  toVenueError,
} from "./errors";
export type { VenueErrorCode } from "./errors";

export { createClientOrderId } from "./client-order-id";

// Factory
export { MissingCredentialsError, createVenueAdapter, createVenuePair } from "./factory";
export type { VenuePair } from "./factory";

// Config validation
export { VenueAdapterConfigSchema, parseVenueAdapterConfig } from "./config";
export type { VenueAdapterConfig } from "./config";

// Venue adapters
export { BYBIT_RATE_LIMITS, BYBIT_VENUE, createBybitAdapter } from "./bybit";
export type { BybitAdapterConfig } from "./bybit";
export { GATEIO_RATE_LIMITS, GATEIO_VENUE, createGateioAdapter } from "./gateio";
export type { GateioAdapterConfig } from "./gateio";
export { createPaperAdapter } from "./paper";
export type { PaperAdapter, PaperAdapterConfig } from "./paper";
