/**
 * Venue adapter interface and shared domain types.
 *
 * Every venue-specific quirk (symbol format, margin toggles, balance field
 * naming, quote-sized market buys) stays behind `VenueAdapter`; the engine
 * only sees the types in this file.
 */

import * as v from "valibot";

// Helper schemas
export const bigintSchema = v.custom<bigint>(
  (input) => typeof input === "bigint",
  "Expected bigint",
);

// Enums
export type OrderSide = "BUY" | "SELL";

export type MarketKind = "spot" | "perp";

export type MarginMode = "cross" | "isolated";

export type PositionSide = "LONG" | "SHORT";

/** Order states from which no further fill is expected. */
export type TerminalOrderState = "filled" | "partially-filled-closed" | "cancelled" | "rejected";

// Domain Types
export interface OrderBookLevel {
  priceQuote: bigint;
  quantityBase: bigint;
}

/**
 * Top of book for one venue. Immutable; the next snapshot from the same
 * venue supersedes it. `timestamp` is the local receive time in ms.
 */
export interface OrderBookSnapshot {
  venue: string;
  symbol: string;
  bestBid: OrderBookLevel | null;
  bestAsk: OrderBookLevel | null;
  timestamp: number;
}

/**
 * Returned by order placement. Placement does not wait for a fill.
 *
 * `orderId` is null when placement failed ambiguously (timeout, dropped
 * connection); the order is then tracked by `clientOrderId` alone.
 */
export interface OrderHandle {
  venue: string;
  symbol: string;
  orderId: string | null;
  clientOrderId: string;
  side: OrderSide;
  quantityBase: bigint;
}

export interface Fee {
  /** Fee amount scaled to 8 decimals in `asset` units. */
  amount: bigint;
  asset: string;
}

export interface OrderFill {
  filledQuantityBase: bigint;
  avgFillPriceQuote: bigint | null;
  fee: Fee | null;
}

/**
 * Result of an order status read. `not-found` and `pending` mean "keep
 * polling"; venue faults are thrown as `VenueError` instead.
 */
export type OrderPollResult =
  | { kind: "not-found" }
  | { kind: "pending"; fill: OrderFill }
  | { kind: "terminal"; state: TerminalOrderState; fill: OrderFill };

export interface Balance {
  asset: string;
  availableBase: bigint; // Free to trade, in units of `asset`
  heldBase: bigint; // Locked in orders
  totalBase: bigint;
}

export interface Position {
  symbol: string;
  side: PositionSide;
  sizeBase: bigint;
  entryPriceQuote: bigint | null;
  leverage: number | null;
}

export interface MarketOrderParams {
  symbol: string;
  side: OrderSide;
  quantityBase: bigint;
  reduceOnly?: boolean;
  /**
   * Price used by venues that size market buys in quote currency.
   * Ignored by venues that take base quantities.
   */
  referencePriceQuote?: bigint;
  /** Generated by the adapter when omitted. */
  clientOrderId?: string;
}

export interface LimitOrderParams {
  symbol: string;
  side: OrderSide;
  quantityBase: bigint;
  priceQuote: bigint;
  postOnly?: boolean;
  clientOrderId?: string;
}

// Schemas
export const orderSideSchema = v.picklist(["BUY", "SELL"]);

export const orderBookLevelSchema = v.object({
  priceQuote: bigintSchema,
  quantityBase: bigintSchema,
});

export const orderBookSnapshotSchema = v.object({
  venue: v.string(),
  symbol: v.string(),
  bestBid: v.nullable(orderBookLevelSchema),
  bestAsk: v.nullable(orderBookLevelSchema),
  timestamp: v.number(),
});

export const orderHandleSchema = v.object({
  venue: v.string(),
  symbol: v.string(),
  orderId: v.nullable(v.pipe(v.string(), v.minLength(1))),
  clientOrderId: v.pipe(v.string(), v.minLength(1)),
  side: orderSideSchema,
  quantityBase: bigintSchema,
});

export const marketOrderParamsSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  side: orderSideSchema,
  quantityBase: v.pipe(
    bigintSchema,
    v.check((value) => value > 0n, "Quantity must be positive"),
  ),
  reduceOnly: v.optional(v.boolean()),
  referencePriceQuote: v.optional(bigintSchema),
  clientOrderId: v.optional(v.string()),
});

// Type Guards
export const isOrderBookSnapshot = (value: unknown): value is OrderBookSnapshot =>
  v.is(orderBookSnapshotSchema, value);

export const isOrderHandle = (value: unknown): value is OrderHandle =>
  v.is(orderHandleSchema, value);

export const isMarketOrderParams = (value: unknown): value is MarketOrderParams =>
  v.is(marketOrderParamsSchema, value);

// Venue Adapter Interface
export interface VenueAdapter {
  readonly venue: string;
  readonly market: MarketKind;

  // Connection management
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // Market data
  /**
   * Lazy, infinite, non-restartable top-of-book sequence. Throws
   * `StreamDisconnectError` on disconnect; ends quietly when `signal` aborts.
   */
  streamOrderBook(symbol: string, signal?: AbortSignal): AsyncIterable<OrderBookSnapshot>;

  // Orders (never retried)
  placeMarketOrder(params: MarketOrderParams): Promise<OrderHandle>;
  placeLimitOrder(params: LimitOrderParams): Promise<OrderHandle>;
  cancelOrder(handle: OrderHandle): Promise<void>;
  pollOrder(handle: OrderHandle): Promise<OrderPollResult>;

  // Account
  fetchBalances(): Promise<Balance[]>;
  fetchPositions(symbol: string): Promise<Position[]>;

  // Session setup (idempotent)
  setLeverage(symbol: string, leverage: number): Promise<void>;
  setMarginMode(symbol: string, mode: MarginMode): Promise<void>;
  getMaxLeverage(symbol: string): Promise<number | null>;

  // Capital reservoir (optional capability)
  redeemIdleFunds?(asset: string, amountQuote: bigint): Promise<boolean>;
  subscribeIdleFunds?(asset: string, amountBase: bigint): Promise<boolean>;
}

/**
 * Split a canonical `BASE/QUOTE` symbol.
 */
export const splitSymbol = (symbol: string): { base: string; quote: string } => {
  const [base, quote] = symbol.split("/");
  if (!base || !quote) {
    throw new Error(`Expected BASE/QUOTE symbol, got "${symbol}"`);
  }
  return { base, quote };
};

export const findBalance = (balances: Balance[], asset: string): Balance =>
  balances.find((balance) => balance.asset === asset) ?? {
    asset,
    availableBase: 0n,
    heldBase: 0n,
    totalBase: 0n,
  };

/**
 * Signed net position size: long positive, short negative.
 */
export const netPositionBase = (positions: Position[], symbol: string): bigint =>
  positions
    .filter((position) => position.symbol === symbol)
    .reduce(
      (sum, position) => sum + (position.side === "LONG" ? position.sizeBase : -position.sizeBase),
      0n,
    );
