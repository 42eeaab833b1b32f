/**
 * In-memory venue for tests and dry runs.
 *
 * Market orders fill immediately at the current top of book. Books come
 * from `pushOrderBook` or, for dry runs, from a live adapter's public
 * stream (`marketData`). Spot buys pay the fee in base, every other fill
 * pays it in quote.
 */

import { type AsyncQueue, createAsyncQueue } from "@/lib/async-queue";
import { BPS_PER_UNIT, calculateNotionalQuote } from "@/lib/decimal";

import { RejectedOrderError, StreamDisconnectError, VenueError } from "../errors";
import {
  type Balance,
  type LimitOrderParams,
  type MarginMode,
  type MarketKind,
  type MarketOrderParams,
  type OrderBookLevel,
  type OrderBookSnapshot,
  type OrderFill,
  type OrderHandle,
  type OrderPollResult,
  type Position,
  type TerminalOrderState,
  type VenueAdapter,
  splitSymbol,
} from "../types";

export interface PaperAdapterConfig {
  venue?: string;
  market: MarketKind;
  initialBalances?: Record<string, bigint>;
  /** Signed starting position per symbol (perp only) */
  initialPositions?: Record<string, bigint>;
  /** Enables the idle-funds capability with these earn balances */
  earnBalances?: Record<string, bigint>;
  /** Default 10 bps */
  feeBps?: bigint;
  /** Share of each market order that fills (default 10000 = all) */
  fillRatioBps?: bigint;
  /** Report terminal fills with zero quantity, as some venues do */
  reportZeroFills?: boolean;
  maxLeverage?: number | null;
  /** Live adapter whose public book stream drives fills */
  marketData?: VenueAdapter;
  now?: () => number;
}

export interface PaperBookUpdate {
  symbol: string;
  bestBid: OrderBookLevel | null;
  bestAsk: OrderBookLevel | null;
}

export interface PaperAdapter extends VenueAdapter {
  /** Publish a top of book to every open stream for `symbol` */
  pushOrderBook(update: PaperBookUpdate): OrderBookSnapshot;
  /** Fail every open stream with `StreamDisconnectError` (or `error`) */
  dropStreams(error?: unknown): void;
  getPositionBase(symbol: string): bigint;
  getLeverage(symbol: string): number | null;
  getMarginMode(symbol: string): MarginMode | null;
}

interface PaperOrder {
  handle: OrderHandle;
  state: TerminalOrderState | "open";
  fill: OrderFill;
}

const EMPTY_FILL: OrderFill = { filledQuantityBase: 0n, avgFillPriceQuote: null, fee: null };

export const createPaperAdapter = (config: PaperAdapterConfig): PaperAdapter => {
  const {
    market,
    feeBps = 10n,
    fillRatioBps = BPS_PER_UNIT,
    reportZeroFills = false,
    maxLeverage = null,
    marketData,
    now = () => Date.now(),
  } = config;
  const venue = config.venue ?? marketData?.venue ?? "paper";

  const balances = new Map<string, bigint>(Object.entries(config.initialBalances ?? {}));
  const positions = new Map<string, bigint>(Object.entries(config.initialPositions ?? {}));
  const earn = new Map<string, bigint>(Object.entries(config.earnBalances ?? {}));
  const leverage = new Map<string, number>();
  const marginModes = new Map<string, MarginMode>();
  const books = new Map<string, OrderBookSnapshot>();
  const streams = new Map<string, Set<AsyncQueue<OrderBookSnapshot>>>();
  const orders = new Map<string, PaperOrder>();
  let sequence = 0;
  let connected = false;

  const balanceOf = (asset: string): bigint => balances.get(asset) ?? 0n;
  const credit = (asset: string, amount: bigint): void => {
    balances.set(asset, balanceOf(asset) + amount);
  };

  const reject = (message: string, code: "INSUFFICIENT_BALANCE" | "INVALID_ORDER"): never => {
    throw new RejectedOrderError(message, code, venue);
  };

  const recordBook = (snapshot: OrderBookSnapshot): void => {
    books.set(snapshot.symbol, snapshot);
  };

  const pushOrderBook = (update: PaperBookUpdate): OrderBookSnapshot => {
    const snapshot: OrderBookSnapshot = { venue, ...update, timestamp: now() };
    recordBook(snapshot);
    for (const queue of streams.get(update.symbol) ?? []) {
      queue.push(snapshot);
    }
    return snapshot;
  };

  const dropStreams = (error?: unknown): void => {
    for (const queues of streams.values()) {
      for (const queue of queues) {
        queue.fail(error ?? new StreamDisconnectError("Paper stream dropped", venue));
      }
      queues.clear();
    }
  };

  const pushedStream = (symbol: string, signal?: AbortSignal): AsyncIterable<OrderBookSnapshot> => {
    const queue = createAsyncQueue<OrderBookSnapshot>();
    if (signal?.aborted) {
      queue.close();
      return queue;
    }
    const queues = streams.get(symbol) ?? new Set<AsyncQueue<OrderBookSnapshot>>();
    queues.add(queue);
    streams.set(symbol, queues);
    signal?.addEventListener(
      "abort",
      () => {
        queues.delete(queue);
        queue.close();
      },
      { once: true },
    );
    return queue;
  };

  async function* liveStream(
    source: VenueAdapter,
    symbol: string,
    signal?: AbortSignal,
  ): AsyncGenerator<OrderBookSnapshot> {
    for await (const snapshot of source.streamOrderBook(symbol, signal)) {
      recordBook(snapshot);
      yield snapshot;
    }
  }

  const nextIds = (clientOrderId?: string): { orderId: string; clientOrderId: string } => {
    sequence++;
    return { orderId: `paper-${sequence}`, clientOrderId: clientOrderId ?? `paper-c-${sequence}` };
  };

  const settle = (params: MarketOrderParams, level: OrderBookLevel): OrderFill => {
    const { base, quote } = splitSymbol(params.symbol);
    const filledBase = (params.quantityBase * fillRatioBps) / BPS_PER_UNIT;
    const notionalQuote = calculateNotionalQuote(filledBase, level.priceQuote);
    const buying = params.side === "BUY";

    if (market === "spot") {
      if (buying) {
        if (balanceOf(quote) < notionalQuote) {
          reject(`Insufficient ${quote} balance`, "INSUFFICIENT_BALANCE");
        }
        const feeBase = (filledBase * feeBps) / BPS_PER_UNIT;
        credit(quote, -notionalQuote);
        credit(base, filledBase - feeBase);
        return {
          filledQuantityBase: filledBase,
          avgFillPriceQuote: level.priceQuote,
          fee: { amount: feeBase, asset: base },
        };
      }
      if (balanceOf(base) < filledBase) {
        reject(`Insufficient ${base} balance`, "INSUFFICIENT_BALANCE");
      }
      const feeQuote = (notionalQuote * feeBps) / BPS_PER_UNIT;
      credit(base, -filledBase);
      credit(quote, notionalQuote - feeQuote);
      return {
        filledQuantityBase: filledBase,
        avgFillPriceQuote: level.priceQuote,
        fee: { amount: feeQuote, asset: quote },
      };
    }

    const current = positions.get(params.symbol) ?? 0n;
    const delta = buying ? filledBase : -filledBase;
    if (params.reduceOnly) {
      const reduces = current !== 0n && (current > 0n) !== buying;
      const magnitude = current < 0n ? -current : current;
      if (!reduces || filledBase > magnitude) {
        reject("Reduce-only order would increase position", "INVALID_ORDER");
      }
    }
    const feeQuote = (notionalQuote * feeBps) / BPS_PER_UNIT;
    positions.set(params.symbol, current + delta);
    credit(quote, -feeQuote);
    return {
      filledQuantityBase: filledBase,
      avgFillPriceQuote: level.priceQuote,
      fee: { amount: feeQuote, asset: quote },
    };
  };

  const placeMarketOrder = async (params: MarketOrderParams): Promise<OrderHandle> => {
    if (params.quantityBase <= 0n) reject("Quantity must be positive", "INVALID_ORDER");

    const book = books.get(params.symbol);
    const level = params.side === "BUY" ? book?.bestAsk : book?.bestBid;
    if (!level) {
      const side = params.side === "BUY" ? "ask" : "bid";
      return reject(`No ${side} for ${params.symbol}`, "INVALID_ORDER");
    }

    const fill = settle(params, level);
    const handle: OrderHandle = {
      venue,
      symbol: params.symbol,
      side: params.side,
      quantityBase: params.quantityBase,
      ...nextIds(params.clientOrderId),
    };
    const state: TerminalOrderState =
      fill.filledQuantityBase === params.quantityBase ? "filled" : "partially-filled-closed";
    orders.set(handle.clientOrderId, { handle, state, fill });
    return handle;
  };

  const placeLimitOrder = async (params: LimitOrderParams): Promise<OrderHandle> => {
    if (params.quantityBase <= 0n || params.priceQuote <= 0n) {
      reject("Quantity and price must be positive", "INVALID_ORDER");
    }
    const handle: OrderHandle = {
      venue,
      symbol: params.symbol,
      side: params.side,
      quantityBase: params.quantityBase,
      ...nextIds(params.clientOrderId),
    };
    orders.set(handle.clientOrderId, { handle, state: "open", fill: EMPTY_FILL });
    return handle;
  };

  const findOrder = (handle: OrderHandle): PaperOrder | undefined =>
    orders.get(handle.clientOrderId);

  const cancelOrder = async (handle: OrderHandle): Promise<void> => {
    const order = findOrder(handle);
    if (!order) throw new VenueError("Order not found", "ORDER_NOT_FOUND", venue);
    if (order.state === "open") order.state = "cancelled";
  };

  const pollOrder = async (handle: OrderHandle): Promise<OrderPollResult> => {
    const order = findOrder(handle);
    if (!order) return { kind: "not-found" };
    if (order.state === "open") return { kind: "pending", fill: order.fill };
    if (reportZeroFills && order.state === "filled") {
      return { kind: "terminal", state: "filled", fill: EMPTY_FILL };
    }
    return { kind: "terminal", state: order.state, fill: order.fill };
  };

  const fetchBalances = async (): Promise<Balance[]> =>
    Array.from(balances.entries()).map(([asset, amount]) => ({
      asset,
      availableBase: amount,
      heldBase: 0n,
      totalBase: amount,
    }));

  const fetchPositions = async (symbol: string): Promise<Position[]> => {
    const size = positions.get(symbol) ?? 0n;
    if (market === "spot" || size === 0n) return [];
    return [
      {
        symbol,
        side: size > 0n ? "LONG" : "SHORT",
        sizeBase: size > 0n ? size : -size,
        entryPriceQuote: null,
        leverage: leverage.get(symbol) ?? null,
      },
    ];
  };

  const adapter: PaperAdapter = {
    venue,
    market,

    connect: async () => {
      connected = true;
    },
    disconnect: async () => {
      connected = false;
      for (const queues of streams.values()) {
        for (const queue of queues) queue.close();
        queues.clear();
      }
    },
    isConnected: () => connected,

    streamOrderBook: (symbol, signal) =>
      marketData ? liveStream(marketData, symbol, signal) : pushedStream(symbol, signal),

    placeMarketOrder,
    placeLimitOrder,
    cancelOrder,
    pollOrder,
    fetchBalances,
    fetchPositions,

    setLeverage: async (symbol, value) => {
      if (market === "perp") leverage.set(symbol, value);
    },
    setMarginMode: async (symbol, mode) => {
      if (market === "perp") marginModes.set(symbol, mode);
    },
    getMaxLeverage: async () => (market === "perp" ? maxLeverage : null),

    pushOrderBook,
    dropStreams,
    getPositionBase: (symbol) => positions.get(symbol) ?? 0n,
    getLeverage: (symbol) => leverage.get(symbol) ?? null,
    getMarginMode: (symbol) => marginModes.get(symbol) ?? null,
  };

  if (config.earnBalances) {
    adapter.redeemIdleFunds = async (asset, amountQuote) => {
      const available = earn.get(asset) ?? 0n;
      const moved = available < amountQuote ? available : amountQuote;
      if (moved <= 0n) return false;
      earn.set(asset, available - moved);
      credit(asset, moved);
      return true;
    };
    adapter.subscribeIdleFunds = async (asset, amountBase) => {
      if (amountBase <= 0n || balanceOf(asset) < amountBase) return false;
      credit(asset, -amountBase);
      earn.set(asset, (earn.get(asset) ?? 0n) + amountBase);
      return true;
    };
  }

  return adapter;
};
