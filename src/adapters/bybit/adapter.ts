/**
 * Bybit linear perpetual adapter (REST API v5 + public WebSocket
 * `orderbook.1`), unified trading account.
 *
 * Orders use one-way position mode (`positionIdx: 0`) and are sized in base
 * quantity rounded down to the instrument's `qtyStep`.
 */

import axios from "axios";
import * as v from "valibot";

import {
  BASE_DECIMALS,
  QUOTE_DECIMALS,
  formatDecimal,
  parseDecimal,
  roundDownToStep,
} from "@/lib/decimal";
import type { Logger } from "@/lib/logger";
import { createRequestPolicy } from "@/lib/rate-limiter";
import { createMessageParser, isRecord, openStreamSocket } from "@/lib/websocket";

import { createClientOrderId } from "../client-order-id";
import { RejectedOrderError, VenueError, createVenueError, toVenueError } from "../errors";
import type {
  Balance,
  LimitOrderParams,
  MarginMode,
  MarketOrderParams,
  OrderBookSnapshot,
  OrderHandle,
  OrderPollResult,
  OrderSide,
  Position,
  VenueAdapter,
} from "../types";
import { splitSymbol } from "../types";
import {
  BYBIT_NOT_MODIFIED_CODES,
  type BybitBookSide,
  applyOrderbookMessage,
  classifyBybitError,
  classifyBybitRetCode,
  normalizeOrder,
  normalizePositions,
  normalizeWalletBalances,
  toBybitSymbol,
} from "./normalizers";
import { BYBIT_RATE_LIMITS } from "./rate-limits";
import {
  type BybitOrderbookMessage,
  BybitEnvelopeSchema,
  BybitInstrumentsResultSchema,
  BybitOrderCreateResultSchema,
  BybitOrderListResultSchema,
  BybitOrderbookMessageSchema,
} from "./schemas";
import { DEFAULT_RECV_WINDOW_MS, createBybitHeaders } from "./signing";

export const BYBIT_VENUE = "bybit";

const MAINNET_URL = "https://api.bybit.com";
const TESTNET_URL = "https://api-testnet.bybit.com";
const MAINNET_WS_URL = "wss://stream.bybit.com/v5/public/linear";
const TESTNET_WS_URL = "wss://stream-testnet.bybit.com/v5/public/linear";
const CATEGORY = "linear";

export interface BybitAdapterConfig {
  apiKey: string;
  apiSecret: string;
  testnet?: boolean;
  baseUrl?: string;
  wsUrl?: string;
  recvWindowMs?: number;
  logger?: Logger;
  now?: () => number;
}

type HttpMethod = "GET" | "POST";

interface BybitRequest {
  method: HttpMethod;
  path: string;
  action: string;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  signed?: boolean;
  idempotent?: boolean;
  /** Non-zero retCodes treated as success */
  acceptCodes?: ReadonlySet<number>;
}

interface InstrumentInfo {
  qtyStepBase: bigint;
  minOrderQtyBase: bigint;
  maxLeverage: number;
}

const toBybitSide = (side: OrderSide): "Buy" | "Sell" => (side === "BUY" ? "Buy" : "Sell");

export const createBybitAdapter = (config: BybitAdapterConfig): VenueAdapter => {
  const {
    apiKey,
    apiSecret,
    testnet = false,
    baseUrl = testnet ? TESTNET_URL : MAINNET_URL,
    wsUrl = testnet ? TESTNET_WS_URL : MAINNET_WS_URL,
    recvWindowMs = DEFAULT_RECV_WINDOW_MS,
    logger,
    now = () => Date.now(),
  } = config;

  const http = axios.create({
    baseURL: baseUrl,
    timeout: 10_000,
    headers: { Accept: "application/json", "Content-Type": "application/json" },
  });

  const policy = createRequestPolicy({
    venue: BYBIT_VENUE,
    rateLimits: BYBIT_RATE_LIMITS,
    logger,
  });

  const parser = createMessageParser<BybitOrderbookMessage>({
    getType: (message) =>
      isRecord(message) &&
      typeof message.topic === "string" &&
      message.topic.startsWith("orderbook.") &&
      typeof message.type === "string"
        ? message.type
        : null,
    logger,
  });
  // Snapshots repeat unchanged while the book is quiet and still count as fresh data
  parser.registerHandler("snapshot", {
    schema: BybitOrderbookMessageSchema,
    handler: (message) => message,
  });
  parser.registerHandler("delta", {
    schema: BybitOrderbookMessageSchema,
    handler: (message) => message,
    getDedupeKey: (message) => `${message.data.s}:${message.data.u}`,
  });

  const instruments = new Map<string, InstrumentInfo>();
  let connected = false;

  const request = async ({
    method,
    path,
    action,
    query = {},
    body,
    signed = false,
    idempotent = true,
    acceptCodes = BYBIT_NOT_MODIFIED_CODES,
  }: BybitRequest): Promise<unknown> => {
    const queryString = new URLSearchParams(query).toString();
    const payload = body === undefined ? "" : JSON.stringify(body);
    const url = queryString ? `${path}?${queryString}` : path;

    let data: unknown;
    try {
      const response = await policy.execute(
        () => {
          const headers = signed
            ? createBybitHeaders(
                {
                  timestampMs: now(),
                  recvWindowMs,
                  payload: method === "GET" ? queryString : payload,
                },
                apiKey,
                apiSecret,
              )
            : {};
          return http.request<unknown>({
            method,
            url,
            headers,
            ...(payload ? { data: payload } : {}),
          });
        },
        { endpoint: path, idempotent },
      );
      data = response.data;
    } catch (error) {
      throw toVenueError(error, BYBIT_VENUE, action, classifyBybitError);
    }

    const envelope = v.safeParse(BybitEnvelopeSchema, data);
    if (!envelope.success) {
      throw new VenueError(`${action} failed: unexpected response`, "UNKNOWN", BYBIT_VENUE);
    }
    const { retCode, retMsg, result } = envelope.output;
    if (retCode === 0 || acceptCodes.has(retCode)) return result;

    throw createVenueError(
      `${action} failed (${retCode}): ${retMsg}`,
      classifyBybitRetCode(retCode),
      BYBIT_VENUE,
    );
  };

  const loadInstrument = async (symbol: string): Promise<InstrumentInfo> => {
    const venueSymbol = toBybitSymbol(symbol);
    const cached = instruments.get(venueSymbol);
    if (cached) return cached;

    const { list } = v.parse(
      BybitInstrumentsResultSchema,
      await request({
        method: "GET",
        path: "/v5/market/instruments-info",
        action: "Load instrument",
        query: { category: CATEGORY, symbol: venueSymbol },
      }),
    );
    const instrument = list.find((entry) => entry.symbol === venueSymbol);
    if (!instrument) {
      throw new VenueError(`Unknown instrument ${venueSymbol}`, "INVALID_ORDER", BYBIT_VENUE);
    }

    const info = {
      qtyStepBase: parseDecimal(instrument.lotSizeFilter.qtyStep, BASE_DECIMALS),
      minOrderQtyBase: parseDecimal(instrument.lotSizeFilter.minOrderQty, BASE_DECIMALS),
      maxLeverage: Math.floor(Number(instrument.leverageFilter.maxLeverage)),
    };
    instruments.set(venueSymbol, info);
    return info;
  };

  const sizeOrder = async (symbol: string, quantityBase: bigint): Promise<bigint> => {
    const instrument = await loadInstrument(symbol);
    const qty = roundDownToStep(quantityBase, instrument.qtyStepBase);
    if (qty <= 0n || qty < instrument.minOrderQtyBase) {
      throw new RejectedOrderError(
        `Order quantity ${formatDecimal(quantityBase, BASE_DECIMALS)} is below the minimum`,
        "INVALID_ORDER",
        BYBIT_VENUE,
      );
    }
    return qty;
  };

  const submitOrder = async (
    symbol: string,
    side: OrderSide,
    qty: bigint,
    clientOrderId: string,
    fields: Record<string, unknown>,
  ): Promise<OrderHandle> => {
    const result = await request({
      method: "POST",
      path: "/v5/order/create",
      action: "Place order",
      body: {
        category: CATEGORY,
        symbol: toBybitSymbol(symbol),
        side: toBybitSide(side),
        qty: formatDecimal(qty, BASE_DECIMALS),
        positionIdx: 0,
        orderLinkId: clientOrderId,
        ...fields,
      },
      signed: true,
      idempotent: false,
      acceptCodes: new Set<number>(),
    });

    const parsed = v.safeParse(BybitOrderCreateResultSchema, result);
    const orderId = parsed.success ? parsed.output.orderId : null;
    return { venue: BYBIT_VENUE, symbol, orderId, clientOrderId, side, quantityBase: qty };
  };

  const placeMarketOrder = async (params: MarketOrderParams): Promise<OrderHandle> => {
    const qty = await sizeOrder(params.symbol, params.quantityBase);
    return submitOrder(
      params.symbol,
      params.side,
      qty,
      params.clientOrderId ?? createClientOrderId(),
      { orderType: "Market", reduceOnly: params.reduceOnly ?? false },
    );
  };

  const placeLimitOrder = async (params: LimitOrderParams): Promise<OrderHandle> => {
    const qty = await sizeOrder(params.symbol, params.quantityBase);
    return submitOrder(
      params.symbol,
      params.side,
      qty,
      params.clientOrderId ?? createClientOrderId(),
      {
        orderType: "Limit",
        price: formatDecimal(params.priceQuote, QUOTE_DECIMALS),
        timeInForce: params.postOnly ? "PostOnly" : "GTC",
      },
    );
  };

  const orderRef = (handle: OrderHandle): Record<string, string> =>
    handle.orderId ? { orderId: handle.orderId } : { orderLinkId: handle.clientOrderId };

  const findOrder = async (path: string, handle: OrderHandle) => {
    const { list } = v.parse(
      BybitOrderListResultSchema,
      await request({
        method: "GET",
        path,
        action: "Poll order",
        query: { category: CATEGORY, symbol: toBybitSymbol(handle.symbol), ...orderRef(handle) },
        signed: true,
      }),
    );
    return list[0] ?? null;
  };

  /**
   * Open orders live under `/realtime`; orders that finished moments ago
   * may only show up in `/history`.
   */
  const pollOrder = async (handle: OrderHandle): Promise<OrderPollResult> => {
    try {
      const order =
        (await findOrder("/v5/order/realtime", handle)) ??
        (await findOrder("/v5/order/history", handle));
      if (!order) return { kind: "not-found" };
      return normalizeOrder(order, splitSymbol(handle.symbol).quote);
    } catch (error) {
      if (error instanceof VenueError && error.code === "ORDER_NOT_FOUND") {
        return { kind: "not-found" };
      }
      throw error;
    }
  };

  const cancelOrder = async (handle: OrderHandle): Promise<void> => {
    await request({
      method: "POST",
      path: "/v5/order/cancel",
      action: "Cancel order",
      body: { category: CATEGORY, symbol: toBybitSymbol(handle.symbol), ...orderRef(handle) },
      signed: true,
    });
  };

  const fetchBalances = async (): Promise<Balance[]> =>
    normalizeWalletBalances(
      await request({
        method: "GET",
        path: "/v5/account/wallet-balance",
        action: "Fetch balances",
        query: { accountType: "UNIFIED" },
        signed: true,
      }),
    );

  const fetchPositions = async (symbol: string): Promise<Position[]> =>
    normalizePositions(
      await request({
        method: "GET",
        path: "/v5/position/list",
        action: "Fetch positions",
        query: { category: CATEGORY, symbol: toBybitSymbol(symbol) },
        signed: true,
      }),
      symbol,
    );

  const setLeverage = async (symbol: string, leverage: number): Promise<void> => {
    await request({
      method: "POST",
      path: "/v5/position/set-leverage",
      action: "Set leverage",
      body: {
        category: CATEGORY,
        symbol: toBybitSymbol(symbol),
        buyLeverage: String(leverage),
        sellLeverage: String(leverage),
      },
      signed: true,
    });
    logger?.info("Leverage set", { venue: BYBIT_VENUE, symbol, leverage });
  };

  /**
   * One-way position mode for the symbol, then the account margin mode.
   * Unified accounts carry margin mode per account, not per position.
   */
  const setMarginMode = async (symbol: string, mode: MarginMode): Promise<void> => {
    await request({
      method: "POST",
      path: "/v5/position/switch-mode",
      action: "Set position mode",
      body: { category: CATEGORY, symbol: toBybitSymbol(symbol), mode: 0 },
      signed: true,
    });
    await request({
      method: "POST",
      path: "/v5/account/set-margin-mode",
      action: "Set margin mode",
      body: { setMarginMode: mode === "cross" ? "REGULAR_MARGIN" : "ISOLATED_MARGIN" },
      signed: true,
    });
    logger?.info("Margin mode set", { venue: BYBIT_VENUE, symbol, mode });
  };

  const getMaxLeverage = async (symbol: string): Promise<number | null> => {
    const { maxLeverage } = await loadInstrument(symbol);
    return Number.isFinite(maxLeverage) && maxLeverage > 0 ? maxLeverage : null;
  };

  async function* streamOrderBook(
    symbol: string,
    signal?: AbortSignal,
  ): AsyncGenerator<OrderBookSnapshot> {
    const venueSymbol = toBybitSymbol(symbol);
    let book: BybitBookSide = { bid: null, ask: null };

    const messages = openStreamSocket({
      venue: BYBIT_VENUE,
      url: wsUrl,
      subscribeMessages: [{ op: "subscribe", args: [`orderbook.1.${venueSymbol}`] }],
      heartbeat: { intervalMs: 20_000, timeoutMs: 10_000, pingMessage: () => ({ op: "ping" }) },
      signal,
      logger,
    });

    for await (const message of messages) {
      if (isRecord(message) && message.op === "subscribe" && message.success === false) {
        logger?.warn("Order book subscription rejected", {
          venue: BYBIT_VENUE,
          symbol: venueSymbol,
          reason: message.ret_msg,
        });
        continue;
      }
      const update = parser.parse(message);
      if (!update || update.data.s !== venueSymbol) continue;

      book = applyOrderbookMessage(book, update);
      yield {
        venue: BYBIT_VENUE,
        symbol,
        bestBid: book.bid,
        bestAsk: book.ask,
        timestamp: now(),
      };
    }
  }

  return {
    venue: BYBIT_VENUE,
    market: "perp",

    connect: async () => {
      await fetchBalances();
      connected = true;
      logger?.info("Venue connected", { venue: BYBIT_VENUE, testnet });
    },

    disconnect: async () => {
      connected = false;
    },

    isConnected: () => connected,

    streamOrderBook,
    placeMarketOrder,
    placeLimitOrder,
    cancelOrder,
    pollOrder,
    fetchBalances,
    fetchPositions,
    setLeverage,
    setMarginMode,
    getMaxLeverage,
  };
};
