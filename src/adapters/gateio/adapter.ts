/**
 * Gate.io spot adapter (REST API v4 + WebSocket v4 `spot.book_ticker`).
 *
 * Quirks kept here: `ETH_USDT` pair ids, `t-` prefixed client order ids,
 * market buys sized in quote currency, and the uni-lending earn product as
 * the idle-funds reservoir.
 */

import axios from "axios";
import * as v from "valibot";

import {
  BASE_DECIMALS,
  calculateNotionalQuote,
  formatDecimal,
  minBigInt,
  parseDecimal,
  roundDownToStep,
} from "@/lib/decimal";
import type { Logger } from "@/lib/logger";
import { createRequestPolicy } from "@/lib/rate-limiter";
import { createMessageParser, isRecord, openStreamSocket } from "@/lib/websocket";

import { createClientOrderId } from "../client-order-id";
import { RejectedOrderError, VenueError, isFatalAdapterError, toVenueError } from "../errors";
import type {
  Balance,
  LimitOrderParams,
  MarketOrderParams,
  OrderBookSnapshot,
  OrderHandle,
  OrderPollResult,
  OrderSide,
  VenueAdapter,
} from "../types";
import {
  classifyGateioError,
  normalizeBalances,
  normalizeBookTicker,
  normalizeOrder,
  toGateioPair,
} from "./normalizers";
import { GATEIO_RATE_LIMITS } from "./rate-limits";
import {
  type GateioBookTickerMessage,
  GateioBookTickerMessageSchema,
  GateioCurrencyPairSchema,
  GateioUniLendsSchema,
} from "./schemas";
import { GATEIO_API_PREFIX, createGateioHeaders } from "./signing";

export const GATEIO_VENUE = "gateio";

const DEFAULT_BASE_URL = "https://api.gateio.ws";
const DEFAULT_WS_URL = "wss://api.gateio.ws/ws/v4/";
/** Decimals Gate accepts for earn amounts */
const EARN_DECIMALS = 6;
const EARN_MIN_RATE = "0.001";

export interface GateioAdapterConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
  wsUrl?: string;
  logger?: Logger;
  now?: () => number;
}

type HttpMethod = "GET" | "POST" | "DELETE";

interface GateioRequest {
  method: HttpMethod;
  path: string;
  action: string;
  query?: Record<string, string>;
  body?: unknown;
  signed?: boolean;
  idempotent?: boolean;
}

interface PairPrecision {
  priceDecimals: number;
  amountDecimals: number;
}

/** Truncate a fixed-point value to `decimals` (at most 8). */
const truncateTo = (value: bigint, decimals: number): bigint =>
  decimals >= BASE_DECIMALS
    ? value
    : roundDownToStep(value, 10n ** BigInt(BASE_DECIMALS - decimals));

const toGateioSide = (side: OrderSide): "buy" | "sell" => (side === "BUY" ? "buy" : "sell");

const toText = (clientOrderId: string): string => `t-${clientOrderId}`;

export const createGateioAdapter = (config: GateioAdapterConfig): VenueAdapter => {
  const {
    apiKey,
    apiSecret,
    baseUrl = DEFAULT_BASE_URL,
    wsUrl = DEFAULT_WS_URL,
    logger,
    now = () => Date.now(),
  } = config;

  const http = axios.create({
    baseURL: `${baseUrl}${GATEIO_API_PREFIX}`,
    timeout: 10_000,
    headers: { Accept: "application/json", "Content-Type": "application/json" },
  });

  const policy = createRequestPolicy({
    venue: GATEIO_VENUE,
    rateLimits: GATEIO_RATE_LIMITS,
    logger,
  });

  const parser = createMessageParser<GateioBookTickerMessage>({
    getType: (message) =>
      isRecord(message) && message.channel === "spot.book_ticker" && message.event === "update"
        ? "book_ticker"
        : null,
    logger,
  });
  parser.registerHandler("book_ticker", {
    schema: GateioBookTickerMessageSchema,
    handler: (message) => message,
    getDedupeKey: (message) => `${message.result.s}:${message.result.u}`,
  });

  const precisions = new Map<string, PairPrecision>();
  let connected = false;

  const request = async ({
    method,
    path,
    action,
    query = {},
    body,
    signed = false,
    idempotent = true,
  }: GateioRequest): Promise<unknown> => {
    const queryString = new URLSearchParams(query).toString();
    const payload = body === undefined ? "" : JSON.stringify(body);
    const url = queryString ? `${path}?${queryString}` : path;

    try {
      const response = await policy.execute(
        () => {
          const headers = signed
            ? createGateioHeaders(
                {
                  method,
                  path,
                  query: queryString,
                  body: payload,
                  timestampSec: Math.floor(now() / 1000),
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
      return response.data;
    } catch (error) {
      throw toVenueError(error, GATEIO_VENUE, action, classifyGateioError);
    }
  };

  const loadPrecision = async (symbol: string): Promise<PairPrecision> => {
    const pair = toGateioPair(symbol);
    const cached = precisions.get(pair);
    if (cached) return cached;

    const info = v.parse(
      GateioCurrencyPairSchema,
      await request({ method: "GET", path: `/spot/currency_pairs/${pair}`, action: "Load pair" }),
    );
    const precision = { priceDecimals: info.precision, amountDecimals: info.amount_precision };
    precisions.set(pair, precision);
    return precision;
  };

  const submitOrder = async (
    symbol: string,
    side: OrderSide,
    quantityBase: bigint,
    clientOrderId: string,
    fields: Record<string, string>,
  ): Promise<OrderHandle> => {
    const response = await request({
      method: "POST",
      path: "/spot/orders",
      action: "Place order",
      body: {
        text: toText(clientOrderId),
        currency_pair: toGateioPair(symbol),
        side: toGateioSide(side),
        ...fields,
      },
      signed: true,
      idempotent: false,
    });

    const orderId = isRecord(response) && typeof response.id === "string" ? response.id : null;
    return { venue: GATEIO_VENUE, symbol, orderId, clientOrderId, side, quantityBase };
  };

  const placeMarketOrder = async (params: MarketOrderParams): Promise<OrderHandle> => {
    const { symbol, side, quantityBase, referencePriceQuote } = params;
    const precision = await loadPrecision(symbol);

    // Market buys are sized in quote currency
    let amount: bigint;
    if (side === "BUY") {
      if (!referencePriceQuote || referencePriceQuote <= 0n) {
        throw new RejectedOrderError(
          "Market buy needs a reference price",
          "INVALID_ORDER",
          GATEIO_VENUE,
        );
      }
      amount = truncateTo(
        calculateNotionalQuote(quantityBase, referencePriceQuote),
        precision.priceDecimals,
      );
    } else {
      amount = truncateTo(quantityBase, precision.amountDecimals);
    }

    if (amount <= 0n) {
      throw new RejectedOrderError("Order amount rounds to zero", "INVALID_ORDER", GATEIO_VENUE);
    }

    return submitOrder(symbol, side, quantityBase, params.clientOrderId ?? createClientOrderId(), {
      type: "market",
      time_in_force: "ioc",
      amount: formatDecimal(amount, BASE_DECIMALS),
    });
  };

  const placeLimitOrder = async (params: LimitOrderParams): Promise<OrderHandle> => {
    const { symbol, side, quantityBase, priceQuote, postOnly } = params;
    const precision = await loadPrecision(symbol);

    return submitOrder(symbol, side, quantityBase, params.clientOrderId ?? createClientOrderId(), {
      type: "limit",
      time_in_force: postOnly ? "poc" : "gtc",
      price: formatDecimal(truncateTo(priceQuote, precision.priceDecimals), BASE_DECIMALS),
      amount: formatDecimal(truncateTo(quantityBase, precision.amountDecimals), BASE_DECIMALS),
    });
  };

  const orderPath = (handle: OrderHandle): string =>
    `/spot/orders/${encodeURIComponent(handle.orderId ?? toText(handle.clientOrderId))}`;

  const pollOrder = async (handle: OrderHandle): Promise<OrderPollResult> => {
    try {
      const response = await request({
        method: "GET",
        path: orderPath(handle),
        action: "Poll order",
        query: { currency_pair: toGateioPair(handle.symbol) },
        signed: true,
      });
      return normalizeOrder(response);
    } catch (error) {
      if (error instanceof VenueError && error.code === "ORDER_NOT_FOUND") {
        return { kind: "not-found" };
      }
      throw error;
    }
  };

  const cancelOrder = async (handle: OrderHandle): Promise<void> => {
    await request({
      method: "DELETE",
      path: orderPath(handle),
      action: "Cancel order",
      query: { currency_pair: toGateioPair(handle.symbol) },
      signed: true,
    });
  };

  const fetchBalances = async (): Promise<Balance[]> =>
    normalizeBalances(
      await request({
        method: "GET",
        path: "/spot/accounts",
        action: "Fetch balances",
        signed: true,
      }),
    );

  /**
   * Earn calls report failure as `false` so the caller can fall back to
   * its own shortfall handling; authentication problems still throw.
   */
  const guardEarn = async (action: string, fn: () => Promise<boolean>): Promise<boolean> => {
    try {
      return await fn();
    } catch (error) {
      if (isFatalAdapterError(error)) throw error;
      logger?.warn(`${action} failed`, {
        venue: GATEIO_VENUE,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  };

  const redeemIdleFunds = (asset: string, amountQuote: bigint): Promise<boolean> =>
    guardEarn("Redeem idle funds", async () => {
      const lends = v.parse(
        GateioUniLendsSchema,
        await request({
          method: "GET",
          path: "/earn/uni/lends",
          action: "Fetch earn positions",
          query: { currency: asset },
          signed: true,
        }),
      );
      const lent = lends
        .filter((lend) => lend.currency === asset)
        .reduce((sum, lend) => sum + parseDecimal(lend.amount, BASE_DECIMALS), 0n);
      const amount = truncateTo(minBigInt(amountQuote, lent), EARN_DECIMALS);
      if (amount <= 0n) return false;

      await request({
        method: "POST",
        path: "/earn/uni/lends",
        action: "Redeem earn",
        body: { currency: asset, amount: formatDecimal(amount, BASE_DECIMALS), type: "redeem" },
        signed: true,
        idempotent: false,
      });
      logger?.info("Redeemed idle funds", { venue: GATEIO_VENUE, asset, amount });
      return true;
    });

  const subscribeIdleFunds = (asset: string, amountBase: bigint): Promise<boolean> =>
    guardEarn("Subscribe idle funds", async () => {
      const amount = truncateTo(amountBase, EARN_DECIMALS);
      if (amount <= 0n) return false;

      await request({
        method: "POST",
        path: "/earn/uni/lends",
        action: "Subscribe earn",
        body: {
          currency: asset,
          amount: formatDecimal(amount, BASE_DECIMALS),
          type: "lend",
          min_rate: EARN_MIN_RATE,
        },
        signed: true,
        idempotent: false,
      });
      logger?.info("Parked funds in earn", { venue: GATEIO_VENUE, asset, amount });
      return true;
    });

  async function* streamOrderBook(
    symbol: string,
    signal?: AbortSignal,
  ): AsyncGenerator<OrderBookSnapshot> {
    const pair = toGateioPair(symbol);
    const seconds = (): number => Math.floor(now() / 1000);

    const messages = openStreamSocket({
      venue: GATEIO_VENUE,
      url: wsUrl,
      subscribeMessages: [
        { time: seconds(), channel: "spot.book_ticker", event: "subscribe", payload: [pair] },
      ],
      heartbeat: {
        intervalMs: 10_000,
        timeoutMs: 5_000,
        pingMessage: () => ({ time: seconds(), channel: "spot.ping" }),
      },
      signal,
      logger,
    });

    for await (const message of messages) {
      if (isRecord(message) && message.event === "subscribe" && isRecord(message.error)) {
        logger?.warn("Book ticker subscription rejected", {
          venue: GATEIO_VENUE,
          pair,
          error: message.error,
        });
        continue;
      }
      const ticker = parser.parse(message);
      if (ticker && ticker.result.s === pair) {
        yield normalizeBookTicker(ticker, GATEIO_VENUE, symbol, now());
      }
    }
  }

  return {
    venue: GATEIO_VENUE,
    market: "spot",

    connect: async () => {
      // Authenticated read verifies the key before any order goes out
      await fetchBalances();
      connected = true;
      logger?.info("Venue connected", { venue: GATEIO_VENUE });
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
    fetchPositions: async () => [],

    // Spot venue: no leverage or margin settings
    setLeverage: async () => undefined,
    setMarginMode: async () => undefined,
    getMaxLeverage: async () => null,

    redeemIdleFunds,
    subscribeIdleFunds,
  };
};
