/**
 * Normalizers from Gate.io API v4 payloads to venue-neutral types.
 *
 * Inputs are validated with the schemas in `./schemas` so API drift fails
 * loudly instead of producing zero balances or fills.
 */

import * as v from "valibot";

import { BASE_DECIMALS, QUOTE_DECIMALS, parseDecimal } from "@/lib/decimal";

import type { VenueErrorCode } from "../errors";
import type {
  Balance,
  OrderBookLevel,
  OrderBookSnapshot,
  OrderFill,
  OrderPollResult,
} from "../types";
import { splitSymbol } from "../types";
import {
  type GateioBookTickerMessage,
  type GateioOrder,
  GateioErrorBodySchema,
  GateioOrderSchema,
  GateioSpotAccountsSchema,
} from "./schemas";

/** `ETH/USDT` → `ETH_USDT` */
export const toGateioPair = (symbol: string): string => {
  const { base, quote } = splitSymbol(symbol);
  return `${base}_${quote}`;
};

const parseOptional = (value: string | undefined, decimals: number): bigint =>
  value ? parseDecimal(value, decimals) : 0n;

export const normalizeBalances = (response: unknown): Balance[] =>
  v.parse(GateioSpotAccountsSchema, response).map((account) => {
    const availableBase = parseDecimal(account.available, BASE_DECIMALS);
    const heldBase = parseDecimal(account.locked, BASE_DECIMALS);
    return {
      asset: account.currency,
      availableBase,
      heldBase,
      totalBase: availableBase + heldBase,
    };
  });

const toFill = (order: GateioOrder): OrderFill => {
  const avgPrice = parseOptional(order.avg_deal_price, QUOTE_DECIMALS);
  const feeAmount = parseOptional(order.fee, BASE_DECIMALS);
  return {
    filledQuantityBase: parseOptional(order.filled_amount, BASE_DECIMALS),
    avgFillPriceQuote: avgPrice > 0n ? avgPrice : null,
    fee:
      feeAmount > 0n && order.fee_currency
        ? { amount: feeAmount, asset: order.fee_currency }
        : null,
  };
};

/**
 * `open` keeps polling; `closed` is a complete fill; `cancelled` (IOC
 * remainder, self-trade prevention, manual cancel) is partial or empty.
 */
export const normalizeOrder = (response: unknown): OrderPollResult => {
  const order = v.parse(GateioOrderSchema, response);
  const fill = toFill(order);

  if (order.status === "open") return { kind: "pending", fill };
  if (order.status === "closed") return { kind: "terminal", state: "filled", fill };
  return {
    kind: "terminal",
    state: fill.filledQuantityBase > 0n ? "partially-filled-closed" : "cancelled",
    fill,
  };
};

const toLevel = (price: string, size: string): OrderBookLevel | null => {
  if (!price || !size) return null;
  const priceQuote = parseDecimal(price, QUOTE_DECIMALS);
  const quantityBase = parseDecimal(size, BASE_DECIMALS);
  return priceQuote > 0n && quantityBase > 0n ? { priceQuote, quantityBase } : null;
};

export const normalizeBookTicker = (
  message: GateioBookTickerMessage,
  venue: string,
  symbol: string,
  receivedAt: number,
): OrderBookSnapshot => ({
  venue,
  symbol,
  bestBid: toLevel(message.result.b, message.result.B),
  bestAsk: toLevel(message.result.a, message.result.A),
  timestamp: receivedAt,
});

const AUTH_LABELS = new Set([
  "INVALID_KEY",
  "INVALID_SIGNATURE",
  "FORBIDDEN",
  "MISSING_REQUIRED_HEADER",
]);
const BALANCE_LABELS = new Set(["BALANCE_NOT_ENOUGH", "MARGIN_BALANCE_NOT_ENOUGH"]);
const NOT_FOUND_LABELS = new Set(["ORDER_NOT_FOUND", "ORDER_CLOSED"]);

/**
 * Map a Gate.io error `label` to a venue error code.
 */
export const classifyGateioError = (body: unknown): VenueErrorCode | null => {
  const result = v.safeParse(GateioErrorBodySchema, body);
  if (!result.success) return null;

  const { label } = result.output;
  if (AUTH_LABELS.has(label)) return "AUTHENTICATION_FAILED";
  if (BALANCE_LABELS.has(label)) return "INSUFFICIENT_BALANCE";
  if (NOT_FOUND_LABELS.has(label)) return "ORDER_NOT_FOUND";
  if (label === "TOO_MANY_REQUESTS") return "RATE_LIMITED";
  if (label === "SERVER_ERROR") return "NETWORK_ERROR";
  if (label.startsWith("INVALID_") || label.startsWith("TOO_")) return "INVALID_ORDER";
  return null;
};
