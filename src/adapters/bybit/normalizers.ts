/**
 * Normalizers from Bybit API v5 payloads to venue-neutral types.
 */

import * as v from "valibot";

import { BASE_DECIMALS, QUOTE_DECIMALS, maxBigInt, parseDecimal } from "@/lib/decimal";

import type { VenueErrorCode } from "../errors";
import type { Balance, OrderBookLevel, OrderPollResult, Position } from "../types";
import { splitSymbol } from "../types";
import {
  type BybitOrder,
  type BybitOrderbookMessage,
  BybitEnvelopeSchema,
  BybitPositionListResultSchema,
  BybitWalletResultSchema,
} from "./schemas";

/** `ETH/USDT` → `ETHUSDT` */
export const toBybitSymbol = (symbol: string): string => {
  const { base, quote } = splitSymbol(symbol);
  return `${base}${quote}`;
};

const parseOptional = (value: string | undefined, decimals: number): bigint =>
  value ? parseDecimal(value, decimals) : 0n;

const CLOSED_STATUSES = new Set(["Cancelled", "PartiallyFilledCanceled", "Deactivated"]);

/**
 * Linear contracts settle fees in the quote asset, so `feeAsset` is the
 * symbol's quote currency.
 */
export const normalizeOrder = (order: BybitOrder, feeAsset: string): OrderPollResult => {
  const avgPrice = parseOptional(order.avgPrice, QUOTE_DECIMALS);
  const feeAmount = parseOptional(order.cumExecFee, QUOTE_DECIMALS);
  const fill = {
    filledQuantityBase: parseOptional(order.cumExecQty, BASE_DECIMALS),
    avgFillPriceQuote: avgPrice > 0n ? avgPrice : null,
    fee: feeAmount > 0n ? { amount: feeAmount, asset: feeAsset } : null,
  };

  if (order.orderStatus === "Filled") return { kind: "terminal", state: "filled", fill };
  if (order.orderStatus === "Rejected") return { kind: "terminal", state: "rejected", fill };
  if (CLOSED_STATUSES.has(order.orderStatus)) {
    return {
      kind: "terminal",
      state: fill.filledQuantityBase > 0n ? "partially-filled-closed" : "cancelled",
      fill,
    };
  }
  // New, PartiallyFilled, Untriggered and anything unlisted keep polling
  return { kind: "pending", fill };
};

/**
 * Unified account coins. Without `availableToWithdraw`, available is the
 * wallet balance less locked funds and initial margin.
 */
export const normalizeWalletBalances = (result: unknown): Balance[] =>
  v.parse(BybitWalletResultSchema, result).list.flatMap((account) =>
    account.coin.map((coin) => {
      const totalBase = parseDecimal(coin.walletBalance, BASE_DECIMALS);
      const availableBase = coin.availableToWithdraw
        ? parseDecimal(coin.availableToWithdraw, BASE_DECIMALS)
        : maxBigInt(
            0n,
            totalBase -
              parseOptional(coin.locked, BASE_DECIMALS) -
              parseOptional(coin.totalPositionIM, BASE_DECIMALS) -
              parseOptional(coin.totalOrderIM, BASE_DECIMALS),
          );
      return {
        asset: coin.coin,
        availableBase,
        heldBase: maxBigInt(0n, totalBase - availableBase),
        totalBase,
      };
    }),
  );

/**
 * Open positions for `symbol` (canonical form). Flat entries are dropped.
 */
export const normalizePositions = (result: unknown, symbol: string): Position[] => {
  const venueSymbol = toBybitSymbol(symbol);
  return v
    .parse(BybitPositionListResultSchema, result)
    .list.filter((position) => position.symbol === venueSymbol)
    .flatMap((position): Position[] => {
      const sizeBase = parseDecimal(position.size, BASE_DECIMALS);
      if (sizeBase === 0n || (position.side !== "Buy" && position.side !== "Sell")) return [];

      const entryPrice = parseOptional(position.avgPrice, QUOTE_DECIMALS);
      const leverage = position.leverage ? Number(position.leverage) : Number.NaN;
      return [
        {
          symbol,
          side: position.side === "Buy" ? "LONG" : "SHORT",
          sizeBase,
          entryPriceQuote: entryPrice > 0n ? entryPrice : null,
          leverage: Number.isFinite(leverage) && leverage > 0 ? leverage : null,
        },
      ];
    });
};

export interface BybitBookSide {
  bid: OrderBookLevel | null;
  ask: OrderBookLevel | null;
}

const toLevel = ([price, size]: [string, string]): OrderBookLevel | null => {
  const priceQuote = parseDecimal(price, QUOTE_DECIMALS);
  const quantityBase = parseDecimal(size, BASE_DECIMALS);
  return priceQuote > 0n && quantityBase > 0n ? { priceQuote, quantityBase } : null;
};

/**
 * Apply a level-1 `orderbook` message to the local top of book. Snapshots
 * replace both sides; deltas touch only the sides they carry, and a zero
 * size empties that side.
 */
export const applyOrderbookMessage = (
  current: BybitBookSide,
  message: BybitOrderbookMessage,
): BybitBookSide => {
  const [bestBid] = message.data.b;
  const [bestAsk] = message.data.a;

  if (message.type === "snapshot") {
    return {
      bid: bestBid ? toLevel(bestBid) : null,
      ask: bestAsk ? toLevel(bestAsk) : null,
    };
  }

  return {
    bid: bestBid ? toLevel(bestBid) : current.bid,
    ask: bestAsk ? toLevel(bestAsk) : current.ask,
  };
};

/** retCodes that mean "already in the requested state". */
export const BYBIT_NOT_MODIFIED_CODES: ReadonlySet<number> = new Set([110043, 110025, 110026]);

const AUTH_CODES = new Set([10003, 10004, 10005, 10007, 33004]);
const BALANCE_CODES = new Set([110004, 110007, 110012, 170131]);
const NOT_FOUND_CODES = new Set([110001, 170213]);
const RATE_LIMIT_CODES = new Set([10006, 10018]);

/**
 * Map a Bybit `retCode` to a venue error code.
 */
export const classifyBybitRetCode = (retCode: number): VenueErrorCode => {
  if (AUTH_CODES.has(retCode)) return "AUTHENTICATION_FAILED";
  if (BALANCE_CODES.has(retCode)) return "INSUFFICIENT_BALANCE";
  if (NOT_FOUND_CODES.has(retCode)) return "ORDER_NOT_FOUND";
  if (RATE_LIMIT_CODES.has(retCode)) return "RATE_LIMITED";
  if (retCode === 10016) return "NETWORK_ERROR";
  // 10001 parameter errors, 110xxx order validation
  if (retCode === 10001 || (retCode >= 110000 && retCode < 120000)) return "INVALID_ORDER";
  return "UNKNOWN";
};

/**
 * Body classifier for HTTP-level failures that still carry an envelope.
 */
export const classifyBybitError = (body: unknown): VenueErrorCode | null => {
  const result = v.safeParse(BybitEnvelopeSchema, body);
  if (!result.success || result.output.retCode === 0) return null;
  return classifyBybitRetCode(result.output.retCode);
};
