/**
 * Valibot schemas for Gate.io API v4 spot responses and stream messages.
 */

import * as v from "valibot";

export const GateioCurrencyPairSchema = v.object({
  id: v.string(),
  base: v.string(),
  quote: v.string(),
  /** Price decimals */
  precision: v.number(),
  /** Base amount decimals */
  amount_precision: v.number(),
  min_base_amount: v.optional(v.string()),
  min_quote_amount: v.optional(v.string()),
  trade_status: v.optional(v.string()),
});

export const GateioSpotAccountSchema = v.object({
  currency: v.string(),
  available: v.string(),
  locked: v.string(),
});

export const GateioSpotAccountsSchema = v.array(GateioSpotAccountSchema);

export const GateioOrderSchema = v.object({
  id: v.string(),
  text: v.optional(v.string()),
  currency_pair: v.string(),
  status: v.picklist(["open", "closed", "cancelled"]),
  side: v.picklist(["buy", "sell"]),
  type: v.optional(v.string()),
  amount: v.string(),
  left: v.optional(v.string()),
  filled_amount: v.optional(v.string()),
  filled_total: v.optional(v.string()),
  avg_deal_price: v.optional(v.string()),
  fee: v.optional(v.string()),
  fee_currency: v.optional(v.string()),
  finish_as: v.optional(v.string()),
});

export type GateioOrder = v.InferOutput<typeof GateioOrderSchema>;

export const GateioUniLendSchema = v.object({
  currency: v.string(),
  /** Amount currently lent and redeemable */
  amount: v.string(),
});

export const GateioUniLendsSchema = v.array(GateioUniLendSchema);

export const GateioErrorBodySchema = v.object({
  label: v.string(),
  message: v.optional(v.string()),
});

export const GateioBookTickerMessageSchema = v.object({
  time: v.optional(v.number()),
  channel: v.literal("spot.book_ticker"),
  event: v.literal("update"),
  result: v.object({
    t: v.number(),
    u: v.number(),
    s: v.string(),
    b: v.string(),
    B: v.string(),
    a: v.string(),
    A: v.string(),
  }),
});

export type GateioBookTickerMessage = v.InferOutput<typeof GateioBookTickerMessageSchema>;
