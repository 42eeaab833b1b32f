/**
 * Valibot schemas for Bybit API v5 (linear perpetuals, unified account)
 * responses and stream messages.
 */

import * as v from "valibot";

/** Every REST response, success or not, arrives in this envelope. */
export const BybitEnvelopeSchema = v.object({
  retCode: v.number(),
  retMsg: v.string(),
  result: v.optional(v.unknown()),
  time: v.optional(v.number()),
});

export const BybitInstrumentSchema = v.object({
  symbol: v.string(),
  status: v.optional(v.string()),
  lotSizeFilter: v.object({
    qtyStep: v.string(),
    minOrderQty: v.string(),
  }),
  leverageFilter: v.object({
    maxLeverage: v.string(),
  }),
});

export const BybitInstrumentsResultSchema = v.object({
  list: v.array(BybitInstrumentSchema),
});

export const BybitOrderCreateResultSchema = v.object({
  orderId: v.string(),
  orderLinkId: v.optional(v.string()),
});

export const BybitOrderSchema = v.object({
  orderId: v.string(),
  orderLinkId: v.optional(v.string()),
  symbol: v.string(),
  side: v.picklist(["Buy", "Sell"]),
  orderStatus: v.string(),
  qty: v.optional(v.string()),
  cumExecQty: v.string(),
  avgPrice: v.optional(v.string()),
  cumExecFee: v.optional(v.string()),
  rejectReason: v.optional(v.string()),
});

export type BybitOrder = v.InferOutput<typeof BybitOrderSchema>;

export const BybitOrderListResultSchema = v.object({
  list: v.array(BybitOrderSchema),
});

export const BybitWalletCoinSchema = v.object({
  coin: v.string(),
  walletBalance: v.string(),
  locked: v.optional(v.string()),
  totalPositionIM: v.optional(v.string()),
  totalOrderIM: v.optional(v.string()),
  /** Empty for unified accounts on current API versions */
  availableToWithdraw: v.optional(v.string()),
});

export const BybitWalletResultSchema = v.object({
  list: v.array(
    v.object({
      accountType: v.string(),
      coin: v.array(BybitWalletCoinSchema),
    }),
  ),
});

export const BybitPositionSchema = v.object({
  symbol: v.string(),
  /** Empty string when flat in one-way mode */
  side: v.picklist(["Buy", "Sell", ""]),
  size: v.string(),
  avgPrice: v.optional(v.string()),
  leverage: v.optional(v.string()),
});

export const BybitPositionListResultSchema = v.object({
  list: v.array(BybitPositionSchema),
});

const BybitLevelSchema = v.tuple([v.string(), v.string()]);

export const BybitOrderbookMessageSchema = v.object({
  topic: v.string(),
  type: v.picklist(["snapshot", "delta"]),
  ts: v.number(),
  data: v.object({
    s: v.string(),
    b: v.array(BybitLevelSchema),
    a: v.array(BybitLevelSchema),
    u: v.number(),
    seq: v.optional(v.number()),
  }),
});

export type BybitOrderbookMessage = v.InferOutput<typeof BybitOrderbookMessageSchema>;
