import { describe, expect, it } from "vitest";

import {
  classifyGateioError,
  normalizeBalances,
  normalizeBookTicker,
  normalizeOrder,
  toGateioPair,
} from "./normalizers";

const order = (overrides: Record<string, string>) => ({
  id: "1",
  currency_pair: "ETH_USDT",
  status: "closed",
  side: "buy",
  amount: "200",
  ...overrides,
});

describe("toGateioPair", () => {
  it("should join base and quote with an underscore", () => {
    expect(toGateioPair("ETH/USDT")).toBe("ETH_USDT");
  });
});

describe("normalizeBalances", () => {
  it("should add locked to available", () => {
    expect(normalizeBalances([{ currency: "USDT", available: "100.5", locked: "0.5" }])).toEqual([
      {
        asset: "USDT",
        availableBase: 10_050_000_000n,
        heldBase: 50_000_000n,
        totalBase: 10_100_000_000n,
      },
    ]);
  });

  it("should reject malformed payloads", () => {
    expect(() => normalizeBalances([{ currency: "USDT" }])).toThrow();
  });
});

describe("normalizeOrder", () => {
  it("should map closed orders to filled with fee in the fee currency", () => {
    expect(
      normalizeOrder(
        order({ filled_amount: "0.1", avg_deal_price: "2000", fee: "0.0001", fee_currency: "ETH" }),
      ),
    ).toEqual({
      kind: "terminal",
      state: "filled",
      fill: {
        filledQuantityBase: 10_000_000n,
        avgFillPriceQuote: 200_000_000_000n,
        fee: { amount: 10_000n, asset: "ETH" },
      },
    });
  });

  it("should keep polling open orders", () => {
    expect(normalizeOrder(order({ status: "open" })).kind).toBe("pending");
  });

  it("should distinguish partial and empty cancellations", () => {
    const partial = normalizeOrder(order({ status: "cancelled", filled_amount: "0.05" }));
    const empty = normalizeOrder(order({ status: "cancelled", filled_amount: "0" }));

    expect(partial.kind === "terminal" && partial.state).toBe("partially-filled-closed");
    expect(empty.kind === "terminal" && empty.state).toBe("cancelled");
  });

  it("should report a zero fill when the venue omits quantities", () => {
    expect(normalizeOrder(order({}))).toEqual({
      kind: "terminal",
      state: "filled",
      fill: { filledQuantityBase: 0n, avgFillPriceQuote: null, fee: null },
    });
  });
});

describe("normalizeBookTicker", () => {
  it("should build a snapshot stamped with the receive time", () => {
    const snapshot = normalizeBookTicker(
      {
        channel: "spot.book_ticker",
        event: "update",
        result: { t: 1, u: 2, s: "ETH_USDT", b: "2000.1", B: "3.5", a: "", A: "" },
      },
      "gateio",
      "ETH/USDT",
      5000,
    );

    expect(snapshot).toEqual({
      venue: "gateio",
      symbol: "ETH/USDT",
      bestBid: { priceQuote: 200_010_000_000n, quantityBase: 350_000_000n },
      bestAsk: null,
      timestamp: 5000,
    });
  });
});

describe("classifyGateioError", () => {
  it("should map labels to venue error codes", () => {
    expect(classifyGateioError({ label: "INVALID_SIGNATURE" })).toBe("AUTHENTICATION_FAILED");
    expect(classifyGateioError({ label: "BALANCE_NOT_ENOUGH" })).toBe("INSUFFICIENT_BALANCE");
    expect(classifyGateioError({ label: "ORDER_NOT_FOUND" })).toBe("ORDER_NOT_FOUND");
    expect(classifyGateioError({ label: "TOO_MANY_REQUESTS" })).toBe("RATE_LIMITED");
    expect(classifyGateioError({ label: "INVALID_PRECISION" })).toBe("INVALID_ORDER");
    expect(classifyGateioError({ label: "SOMETHING_NEW" })).toBeNull();
    expect(classifyGateioError("<html>")).toBeNull();
  });
});
