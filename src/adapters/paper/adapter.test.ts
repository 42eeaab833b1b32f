import { describe, expect, it } from "vitest";

import { RejectedOrderError, StreamDisconnectError } from "../errors";
import { type MarketOrderParams, type OrderSide, findBalance } from "../types";

import { type PaperBookUpdate, createPaperAdapter } from "./adapter";

const SYMBOL = "ETH/USDT";
const PRICE_100 = 10_000_000_000n;
const PRICE_101 = 10_100_000_000n;
const ONE = 100_000_000n;

const level = (priceQuote: bigint, quantityBase = 50n * ONE) => ({ priceQuote, quantityBase });

const book = (): PaperBookUpdate => ({
  symbol: SYMBOL,
  bestBid: level(PRICE_100),
  bestAsk: level(PRICE_101),
});

const order = (side: OrderSide, quantityBase: bigint): MarketOrderParams => ({
  symbol: SYMBOL,
  side,
  quantityBase,
});

describe("createPaperAdapter", () => {
  describe("spot", () => {
    const createSpot = (reportZeroFills = false) => {
      const adapter = createPaperAdapter({
        venue: "spot-test",
        market: "spot",
        initialBalances: { USDT: 1000n * ONE },
        reportZeroFills,
      });
      adapter.pushOrderBook(book());
      return adapter;
    };

    it("should fill a market buy at the ask and charge the fee in base", async () => {
      const adapter = createSpot();

      const handle = await adapter.placeMarketOrder(order("BUY", ONE));
      const result = await adapter.pollOrder(handle);
      const balances = await adapter.fetchBalances();

      expect(result).toEqual({
        kind: "terminal",
        state: "filled",
        fill: {
          filledQuantityBase: ONE,
          avgFillPriceQuote: PRICE_101,
          fee: { amount: 100_000n, asset: "ETH" },
        },
      });
      expect(findBalance(balances, "ETH").totalBase).toBe(99_900_000n);
      expect(findBalance(balances, "USDT").totalBase).toBe(899n * ONE);
    });

    it("should reject buys the quote balance cannot cover", async () => {
      const adapter = createSpot();

      await expect(
        adapter.placeMarketOrder({ symbol: SYMBOL, side: "BUY", quantityBase: 20n * ONE }),
      ).rejects.toBeInstanceOf(RejectedOrderError);
    });

    it("should report zero-quantity fills when configured", async () => {
      const adapter = createSpot(true);

      const handle = await adapter.placeMarketOrder(order("BUY", ONE));

      expect(await adapter.pollOrder(handle)).toEqual({
        kind: "terminal",
        state: "filled",
        fill: { filledQuantityBase: 0n, avgFillPriceQuote: null, fee: null },
      });
      expect(findBalance(await adapter.fetchBalances(), "ETH").totalBase).toBe(99_900_000n);
    });

    it("should return not-found for unknown orders", async () => {
      const adapter = createSpot();

      expect(
        await adapter.pollOrder({
          venue: "spot-test",
          symbol: SYMBOL,
          orderId: null,
          clientOrderId: "missing",
          side: "BUY",
          quantityBase: ONE,
        }),
      ).toEqual({ kind: "not-found" });
    });

    it("should treat leverage calls as no-ops and report no positions", async () => {
      const adapter = createSpot();

      await adapter.setLeverage(SYMBOL, 5);

      expect(adapter.getLeverage(SYMBOL)).toBeNull();
      expect(await adapter.getMaxLeverage(SYMBOL)).toBeNull();
      expect(await adapter.fetchPositions(SYMBOL)).toEqual([]);
    });
  });

  describe("perp", () => {
    const createPerp = () => {
      const adapter = createPaperAdapter({
        market: "perp",
        initialBalances: { USDT: 1000n * ONE },
      });
      adapter.pushOrderBook(book());
      return adapter;
    };

    it("should open a short at the bid and charge the fee in quote", async () => {
      const adapter = createPerp();

      await adapter.placeMarketOrder({ symbol: SYMBOL, side: "SELL", quantityBase: 2n * ONE });

      expect(adapter.getPositionBase(SYMBOL)).toBe(-2n * ONE);
      expect(await adapter.fetchPositions(SYMBOL)).toEqual([
        {
          symbol: SYMBOL,
          side: "SHORT",
          sizeBase: 2n * ONE,
          entryPriceQuote: null,
          leverage: null,
        },
      ]);
      // 200 quote notional, 10 bps fee
      expect(findBalance(await adapter.fetchBalances(), "USDT").totalBase).toBe(99_980_000_000n);
    });

    it("should refuse reduce-only orders that would grow the position", async () => {
      const adapter = createPerp();
      await adapter.placeMarketOrder({ symbol: SYMBOL, side: "SELL", quantityBase: ONE });

      await expect(
        adapter.placeMarketOrder({ ...order("BUY", 2n * ONE), reduceOnly: true }),
      ).rejects.toThrow("Reduce-only order would increase position");
      await adapter.placeMarketOrder({ ...order("BUY", ONE), reduceOnly: true });
      expect(adapter.getPositionBase(SYMBOL)).toBe(0n);
    });

    it("should fill only the configured share of each order", async () => {
      const adapter = createPaperAdapter({ market: "perp", fillRatioBps: 9950n });
      adapter.pushOrderBook(book());

      const handle = await adapter.placeMarketOrder(order("SELL", 10n * ONE));
      const result = await adapter.pollOrder(handle);

      expect(result.kind === "terminal" && result.state).toBe("partially-filled-closed");
      expect(result.kind === "terminal" && result.fill.filledQuantityBase).toBe(995_000_000n);
    });

    it("should store leverage and margin mode", async () => {
      const adapter = createPaperAdapter({ market: "perp", maxLeverage: 25 });

      await adapter.setMarginMode(SYMBOL, "isolated");
      await adapter.setLeverage(SYMBOL, 5);

      expect(adapter.getMarginMode(SYMBOL)).toBe("isolated");
      expect(adapter.getLeverage(SYMBOL)).toBe(5);
      expect(await adapter.getMaxLeverage(SYMBOL)).toBe(25);
    });
  });

  describe("limit orders", () => {
    it("should rest until cancelled", async () => {
      const adapter = createPaperAdapter({ market: "spot" });

      const handle = await adapter.placeLimitOrder({
        symbol: SYMBOL,
        side: "BUY",
        quantityBase: ONE,
        priceQuote: PRICE_100,
      });
      expect((await adapter.pollOrder(handle)).kind).toBe("pending");

      await adapter.cancelOrder(handle);
      const result = await adapter.pollOrder(handle);
      expect(result.kind === "terminal" && result.state).toBe("cancelled");
    });
  });

  describe("streams", () => {
    it("should deliver pushed books to open streams", async () => {
      const adapter = createPaperAdapter({ market: "spot", now: () => 1234 });
      const iterator = adapter.streamOrderBook(SYMBOL)[Symbol.asyncIterator]();

      adapter.pushOrderBook({ symbol: SYMBOL, bestBid: level(PRICE_100), bestAsk: null });

      await expect(iterator.next()).resolves.toEqual({
        value: {
          venue: "paper",
          symbol: SYMBOL,
          bestBid: level(PRICE_100),
          bestAsk: null,
          timestamp: 1234,
        },
        done: false,
      });
    });

    it("should fail open streams when dropped", async () => {
      const adapter = createPaperAdapter({ market: "spot" });
      const iterator = adapter.streamOrderBook(SYMBOL)[Symbol.asyncIterator]();

      adapter.dropStreams();

      await expect(iterator.next()).rejects.toBeInstanceOf(StreamDisconnectError);
    });

    it("should end the stream quietly on abort", async () => {
      const adapter = createPaperAdapter({ market: "spot" });
      const controller = new AbortController();
      const iterator = adapter.streamOrderBook(SYMBOL, controller.signal)[Symbol.asyncIterator]();

      controller.abort();

      await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
    });

    it("should record books from a live market data source", async () => {
      const source = createPaperAdapter({ venue: "gateio", market: "spot" });
      const adapter = createPaperAdapter({
        market: "spot",
        marketData: source,
        initialBalances: { USDT: 1000n * ONE },
      });
      const iterator = adapter.streamOrderBook(SYMBOL)[Symbol.asyncIterator]();
      const next = iterator.next();

      source.pushOrderBook(book());
      await next;
      await adapter.placeMarketOrder({ symbol: SYMBOL, side: "BUY", quantityBase: ONE });

      expect(adapter.venue).toBe("gateio");
      expect(findBalance(await adapter.fetchBalances(), "USDT").totalBase).toBe(899n * ONE);
    });
  });

  describe("idle funds", () => {
    it("should only expose the capability when earn balances are configured", () => {
      expect(createPaperAdapter({ market: "spot" }).redeemIdleFunds).toBeUndefined();
    });

    it("should move funds between earn and the trading balance", async () => {
      const adapter = createPaperAdapter({ market: "spot", earnBalances: { USDT: 50n * ONE } });

      expect(await adapter.redeemIdleFunds?.("USDT", 80n * ONE)).toBe(true);
      expect(findBalance(await adapter.fetchBalances(), "USDT").totalBase).toBe(50n * ONE);
      expect(await adapter.redeemIdleFunds?.("USDT", ONE)).toBe(false);

      expect(await adapter.subscribeIdleFunds?.("USDT", 20n * ONE)).toBe(true);
      expect(findBalance(await adapter.fetchBalances(), "USDT").totalBase).toBe(30n * ONE);
    });
  });
});
