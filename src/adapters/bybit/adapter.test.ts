import { beforeEach, describe, expect, it, vi } from "vitest";

import { FatalAdapterError, RejectedOrderError } from "../errors";
import type { OrderHandle } from "../types";

import { createBybitAdapter } from "./adapter";

const mockRequest = vi.hoisted(() => vi.fn());

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return {
    ...actual,
    default: { ...actual.default, create: vi.fn(() => ({ request: mockRequest })) },
  };
});

interface SentRequest {
  method: string;
  url: string;
  data?: string;
  headers: object;
}

const requestAt = (index: number): SentRequest => mockRequest.mock.calls[index]?.[0];

const ok = (result: unknown) => ({ data: { retCode: 0, retMsg: "OK", result } });

const failed = (retCode: number, retMsg: string) => ({ data: { retCode, retMsg, result: {} } });

const INSTRUMENTS = ok({
  list: [
    {
      symbol: "ETHUSDT",
      lotSizeFilter: { qtyStep: "0.01", minOrderQty: "0.01" },
      leverageFilter: { maxLeverage: "100.00" },
    },
  ],
});

const HANDLE: OrderHandle = {
  venue: "bybit",
  symbol: "ETH/USDT",
  orderId: "b-1",
  clientOrderId: "cid1",
  side: "SELL",
  quantityBase: 123_000_000n,
};

const createAdapter = () =>
  createBybitAdapter({
    apiKey: "test-key",
    apiSecret: "test-secret",
    now: () => 1_700_000_000_000,
  });

describe("createBybitAdapter", () => {
  beforeEach(() => {
    mockRequest.mockReset();
  });

  describe("placeMarketOrder", () => {
    it("should round the quantity down to the lot step", async () => {
      mockRequest
        .mockResolvedValueOnce(INSTRUMENTS)
        .mockResolvedValueOnce(ok({ orderId: "b-1", orderLinkId: "cid1" }));
      const adapter = createAdapter();

      const handle = await adapter.placeMarketOrder({
        symbol: "ETH/USDT",
        side: "SELL",
        quantityBase: 123_456_789n,
        clientOrderId: "cid1",
      });

      expect(handle).toEqual(HANDLE);
      expect(requestAt(0).url).toBe("/v5/market/instruments-info?category=linear&symbol=ETHUSDT");
      const order = requestAt(1);
      expect(order.url).toBe("/v5/order/create");
      expect(order.headers).toMatchObject({
        "X-BAPI-API-KEY": "test-key",
        "X-BAPI-TIMESTAMP": "1700000000000",
        "X-BAPI-RECV-WINDOW": "5000",
      });
      expect(JSON.parse(order.data ?? "")).toEqual({
        category: "linear",
        symbol: "ETHUSDT",
        side: "Sell",
        qty: "1.23",
        positionIdx: 0,
        orderLinkId: "cid1",
        orderType: "Market",
        reduceOnly: false,
      });
    });

    it("should pass reduce-only through", async () => {
      mockRequest
        .mockResolvedValueOnce(INSTRUMENTS)
        .mockResolvedValueOnce(ok({ orderId: "b-2" }));
      const adapter = createAdapter();

      await adapter.placeMarketOrder({
        symbol: "ETH/USDT",
        side: "BUY",
        quantityBase: 100_000_000n,
        reduceOnly: true,
      });

      expect(JSON.parse(requestAt(1).data ?? "")).toMatchObject({
        side: "Buy",
        qty: "1",
        reduceOnly: true,
      });
    });

    it("should refuse quantities below the minimum without sending", async () => {
      mockRequest.mockResolvedValueOnce(INSTRUMENTS);
      const adapter = createAdapter();

      await expect(
        adapter.placeMarketOrder({ symbol: "ETH/USDT", side: "SELL", quantityBase: 900_000n }),
      ).rejects.toBeInstanceOf(RejectedOrderError);
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it("should turn an insufficient balance retCode into a rejection", async () => {
      mockRequest
        .mockResolvedValueOnce(INSTRUMENTS)
        .mockResolvedValueOnce(failed(110007, "ab not enough for new order"));
      const adapter = createAdapter();

      const error = await adapter
        .placeMarketOrder({ symbol: "ETH/USDT", side: "SELL", quantityBase: 100_000_000n })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RejectedOrderError);
      expect(error).toMatchObject({ code: "INSUFFICIENT_BALANCE", venue: "bybit" });
    });
  });

  describe("pollOrder", () => {
    it("should fall back to order history when the order left the open list", async () => {
      mockRequest.mockResolvedValueOnce(ok({ list: [] })).mockResolvedValueOnce(
        ok({
          list: [
            {
              orderId: "b-1",
              orderLinkId: "cid1",
              symbol: "ETHUSDT",
              side: "Sell",
              orderStatus: "Filled",
              cumExecQty: "1.23",
              avgPrice: "2001.5",
              cumExecFee: "1.4769",
            },
          ],
        }),
      );
      const adapter = createAdapter();

      const result = await adapter.pollOrder(HANDLE);

      expect(requestAt(0).url).toBe(
        "/v5/order/realtime?category=linear&symbol=ETHUSDT&orderId=b-1",
      );
      expect(requestAt(1).url).toBe(
        "/v5/order/history?category=linear&symbol=ETHUSDT&orderId=b-1",
      );
      expect(result).toEqual({
        kind: "terminal",
        state: "filled",
        fill: {
          filledQuantityBase: 123_000_000n,
          avgFillPriceQuote: 200_150_000_000n,
          fee: { amount: 147_690_000n, asset: "USDT" },
        },
      });
    });

    it("should look up by link id and report not-found", async () => {
      mockRequest
        .mockResolvedValueOnce(ok({ list: [] }))
        .mockResolvedValueOnce(ok({ list: [] }));
      const adapter = createAdapter();

      const result = await adapter.pollOrder({ ...HANDLE, orderId: null });

      expect(requestAt(0).url).toBe(
        "/v5/order/realtime?category=linear&symbol=ETHUSDT&orderLinkId=cid1",
      );
      expect(result).toEqual({ kind: "not-found" });
    });
  });

  describe("account", () => {
    it("should treat an invalid key as fatal", async () => {
      mockRequest.mockResolvedValueOnce(failed(10003, "API key is invalid."));
      const adapter = createAdapter();

      await expect(adapter.fetchBalances()).rejects.toBeInstanceOf(FatalAdapterError);
    });

    it("should read the short position for the symbol", async () => {
      mockRequest.mockResolvedValueOnce(
        ok({
          list: [{ symbol: "ETHUSDT", side: "Sell", size: "1.5", avgPrice: "2000", leverage: "5" }],
        }),
      );
      const adapter = createAdapter();

      expect(await adapter.fetchPositions("ETH/USDT")).toEqual([
        {
          symbol: "ETH/USDT",
          side: "SHORT",
          sizeBase: 150_000_000n,
          entryPriceQuote: 200_000_000_000n,
          leverage: 5,
        },
      ]);
      expect(requestAt(0).url).toBe("/v5/position/list?category=linear&symbol=ETHUSDT");
    });
  });

  describe("session setup", () => {
    it("should accept leverage that is already set", async () => {
      mockRequest.mockResolvedValueOnce(failed(110043, "leverage not modified"));
      const adapter = createAdapter();

      await expect(adapter.setLeverage("ETH/USDT", 5)).resolves.toBeUndefined();
      expect(JSON.parse(requestAt(0).data ?? "")).toEqual({
        category: "linear",
        symbol: "ETHUSDT",
        buyLeverage: "5",
        sellLeverage: "5",
      });
    });

    it("should switch to one-way mode and set the account margin mode", async () => {
      mockRequest
        .mockResolvedValueOnce(failed(110025, "Position mode is not modified"))
        .mockResolvedValueOnce(ok({}));
      const adapter = createAdapter();

      await adapter.setMarginMode("ETH/USDT", "isolated");

      expect(JSON.parse(requestAt(0).data ?? "")).toEqual({
        category: "linear",
        symbol: "ETHUSDT",
        mode: 0,
      });
      expect(requestAt(1).url).toBe("/v5/account/set-margin-mode");
      expect(JSON.parse(requestAt(1).data ?? "")).toEqual({ setMarginMode: "ISOLATED_MARGIN" });
    });

    it("should read max leverage once per symbol", async () => {
      mockRequest.mockResolvedValueOnce(INSTRUMENTS);
      const adapter = createAdapter();

      expect(await adapter.getMaxLeverage("ETH/USDT")).toBe(100);
      expect(await adapter.getMaxLeverage("ETH/USDT")).toBe(100);
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });
  });
});
