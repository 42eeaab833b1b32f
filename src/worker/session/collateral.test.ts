import { describe, expect, it, vi } from "vitest";

import { createPaperAdapter } from "@/adapters/paper";
import { InsufficientCollateralError } from "@/domains/errors";
import type { LegResult } from "@/domains/ledger";
import type { HedgeDirection, TradeIntent } from "@/domains/strategy";
import { parseDecimal } from "@/lib/decimal";
import type { Logger } from "@/lib/logger";

import { type CollateralGuardConfig, createCollateralGuard } from "./collateral";

const dec = (value: string): bigint => parseDecimal(value, 8);

const SYMBOL = "ETH/USDT";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
});

const intent = (direction: HedgeDirection): TradeIntent => ({
  symbol: SYMBOL,
  direction,
  legA: {
    leg: "A",
    side: direction === "open" ? "BUY" : "SELL",
    quantityBase: dec("10"),
    expectedPriceQuote: dec("100"),
    reduceOnly: false,
  },
  legB: {
    leg: "B",
    side: direction === "open" ? "SELL" : "BUY",
    quantityBase: dec("10"),
    expectedPriceQuote: dec("100.30"),
    reduceOnly: direction === "close",
  },
  spreadBps: 30n,
  referencePriceQuote: dec("100"),
});

interface SetupOptions {
  direction?: HedgeDirection;
  spotBalances?: Record<string, bigint>;
  perpQuote?: string;
  shortBase?: string;
  earn?: Record<string, bigint>;
  redeemIdleFunds?: boolean;
  parkSpotInEarn?: boolean;
}

const setup = (options: SetupOptions = {}) => {
  const spot = createPaperAdapter({
    venue: "gateio",
    market: "spot",
    initialBalances: options.spotBalances ?? { USDT: dec("10000") },
    earnBalances: options.earn,
  });
  const perp = createPaperAdapter({
    venue: "bybit",
    market: "perp",
    initialBalances: { USDT: dec(options.perpQuote ?? "1000") },
    initialPositions: options.shortBase ? { [SYMBOL]: -dec(options.shortBase) } : {},
  });
  const config: CollateralGuardConfig = {
    symbol: SYMBOL,
    direction: options.direction ?? "open",
    redeemIdleFunds: options.redeemIdleFunds ?? true,
    parkSpotInEarn: options.parkSpotInEarn ?? false,
    leverage: 10,
  };
  const guard = createCollateralGuard(config, { spot, perp, logger: createMockLogger() });
  return { spot, perp, guard };
};

const balanceOf = async (
  adapter: ReturnType<typeof createPaperAdapter>,
  asset: string,
): Promise<bigint | undefined> =>
  (await adapter.fetchBalances()).find((balance) => balance.asset === asset)?.totalBase;

describe("createCollateralGuard", () => {
  describe("open", () => {
    it("should pass when both venues hold enough", async () => {
      const { guard } = setup();

      await expect(guard.ensure(intent("open"))).resolves.toEqual({ kind: "ok" });
    });

    it("should redeem the shortfall plus a buffer from earn", async () => {
      const { spot, guard } = setup({ spotBalances: {}, earn: { USDT: dec("5000") } });

      await expect(guard.ensure(intent("open"))).resolves.toEqual({ kind: "ok" });

      // Needs 1000 * 1.02 = 1020, redeems 1020 * 1.01
      expect(await balanceOf(spot, "USDT")).toBe(dec("1030.2"));
    });

    it("should redeem at least the minimum amount", async () => {
      const { spot, guard } = setup({
        spotBalances: { USDT: dec("1000") },
        earn: { USDT: dec("5000") },
      });

      await guard.ensure(intent("open"));

      expect(await balanceOf(spot, "USDT")).toBe(dec("1050"));
    });

    it("should throw when the spot venue stays short", async () => {
      const { guard } = setup({ spotBalances: { USDT: dec("500") } });

      const error = await guard.ensure(intent("open")).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InsufficientCollateralError);
      expect(error).toMatchObject({
        venue: "gateio",
        asset: "USDT",
        requiredBase: dec("1020"),
        availableBase: dec("500"),
      });
    });

    it("should leave earn untouched when redemption is disabled", async () => {
      const { spot, guard } = setup({
        spotBalances: { USDT: dec("500") },
        earn: { USDT: dec("5000") },
        redeemIdleFunds: false,
      });

      await expect(guard.ensure(intent("open"))).rejects.toBeInstanceOf(
        InsufficientCollateralError,
      );
      expect(await balanceOf(spot, "USDT")).toBe(dec("500"));
    });

    it("should require initial margin on the perpetual venue", async () => {
      const { guard } = setup({ perpQuote: "50" });

      // 10 * 100.30 / 10x leverage = 100.3, plus 5%
      await expect(guard.ensure(intent("open"))).rejects.toMatchObject({
        venue: "bybit",
        requiredBase: dec("105.315"),
        availableBase: dec("50"),
      });
    });
  });

  describe("close", () => {
    it("should pass when spot base and the short both cover the trade", async () => {
      const { guard } = setup({
        direction: "close",
        spotBalances: { ETH: dec("20") },
        shortBase: "20",
      });

      await expect(guard.ensure(intent("close"))).resolves.toEqual({ kind: "ok" });
    });

    it("should report exhaustion when spot base runs out", async () => {
      const { guard } = setup({ direction: "close", spotBalances: {}, shortBase: "20" });

      await expect(guard.ensure(intent("close"))).resolves.toEqual({
        kind: "position-exhausted",
        reason: "ETH balance below trade size",
      });
    });

    it("should report exhaustion when the short is smaller than the trade", async () => {
      const { guard } = setup({
        direction: "close",
        spotBalances: { ETH: dec("20") },
        shortBase: "5",
      });

      await expect(guard.ensure(intent("close"))).resolves.toEqual({
        kind: "position-exhausted",
        reason: "short position below trade size",
      });
    });

    it("should redeem parked base before closing", async () => {
      const { spot, guard } = setup({
        direction: "close",
        spotBalances: {},
        earn: { ETH: dec("15") },
        shortBase: "20",
      });

      await expect(guard.ensure(intent("close"))).resolves.toEqual({ kind: "ok" });
      expect(await balanceOf(spot, "ETH")).toBe(dec("10.1"));
    });
  });

  describe("park", () => {
    const legA: LegResult = {
      venue: "gateio",
      leg: "A",
      side: "BUY",
      orderId: "1",
      clientOrderId: "c1",
      requestedBase: dec("10"),
      filledBase: dec("10"),
      netFilledBase: dec("10"),
      avgPriceQuote: dec("100"),
      fee: null,
      state: "filled",
      source: "status",
    };

    it("should subscribe the bought base into earn when enabled", async () => {
      const { spot, guard } = setup({
        spotBalances: { ETH: dec("12") },
        earn: {},
        parkSpotInEarn: true,
      });

      await guard.park(legA);

      expect(await balanceOf(spot, "ETH")).toBe(dec("2"));
    });

    it("should keep the base on the spot account when disabled", async () => {
      const { spot, guard } = setup({ spotBalances: { ETH: dec("12") }, earn: {} });

      await guard.park(legA);

      expect(await balanceOf(spot, "ETH")).toBe(dec("12"));
    });
  });
});
