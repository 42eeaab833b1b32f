/**
 * Tests for venue adapter construction and config validation.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import type { AppConfig } from "@/lib/config";

import { parseVenueAdapterConfig } from "./config";
import { MissingCredentialsError, createVenueAdapter, createVenuePair } from "./factory";
import type { VenueAdapter } from "./types";

const fakeAdapter = (venue: string): VenueAdapter => ({
  venue,
  market: venue === "bybit" ? "perp" : "spot",
  connect: vi.fn().mockResolvedValue(undefined),
  disconnect: vi.fn().mockResolvedValue(undefined),
  isConnected: vi.fn().mockReturnValue(false),
  streamOrderBook: vi.fn(),
  placeMarketOrder: vi.fn(),
  placeLimitOrder: vi.fn(),
  cancelOrder: vi.fn(),
  pollOrder: vi.fn(),
  fetchBalances: vi.fn(),
  fetchPositions: vi.fn(),
  setLeverage: vi.fn(),
  setMarginMode: vi.fn(),
  getMaxLeverage: vi.fn(),
});

vi.mock("./gateio", () => ({
  createGateioAdapter: vi.fn(() => fakeAdapter("gateio")),
}));

vi.mock("./bybit", () => ({
  createBybitAdapter: vi.fn(() => fakeAdapter("bybit")),
}));

import { createBybitAdapter } from "./bybit";
import { createGateioAdapter } from "./gateio";

const venues = (overrides: Partial<AppConfig["venues"]> = {}): AppConfig["venues"] => ({
  spot: { venue: "gateio", credentials: { apiKey: "test-key", apiSecret: "test-secret" } },
  perp: {
    venue: "bybit",
    credentials: { apiKey: "test-key", apiSecret: "test-secret" },
    testnet: true,
  },
  dryRun: false,
  dryRunBalanceQuote: 1_000_000_000_000n,
  ...overrides,
});

describe("createVenueAdapter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should create the Gate.io adapter with credentials", () => {
    const config = parseVenueAdapterConfig({
      venue: "gateio",
      apiKey: "test-key",
      apiSecret: "test-secret",
    });

    const adapter = createVenueAdapter(config);

    expect(adapter.venue).toBe("gateio");
    expect(createGateioAdapter).toHaveBeenCalledWith({
      apiKey: "test-key",
      apiSecret: "test-secret",
      baseUrl: undefined,
      logger: undefined,
    });
  });

  it("should default Bybit to mainnet", () => {
    const config = parseVenueAdapterConfig({
      venue: "bybit",
      apiKey: "test-key",
      apiSecret: "test-secret",
    });

    createVenueAdapter(config);

    expect(createBybitAdapter).toHaveBeenCalledWith(
      expect.objectContaining({ testnet: false }),
    );
  });

  it("should create a paper adapter without credentials", () => {
    const config = parseVenueAdapterConfig({
      venue: "paper",
      market: "perp",
      initialBalances: { USDT: 100_000_000n },
    });

    const adapter = createVenueAdapter(config);

    expect(adapter.venue).toBe("paper");
    expect(adapter.market).toBe("perp");
  });

  it("should reject credentials that are empty", () => {
    expect(() =>
      parseVenueAdapterConfig({ venue: "gateio", apiKey: "", apiSecret: "test-secret" }),
    ).toThrow();
  });

  it("should reject unknown venues", () => {
    expect(() => parseVenueAdapterConfig({ venue: "kraken" })).toThrow();
  });
});

describe("createVenuePair", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should build both live legs", () => {
    const pair = createVenuePair(venues(), "ETH/USDT");

    expect(pair.spot.venue).toBe("gateio");
    expect(pair.perp.venue).toBe("bybit");
    expect(createBybitAdapter).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: "test-key", testnet: true }),
    );
  });

  it("should refuse a live run without credentials", () => {
    const config = venues({
      perp: { venue: "bybit", credentials: null, testnet: false },
    });

    expect(() => createVenuePair(config, "ETH/USDT")).toThrow(MissingCredentialsError);
  });

  it("should simulate both legs in a dry run", async () => {
    const config = venues({
      dryRun: true,
      spot: { venue: "gateio", credentials: null },
      perp: { venue: "bybit", credentials: null, testnet: false },
    });

    const pair = createVenuePair(config, "ETH/USDT");

    // Paper venues take the live venue's id
    expect(pair.spot.venue).toBe("gateio");
    expect(pair.perp.market).toBe("perp");
    expect(await pair.spot.fetchBalances()).toEqual([
      {
        asset: "USDT",
        availableBase: 1_000_000_000_000n,
        heldBase: 0n,
        totalBase: 1_000_000_000_000n,
      },
    ]);
  });
});
