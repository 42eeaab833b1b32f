import { afterEach, beforeEach, describe, expect, it, vi, type VitestUtils } from "vitest";

import { FatalAdapterError } from "@/adapters/errors";
import { type PaperAdapter, type PaperBookUpdate, createPaperAdapter } from "@/adapters/paper";
import { parseDecimal } from "@/lib/decimal";
import type { Logger } from "@/lib/logger";

import { type OrderBookAggregator, createOrderBookAggregator } from "./aggregator";

const dec = (value: string): bigint => parseDecimal(value, 8);

const SYMBOL = "ETH/USDT";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
});

const book = (bid: string, ask: string): PaperBookUpdate => ({
  symbol: SYMBOL,
  bestBid: { priceQuote: dec(bid), quantityBase: dec("20") },
  bestAsk: { priceQuote: dec(ask), quantityBase: dec("20") },
});

const flush = (): Promise<VitestUtils> => vi.advanceTimersByTimeAsync(0);

describe("createOrderBookAggregator", () => {
  let spot: PaperAdapter;
  let perp: PaperAdapter;
  let logger: Logger;
  let aggregator: OrderBookAggregator;

  beforeEach(() => {
    vi.useFakeTimers();
    spot = createPaperAdapter({ venue: "gateio", market: "spot" });
    perp = createPaperAdapter({ venue: "bybit", market: "perp" });
    logger = createMockLogger();
    aggregator = createOrderBookAggregator(
      {
        symbol: SYMBOL,
        snapshotMaxAgeMs: 3000,
        streamIdleTimeoutMs: 30_000,
        backoff: { initialDelayMs: 1000, maxDelayMs: 8000, multiplier: 2, jitterFactor: 0 },
      },
      { spot, perp, logger },
    );
    aggregator.start();
  });

  afterEach(async () => {
    await aggregator.stop();
    vi.useRealTimers();
  });

  it("should pair the newest snapshot from each venue", async () => {
    expect(aggregator.latest()).toBeNull();

    spot.pushOrderBook(book("99.90", "100"));
    perp.pushOrderBook(book("100.30", "100.40"));
    await flush();
    expect(aggregator.latest()?.spot.bestAsk?.priceQuote).toBe(dec("100"));

    spot.pushOrderBook(book("100.90", "101"));
    await flush();
    const pair = aggregator.latest();
    expect(pair?.spot.bestAsk?.priceQuote).toBe(dec("101"));
    expect(pair?.perp.bestBid?.priceQuote).toBe(dec("100.30"));
  });

  it("should drop the pair when one venue falls behind the freshness bound", async () => {
    spot.pushOrderBook(book("99.90", "100"));
    perp.pushOrderBook(book("100.30", "100.40"));
    await flush();

    await vi.advanceTimersByTimeAsync(3001);
    spot.pushOrderBook(book("99.90", "100"));
    await flush();

    expect(aggregator.latest()).toBeNull();
    expect(aggregator.latest()).toBeNull();
    expect(aggregator.staleVenues()).toEqual(["bybit"]);
    // One warning per stale episode
    const staleWarnings = vi
      .mocked(logger.warn)
      .mock.calls.filter(([message]) => message === "Order book data stale");
    expect(staleWarnings).toHaveLength(1);
  });

  it("should mark a dropped venue unavailable and resubscribe after backoff", async () => {
    spot.pushOrderBook(book("99.90", "100"));
    perp.pushOrderBook(book("100.30", "100.40"));
    await flush();

    perp.dropStreams();
    await flush();

    expect(aggregator.latest()).toBeNull();
    expect(aggregator.status()[1]).toMatchObject({
      venue: "bybit",
      available: false,
      reconnects: 1,
      lastError: "Paper stream dropped",
    });

    await vi.advanceTimersByTimeAsync(1000);
    perp.pushOrderBook(book("100.50", "100.60"));
    await flush();

    expect(aggregator.latest()?.perp.bestBid?.priceQuote).toBe(dec("100.50"));
    expect(aggregator.status()[1]?.available).toBe(true);
  });

  it("should grow the backoff while a venue stays silent", async () => {
    perp.dropStreams();
    await flush();
    await vi.advanceTimersByTimeAsync(1000);
    perp.dropStreams();
    await flush();

    expect(logger.warn).toHaveBeenCalledWith(
      "Order book stream lost, resubscribing",
      expect.objectContaining({ venue: "bybit", reconnects: 2, delayMs: 2000 }),
    );
  });

  it("should resubscribe a stream that stays idle past the timeout", async () => {
    spot.pushOrderBook(book("99.90", "100"));
    perp.pushOrderBook(book("100.30", "100.40"));
    await flush();

    await vi.advanceTimersByTimeAsync(30_000);

    expect(aggregator.status()).toEqual([
      expect.objectContaining({ venue: "gateio", reconnects: 1, lastError: "idle timeout" }),
      expect.objectContaining({ venue: "bybit", reconnects: 1, lastError: "idle timeout" }),
    ]);
  });

  it("should surface a fatal stream error without resubscribing", async () => {
    const fatal = new FatalAdapterError("banned", "AUTHENTICATION_FAILED", "bybit");

    perp.dropStreams(fatal);
    await flush();
    await vi.advanceTimersByTimeAsync(5000);

    expect(aggregator.fatalError()).toBe(fatal);
    expect(aggregator.status()[1]).toMatchObject({ reconnects: 0, lastError: "banned" });
  });

  it("should stop both readers", async () => {
    await aggregator.stop();

    spot.pushOrderBook(book("99.90", "100"));
    perp.pushOrderBook(book("100.30", "100.40"));
    await flush();

    expect(aggregator.latest()).toBeNull();
    expect(aggregator.status().map((feed) => feed.reconnects)).toEqual([0, 0]);
  });
});
