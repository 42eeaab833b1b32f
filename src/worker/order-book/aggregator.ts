/**
 * Order book aggregator: reads both venues' top-of-book streams and pairs
 * the latest snapshot of each.
 *
 * Each venue has its own reader. A stream error marks the venue
 * unavailable at once and resubscribes with exponential backoff; a stream
 * that goes quiet for the idle timeout is torn down and resubscribed the
 * same way. A `FatalAdapterError` stops that reader for good and is
 * surfaced through `fatalError()`.
 */

import type { FatalAdapterError } from "@/adapters/errors";
import { isFatalAdapterError } from "@/adapters/errors";
import type { OrderBookSnapshot, VenueAdapter } from "@/adapters/types";
import type { SnapshotPair } from "@/domains/strategy";
import type { Logger } from "@/lib/logger";
import { type BackoffConfig, calculateBackoffMs } from "@/lib/rate-limiter";
import { sleep } from "@/lib/sleep";

import { DEFAULT_FRESHNESS_CONFIG, type FreshnessConfig, isFresh } from "../freshness";

export const STREAM_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitterFactor: 0.1,
};

export interface AggregatorConfig extends FreshnessConfig {
  symbol: string;
  backoff?: BackoffConfig;
}

export interface AggregatorDeps {
  spot: VenueAdapter;
  perp: VenueAdapter;
  logger: Logger;
}

export interface VenueFeedStatus {
  venue: string;
  market: VenueAdapter["market"];
  available: boolean;
  lastUpdateAt: number | null;
  reconnects: number;
  lastError: string | null;
}

export interface OrderBookAggregator {
  /** Start both readers. Calling it again has no effect. */
  start(): void;
  /** Newest pair with both sides fresh, or null */
  latest(): SnapshotPair | null;
  /** Venues whose data would keep `latest()` from pairing right now */
  staleVenues(): string[];
  status(): VenueFeedStatus[];
  fatalError(): FatalAdapterError | null;
  /** Abort both readers and wait for them to exit */
  stop(): Promise<void>;
}

interface Feed {
  adapter: VenueAdapter;
  snapshot: OrderBookSnapshot | null;
  receivedAt: number | null;
  available: boolean;
  reconnects: number;
  lastError: string | null;
}

const createFeed = (adapter: VenueAdapter): Feed => ({
  adapter,
  snapshot: null,
  receivedAt: null,
  available: false,
  reconnects: 0,
  lastError: null,
});

export const createOrderBookAggregator = (
  config: AggregatorConfig,
  deps: AggregatorDeps,
): OrderBookAggregator => {
  const { symbol, snapshotMaxAgeMs, streamIdleTimeoutMs } = {
    ...DEFAULT_FRESHNESS_CONFIG,
    ...config,
  };
  const backoff = config.backoff ?? STREAM_BACKOFF_CONFIG;
  const { logger } = deps;
  const spotFeed = createFeed(deps.spot);
  const perpFeed = createFeed(deps.perp);
  const feeds = [spotFeed, perpFeed];

  const stopController = new AbortController();
  let readers: Promise<void>[] = [];
  let fatal: FatalAdapterError | null = null;
  let staleEpisode = false;

  const consume = async (feed: Feed): Promise<"idle" | "ended"> => {
    const streamController = new AbortController();
    const abortStream = (): void => streamController.abort();
    stopController.signal.addEventListener("abort", abortStream, { once: true });

    let idleTimer: ReturnType<typeof setTimeout> | undefined;
    let idled = false;
    const armIdleTimer = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        idled = true;
        streamController.abort();
      }, streamIdleTimeoutMs);
    };

    try {
      armIdleTimer();
      for await (const snapshot of feed.adapter.streamOrderBook(symbol, streamController.signal)) {
        armIdleTimer();
        if (!feed.available) {
          logger.info("Order book stream live", { venue: feed.adapter.venue, symbol });
        }
        feed.snapshot = snapshot;
        feed.receivedAt = Date.now();
        feed.available = true;
      }
      return idled ? "idle" : "ended";
    } finally {
      clearTimeout(idleTimer);
      stopController.signal.removeEventListener("abort", abortStream);
    }
  };

  const runReader = async (feed: Feed): Promise<void> => {
    const { venue } = feed.adapter;
    let attempt = 0;

    while (!stopController.signal.aborted) {
      const receivedBefore = feed.receivedAt;
      try {
        const ended = await consume(feed);
        if (stopController.signal.aborted) break;
        feed.lastError = ended === "idle" ? "idle timeout" : "stream ended";
      } catch (error) {
        if (stopController.signal.aborted) break;
        if (isFatalAdapterError(error)) {
          feed.available = false;
          feed.lastError = error.message;
          fatal = fatal ?? error;
          logger.error("Fatal order book stream error", error, { venue, symbol });
          return;
        }
        feed.lastError = error instanceof Error ? error.message : String(error);
      }

      feed.available = false;
      feed.reconnects++;
      // Data arrived since the last resubscribe: start the backoff over
      if (feed.receivedAt !== receivedBefore) attempt = 0;
      const delayMs = calculateBackoffMs(attempt, backoff);
      attempt++;
      logger.warn("Order book stream lost, resubscribing", {
        venue,
        symbol,
        reason: feed.lastError,
        reconnects: feed.reconnects,
        delayMs,
      });
      await sleep(delayMs, stopController.signal);
    }
  };

  const staleVenues = (): string[] => {
    const nowMs = Date.now();
    return feeds
      .filter(
        (feed) =>
          !feed.available || !feed.snapshot || !isFresh(feed.receivedAt, nowMs, snapshotMaxAgeMs),
      )
      .map((feed) => feed.adapter.venue);
  };

  const latest = (): SnapshotPair | null => {
    const stale = staleVenues();
    const spot = spotFeed.snapshot;
    const perp = perpFeed.snapshot;
    if (stale.length > 0 || !spot || !perp) {
      if (!staleEpisode) {
        staleEpisode = true;
        logger.warn("Order book data stale", {
          venues: stale,
          ages: feeds.map((feed) => ({
            venue: feed.adapter.venue,
            ageMs: feed.receivedAt === null ? null : Date.now() - feed.receivedAt,
          })),
        });
      }
      return null;
    }
    if (staleEpisode) {
      staleEpisode = false;
      logger.info("Order book data fresh again", { symbol });
    }
    return { spot, perp, pairedAt: Date.now() };
  };

  return {
    start: () => {
      if (readers.length > 0 || stopController.signal.aborted) return;
      readers = feeds.map((feed) => runReader(feed));
    },
    latest,
    staleVenues,
    status: () =>
      feeds.map((feed) => ({
        venue: feed.adapter.venue,
        market: feed.adapter.market,
        available: feed.available,
        lastUpdateAt: feed.receivedAt,
        reconnects: feed.reconnects,
        lastError: feed.lastError,
      })),
    fatalError: () => fatal,
    stop: async () => {
      stopController.abort();
      await Promise.all(readers);
    },
  };
};
