/**
 * Hedge session: the loop that turns fresh order book pairs into paired
 * trades until the target count is reached or a stop condition fires.
 *
 * Leg- and iteration-level failures are absorbed here. The session ends
 * early only on cancellation, persistent collateral shortfall, an
 * exhausted position, repeated failed trades or a fatal venue error, and
 * every ending logs the run summary.
 */

import { VenueError, isFatalAdapterError } from "@/adapters/errors";
import type { VenueAdapter } from "@/adapters/types";
import { netPositionBase } from "@/adapters/types";
import { InsufficientCollateralError, StaleDataError } from "@/domains/errors";
import { type LedgerPhase, createPositionLedger } from "@/domains/ledger";
import {
  type SessionSummary,
  type StopReason,
  createTradeJournal,
  summarizeSession,
} from "@/domains/reporting";
import type { HedgeConfig } from "@/domains/strategy";
import { buildTradeIntent, evaluateOpportunity } from "@/domains/strategy";
import { type Logger, toError } from "@/lib/logger";
import { sleep } from "@/lib/sleep";

import { DEFAULT_SETTLEMENT_CONFIG, createPairedExecutor, createRebalancer } from "../execution";
import { DEFAULT_FRESHNESS_CONFIG } from "../freshness";
import {
  type OrderBookAggregator,
  type VenueFeedStatus,
  createOrderBookAggregator,
} from "../order-book/aggregator";
import { JobCancelledError, createSerialQueue } from "../queue";
import { type CollateralGuard, createCollateralGuard } from "./collateral";
import { type SessionMetrics, createSessionMetrics } from "./metrics";
import { prepareVenues } from "./setup";

export type SessionState = "idle" | "running" | "stopped";

export interface SessionHealth {
  state: SessionState;
  feeds: VenueFeedStatus[];
  ledgerPhase: LedgerPhase;
  tradesCompleted: number;
}

export interface HedgeSessionDeps {
  spot: VenueAdapter;
  perp: VenueAdapter;
  logger: Logger;
  metrics?: SessionMetrics;
  /** Built from the config when omitted */
  aggregator?: OrderBookAggregator;
}

export interface HedgeSession {
  /**
   * Run to completion and resolve with the logged summary. Rejects with the
   * fatal error, after logging the summary, when the stop reason is
   * `fatal-error`.
   */
  run(): Promise<SessionSummary>;
  /** Stop at the next iteration boundary; an in-flight trade still settles */
  cancel(): void;
  health(): SessionHealth;
  metrics: SessionMetrics;
}

type IterationResult =
  | { kind: "skipped" }
  | { kind: "cancelled" }
  | { kind: "position-exhausted"; reason: string }
  | { kind: "traded"; verified: boolean };

export const createHedgeSession = (config: HedgeConfig, deps: HedgeSessionDeps): HedgeSession => {
  const { spot, perp } = deps;
  const logger = deps.logger.child({ symbol: config.symbol, direction: config.direction });
  const metrics = deps.metrics ?? createSessionMetrics();
  const aggregator =
    deps.aggregator ??
    createOrderBookAggregator(
      {
        symbol: config.symbol,
        snapshotMaxAgeMs: config.snapshotMaxAgeMs,
        streamIdleTimeoutMs: DEFAULT_FRESHNESS_CONFIG.streamIdleTimeoutMs,
      },
      { spot, perp, logger },
    );
  const ledger = createPositionLedger(config);
  const journal = createTradeJournal();
  const queue = createSerialQueue();
  const settlement = {
    ...DEFAULT_SETTLEMENT_CONFIG,
    fillPollIntervalMs: config.fillPollIntervalMs,
    fillTimeoutMs: config.fillTimeoutMs,
  };
  const executor = createPairedExecutor(
    { ...settlement, fillToleranceBps: config.fillToleranceBps },
    { spot, perp, ledger, journal, logger },
  );
  const rebalancer = createRebalancer(
    { ...settlement, symbol: config.symbol },
    { spot, perp, ledger, journal, logger },
  );

  const stopController = new AbortController();
  let state: SessionState = "idle";
  let tradesCompleted = 0;
  let consecutiveFailures = 0;
  let collateralFailures = 0;
  let tradeJobs = 0;
  let rebalanceJobs = 0;

  const pause = (ms: number): Promise<void> => sleep(ms, stopController.signal);

  const rebalanceIfNeeded = async (): Promise<void> => {
    if (stopController.signal.aborted || !ledger.needsRebalance()) return;
    rebalanceJobs++;
    const job = queue.enqueue(`rebalance-${rebalanceJobs}`, () => rebalancer.run());
    const outcome = await job.promise;
    if (outcome.kind === "rebalanced") {
      metrics.recordRebalance("rebalanced");
    } else if (outcome.kind === "failed") {
      metrics.recordRebalance("failed");
      metrics.recordFailure("rebalance");
    }
  };

  const iterate = async (guard: CollateralGuard): Promise<IterationResult> => {
    const pair = aggregator.latest();
    if (!pair) throw new StaleDataError(aggregator.staleVenues());

    const decision = evaluateOpportunity(pair, config);
    metrics.recordDecision(decision);
    if (decision.action === "skip") {
      logger.info("Skip", { reason: decision.reason, spreadBps: decision.spreadBps });
      return { kind: "skipped" };
    }

    const intent = buildTradeIntent(decision, config);
    const check = await guard.ensure(intent);
    if (check.kind === "position-exhausted") return check;
    collateralFailures = 0;
    // Cancelled while balances were read: nothing is placed
    if (stopController.signal.aborted) return { kind: "cancelled" };

    logger.info("Trade", { spreadBps: decision.spreadBps, sizeBase: decision.sizeBase });
    tradeJobs++;
    const job = queue.enqueue(`trade-${tradeJobs}`, () => executor.execute(intent));
    const outcome = await job.promise;
    metrics.recordTrade(outcome.kind);
    const verified = outcome.kind === "verified";
    if (verified) {
      tradesCompleted++;
      consecutiveFailures = 0;
      await guard.park(outcome.legA);
    } else {
      consecutiveFailures++;
      metrics.recordFailure("trade");
    }

    await rebalanceIfNeeded();
    metrics.setImbalance(ledger.snapshot());
    return { kind: "traded", verified };
  };

  const loop = async (guard: CollateralGuard): Promise<StopReason> => {
    while (tradesCompleted < config.targetTrades) {
      if (stopController.signal.aborted) return "cancelled";
      const streamFatal = aggregator.fatalError();
      if (streamFatal) throw streamFatal;

      let result: IterationResult;
      try {
        result = await iterate(guard);
      } catch (error) {
        if (error instanceof JobCancelledError) return "cancelled";
        if (error instanceof StaleDataError) {
          metrics.recordFailure("stale-data");
          logger.debug("No fresh order book pair", { venues: error.venues });
          await pause(config.idlePollMs);
          continue;
        }
        if (error instanceof InsufficientCollateralError) {
          collateralFailures++;
          metrics.recordFailure("insufficient-collateral");
          logger.warn("Insufficient collateral", {
            venue: error.venue,
            asset: error.asset,
            requiredBase: error.requiredBase,
            availableBase: error.availableBase,
            collateralFailures,
          });
          if (collateralFailures >= config.maxCollateralFailures) {
            return "insufficient-collateral";
          }
          await pause(config.idlePollMs);
          continue;
        }
        if (!isFatalAdapterError(error) && error instanceof VenueError) {
          logger.warn("Venue request failed, retrying next iteration", {
            venue: error.venue,
            code: error.code,
            error: error.message,
          });
          await pause(config.idlePollMs);
          continue;
        }
        throw error;
      }

      if (result.kind === "cancelled") return "cancelled";
      if (result.kind === "position-exhausted") {
        logger.warn("Position exhausted", { reason: result.reason });
        return "position-exhausted";
      }
      if (result.kind === "skipped") {
        await pause(config.idlePollMs);
        continue;
      }
      if (consecutiveFailures >= config.maxConsecutiveFailures) {
        return "consecutive-failures";
      }
      if (tradesCompleted < config.targetTrades) await pause(config.tradeIntervalMs);
    }
    return "target-reached";
  };

  const readPerpPosition = async (): Promise<bigint | null> => {
    try {
      return netPositionBase(await perp.fetchPositions(config.symbol), config.symbol);
    } catch (error) {
      logger.warn("Could not read final perpetual position", {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  };

  const disconnect = async (): Promise<void> => {
    const results = await Promise.allSettled([spot.disconnect(), perp.disconnect()]);
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("Venue disconnect failed", { error: toError(result.reason).message });
      }
    }
  };

  const run = async (): Promise<SessionSummary> => {
    if (state !== "idle") throw new Error("Session has already run");
    state = "running";
    const startedAt = new Date();
    let initialPerpPositionBase: bigint | null = null;
    let stopReason: StopReason;
    let failure: Error | null = null;

    try {
      const setup = await prepareVenues(config, { spot, perp, logger });
      initialPerpPositionBase = setup.initialPerpPositionBase;
      const guard = createCollateralGuard(
        { ...config, leverage: setup.leverage },
        { spot, perp, logger },
      );
      aggregator.start();
      stopReason = await loop(guard);
    } catch (error) {
      failure = toError(error);
      stopReason = "fatal-error";
      logger.error("Session stopped on error", failure);
    }

    queue.cancelPending();
    await queue.waitForIdle();
    await aggregator.stop();

    const summary = summarizeSession({
      stopReason,
      targetTrades: config.targetTrades,
      records: journal.trades(),
      rebalanceLegs: journal.rebalanceLegs(),
      ledger: ledger.snapshot(),
      initialPerpPositionBase,
      finalPerpPositionBase: await readPerpPosition(),
      startedAt,
      finishedAt: new Date(),
    });
    metrics.setImbalance(ledger.snapshot());
    logger.info("Session summary", { ...summary });

    await disconnect();
    state = "stopped";
    if (failure) throw failure;
    return summary;
  };

  return {
    run,
    cancel: () => {
      if (stopController.signal.aborted) return;
      logger.info("Session cancellation requested", { tradesCompleted });
      stopController.abort();
      queue.cancelPending();
    },
    health: () => ({
      state,
      feeds: aggregator.status(),
      ledgerPhase: ledger.snapshot().phase,
      tradesCompleted,
    }),
    metrics,
  };
};
