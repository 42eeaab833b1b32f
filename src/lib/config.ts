/**
 * Typed application config derived from the validated environment.
 */

import { type HedgeConfig, createHedgeConfig } from "@/domains/strategy/config";

import { BASE_DECIMALS, BPS_DECIMALS, QUOTE_DECIMALS, parseDecimal } from "./decimal";
import type { Env } from "./env";
import type { LogFormat, LogLevel } from "./logger";

export interface VenueCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  hedge: HedgeConfig;
  venues: {
    spot: { venue: Env["SPOT_VENUE"]; credentials: VenueCredentials | null };
    perp: { venue: Env["PERP_VENUE"]; credentials: VenueCredentials | null; testnet: boolean };
    dryRun: boolean;
    /** Starting quote balance of each simulated venue in a dry run */
    dryRunBalanceQuote: bigint;
  };
}

const credentials = (apiKey?: string, apiSecret?: string): VenueCredentials | null =>
  apiKey && apiSecret ? { apiKey, apiSecret } : null;

/**
 * @example
 * ```typescript
 * const config = buildConfig(getEnv());
 * config.hedge.minSpreadBps; // 10n for MIN_SPREAD=0.001
 * ```
 *
 * @throws {v.ValiError} when a derived hedge setting is out of range
 */
export const buildConfig = (env: Env): AppConfig => ({
  server: {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    format: env.NODE_ENV === "development" ? "pretty" : "json",
  },
  hedge: createHedgeConfig({
    symbol: env.HEDGE_SYMBOL,
    direction: env.HEDGE_DIRECTION,
    tradeSizeBase: parseDecimal(env.TRADE_SIZE, BASE_DECIMALS),
    targetTrades: env.TARGET_TRADES,
    minSpreadBps: parseDecimal(env.MIN_SPREAD, BPS_DECIMALS),
    maxSpreadBps: parseDecimal(env.MAX_SPREAD, BPS_DECIMALS),
    depthMultiplierBps: parseDecimal(env.DEPTH_MULTIPLIER, BPS_DECIMALS),
    fillToleranceBps: parseDecimal(env.FILL_TOLERANCE, BPS_DECIMALS),
    feeCompensationBps: parseDecimal(env.FEE_COMPENSATION, BPS_DECIMALS),
    rebalanceThresholdQuote: parseDecimal(env.REBALANCE_THRESHOLD, QUOTE_DECIMALS),
    leverage: env.LEVERAGE ?? null,
    marginMode: env.MARGIN_MODE,
    maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES,
    snapshotMaxAgeMs: env.SNAPSHOT_MAX_AGE_MS,
    tradeIntervalMs: env.TRADE_INTERVAL_MS,
    redeemIdleFunds: env.REDEEM_IDLE_FUNDS,
    parkSpotInEarn: env.PARK_SPOT_IN_EARN,
  }),
  venues: {
    spot: {
      venue: env.SPOT_VENUE,
      credentials: credentials(env.GATEIO_API_KEY, env.GATEIO_API_SECRET),
    },
    perp: {
      venue: env.PERP_VENUE,
      credentials: credentials(env.BYBIT_API_KEY, env.BYBIT_API_SECRET),
      testnet: env.BYBIT_TESTNET,
    },
    dryRun: env.DRY_RUN,
    dryRunBalanceQuote: parseDecimal(env.DRY_RUN_QUOTE_BALANCE, QUOTE_DECIMALS),
  },
});
