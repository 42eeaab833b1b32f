/**
 * Hedge strategy configuration.
 *
 * Ratios are basis points (10n = 0.10%), quantities carry 8 decimals.
 * The schema validates configuration built in code; environment parsing
 * lives in `@/lib/env`.
 */

import * as v from "valibot";

import { bigintSchema } from "@/adapters/types";

const positiveBigint = v.pipe(
  bigintSchema,
  v.check((value) => value > 0n, "Must be positive"),
);

const nonNegativeInt = v.pipe(v.number(), v.integer(), v.minValue(0));

export const HedgeConfigSchema = v.object({
  symbol: v.pipe(v.string(), v.regex(/^[A-Z0-9]+\/[A-Z0-9]+$/)),
  direction: v.picklist(["open", "close"]),
  tradeSizeBase: positiveBigint,
  targetTrades: v.pipe(v.number(), v.integer(), v.minValue(1)),

  // Gate
  minSpreadBps: bigintSchema,
  maxSpreadBps: positiveBigint,
  depthMultiplierBps: positiveBigint,

  // Execution
  fillToleranceBps: positiveBigint,
  feeCompensationBps: bigintSchema,
  fillPollIntervalMs: nonNegativeInt,
  fillTimeoutMs: nonNegativeInt,

  // Ledger
  rebalanceThresholdQuote: positiveBigint,

  // Venue setup
  leverage: v.nullable(v.pipe(v.number(), v.integer(), v.minValue(1))),
  marginMode: v.picklist(["cross", "isolated"]),

  // Session
  maxConsecutiveFailures: v.pipe(v.number(), v.integer(), v.minValue(1)),
  maxCollateralFailures: v.pipe(v.number(), v.integer(), v.minValue(1)),
  snapshotMaxAgeMs: v.pipe(v.number(), v.integer(), v.minValue(1)),
  tradeIntervalMs: nonNegativeInt,
  idlePollMs: nonNegativeInt,

  // Capital reservoir
  redeemIdleFunds: v.boolean(),
  parkSpotInEarn: v.boolean(),
});

export type HedgeConfig = v.InferOutput<typeof HedgeConfigSchema>;

export type HedgeDirection = HedgeConfig["direction"];

export const DEFAULT_HEDGE_CONFIG: Omit<HedgeConfig, "symbol" | "tradeSizeBase"> = {
  direction: "open",
  targetTrades: 1,
  minSpreadBps: 10n, // 0.1%
  maxSpreadBps: 1000n, // 10%
  depthMultiplierBps: 20000n, // 2x
  fillToleranceBps: 100n, // 1%
  feeCompensationBps: 10n, // 0.1%
  fillPollIntervalMs: 500,
  fillTimeoutMs: 20_000,
  rebalanceThresholdQuote: 600_000_000n, // 6 quote units
  leverage: null,
  marginMode: "cross",
  maxConsecutiveFailures: 3,
  maxCollateralFailures: 3,
  snapshotMaxAgeMs: 3000,
  tradeIntervalMs: 5000,
  idlePollMs: 250,
  redeemIdleFunds: true,
  parkSpotInEarn: false,
};

/**
 * Defaults merged with `overrides`, validated.
 *
 * @throws {v.ValiError} when the merged config is invalid
 */
export const createHedgeConfig = (
  overrides: Pick<HedgeConfig, "symbol" | "tradeSizeBase"> & Partial<HedgeConfig>,
): HedgeConfig => {
  const merged: HedgeConfig = { ...DEFAULT_HEDGE_CONFIG, ...overrides };
  v.parse(HedgeConfigSchema, merged);
  return merged;
};
