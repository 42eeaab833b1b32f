import * as v from "valibot";

import { BASE_DECIMALS, BPS_DECIMALS, QUOTE_DECIMALS } from "../decimal";
import { logLevelSchema } from "../logger/schema";

// At most `places` fractional digits, the precision of the fixed-point field
const decimalPattern = (places: number, signed: boolean): RegExp =>
  new RegExp(`^${signed ? "-?" : ""}\\d+(\\.\\d{1,${places}})?$`);

const decimalString = (places: number) =>
  v.pipe(
    v.string(),
    v.regex(
      decimalPattern(places, true),
      `Expected a decimal number with at most ${places} decimal places`,
    ),
  );

const positiveDecimalString = (places: number) =>
  v.pipe(
    v.string(),
    v.regex(
      decimalPattern(places, false),
      `Expected a positive decimal number with at most ${places} decimal places`,
    ),
    v.check((value) => Number(value) > 0, "Must be greater than zero"),
  );

const integerString = (min: number, max: number) =>
  v.pipe(v.string(), v.regex(/^\d+$/), v.transform(Number), v.minValue(min), v.maxValue(max));

const booleanString = v.pipe(
  v.string(),
  v.picklist(["true", "false"]),
  v.transform((value) => value === "true"),
);

export const envSchema = v.object({
  // Server
  PORT: v.optional(integerString(1, 65535), "8080"),
  NODE_ENV: v.picklist(["development", "production", "test"]),

  // Logging
  LOG_LEVEL: v.optional(logLevelSchema),

  // Hedge strategy
  HEDGE_SYMBOL: v.pipe(v.string(), v.regex(/^[A-Z0-9]+\/[A-Z0-9]+$/, "Expected BASE/QUOTE")),
  HEDGE_DIRECTION: v.optional(v.picklist(["open", "close"]), "open"),
  TRADE_SIZE: positiveDecimalString(BASE_DECIMALS),
  TARGET_TRADES: v.optional(integerString(1, 100_000), "1"),
  MIN_SPREAD: v.optional(decimalString(BPS_DECIMALS), "0.001"),
  MAX_SPREAD: v.optional(positiveDecimalString(BPS_DECIMALS), "0.1"),
  DEPTH_MULTIPLIER: v.optional(positiveDecimalString(BPS_DECIMALS), "2"),
  FILL_TOLERANCE: v.optional(positiveDecimalString(BPS_DECIMALS), "0.01"),
  FEE_COMPENSATION: v.optional(decimalString(BPS_DECIMALS), "0.001"),
  REBALANCE_THRESHOLD: v.optional(positiveDecimalString(QUOTE_DECIMALS), "6"),
  LEVERAGE: v.optional(integerString(1, 200)),
  MARGIN_MODE: v.optional(v.picklist(["cross", "isolated"]), "cross"),
  MAX_CONSECUTIVE_FAILURES: v.optional(integerString(1, 100), "3"),
  SNAPSHOT_MAX_AGE_MS: v.optional(integerString(100, 60_000), "3000"),
  TRADE_INTERVAL_MS: v.optional(integerString(0, 3_600_000), "5000"),
  REDEEM_IDLE_FUNDS: v.optional(booleanString, "true"),
  PARK_SPOT_IN_EARN: v.optional(booleanString, "false"),
  DRY_RUN: v.optional(booleanString, "false"),
  DRY_RUN_QUOTE_BALANCE: v.optional(positiveDecimalString(QUOTE_DECIMALS), "10000"),

  // Venues
  SPOT_VENUE: v.optional(v.picklist(["gateio"]), "gateio"),
  PERP_VENUE: v.optional(v.picklist(["bybit"]), "bybit"),
  GATEIO_API_KEY: v.optional(v.string()),
  GATEIO_API_SECRET: v.optional(v.string()),
  BYBIT_API_KEY: v.optional(v.string()),
  BYBIT_API_SECRET: v.optional(v.string()),
  BYBIT_TESTNET: v.optional(booleanString, "false"),
});

export type Env = v.InferOutput<typeof envSchema>;
