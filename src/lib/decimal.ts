/**
 * Fixed-point helpers for venue decimal strings.
 *
 * Quantities and prices travel through the engine as `bigint` scaled by a
 * fixed number of decimals. Suffixes carry the unit: `*Base` for base asset
 * quantities, `*Quote` for prices and quote values, `*Bps` for ratios.
 */

/** Decimals carried by base asset quantities. */
export const BASE_DECIMALS = 8;

/** Decimals carried by prices and quote currency values. */
export const QUOTE_DECIMALS = 8;

export const BASE_SCALE = 10n ** BigInt(BASE_DECIMALS);
export const QUOTE_SCALE = 10n ** BigInt(QUOTE_DECIMALS);

/** Basis points per unit (1 = 10000 bps). */
export const BPS_PER_UNIT = 10000n;

/** Decimals of a basis-point value when parsed from a fraction ("0.001" → 10n). */
export const BPS_DECIMALS = 4;

const DECIMAL_PATTERN = /^[+-]?(\d+)(\.\d*)?$|^[+-]?\.\d+$/;

/**
 * Parse a decimal string into a scaled bigint, truncating toward zero.
 *
 * @example
 * ```typescript
 * parseDecimal("100.30", 8); // 10030000000n
 * parseDecimal("-0.0001", 4); // -1n
 * ```
 */
export const parseDecimal = (value: string, decimals: number): bigint => {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid decimal string: "${value}"`);
  }

  const negative = trimmed.startsWith("-");
  const unsigned = trimmed.replace(/^[+-]/, "");
  const [whole = "", frac = ""] = unsigned.split(".");
  const paddedFrac = frac.padEnd(decimals, "0").slice(0, decimals);
  const magnitude = BigInt((whole || "0") + paddedFrac);

  return negative ? -magnitude : magnitude;
};

/**
 * Format a scaled bigint as a decimal string with trailing zeros trimmed.
 */
export const formatDecimal = (value: bigint, decimals: number): string => {
  const negative = value < 0n;
  const magnitude = negative ? -value : value;
  const digits = magnitude.toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const frac = digits.slice(digits.length - decimals).replace(/0+$/, "");
  const body = frac.length > 0 ? `${whole}.${frac}` : whole;

  return negative && magnitude !== 0n ? `-${body}` : body;
};

export const formatBase = (value: bigint): string => formatDecimal(value, BASE_DECIMALS);

export const formatQuote = (value: bigint): string => formatDecimal(value, QUOTE_DECIMALS);

export const absBigInt = (value: bigint): bigint => (value < 0n ? -value : value);

export const maxBigInt = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export const minBigInt = (a: bigint, b: bigint): bigint => (a < b ? a : b);

/**
 * Quote value of a base quantity at a price: `quantityBase * priceQuote / BASE_SCALE`.
 */
export const calculateNotionalQuote = (quantityBase: bigint, priceQuote: bigint): bigint =>
  (quantityBase * priceQuote) / BASE_SCALE;

/**
 * Round a quantity down to a multiple of `stepBase`. A non-positive step leaves it unchanged.
 */
export const roundDownToStep = (quantityBase: bigint, stepBase: bigint): bigint => {
  if (stepBase <= 0n) return quantityBase;
  return (quantityBase / stepBase) * stepBase;
};

/**
 * Apply a basis-point adjustment: `value * (10000 + bps) / 10000`.
 */
export const applyBps = (value: bigint, bps: bigint): bigint =>
  (value * (BPS_PER_UNIT + bps)) / BPS_PER_UNIT;
