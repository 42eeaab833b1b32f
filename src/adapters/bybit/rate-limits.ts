/**
 * Bybit API v5 rate limits.
 *
 * @see https://bybit-exchange.github.io/docs/v5/rate-limit
 *
 * - Public: 120 requests per 5 seconds (24/s)
 * - Private (account, position): 10 requests per second
 * - Orders: 10 requests per second per symbol
 */

import type { VenueRateLimitConfig } from "@/lib/rate-limiter";

export const BYBIT_RATE_LIMITS: VenueRateLimitConfig = {
  rest: {
    public: { maxTokens: 120, refillRatePerSecond: 24 }, // 120/5 = 24/s
    private: { maxTokens: 10, refillRatePerSecond: 10 },
    orders: { maxTokens: 10, refillRatePerSecond: 10 },
  },
  defaultTimeoutMs: 5000,
};
